import axios from 'axios';
import type { AxiosInstance } from 'axios';
import Decimal from 'decimal.js';
import { Wallet } from 'ethers';
import { z } from 'zod';
import { componentLogger } from '../logger';
import type { Logger } from '../logger';
import { withRetry } from '../retry';
import type { RetryOptions } from '../retry';
import type { AccountState, AssetMetadata, OrderResult, OrderStatus, Position } from '../trading/types';
import type { ExchangeClient } from './types';
import { floatToWire, signL1Action, slippagePrice } from './signing';
import type { HyperliquidAction, OrderWire } from './signing';

export interface HyperliquidClientConfig {
  privateKey: string;
  apiUrl: string;
  isMainnet: boolean;
  requestTimeoutMs: number;
}

export interface HyperliquidClientOptions {
  http?: AxiosInstance;
  logger?: Logger;
  retry?: Partial<RetryOptions>;
  nonce?: () => number;
}

const decimalString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .refine((v) => /^-?\d+(\.\d+)?(e[-+]?\d+)?$/i.test(v), { message: 'expected a decimal number' });

const metaSchema = z.object({
  universe: z.array(
    z
      .object({
        name: z.string(),
        szDecimals: z.number().int().nonnegative(),
        maxLeverage: z.number().int().positive(),
        isDelisted: z.boolean().optional(),
      })
      .passthrough(),
  ),
});

const clearinghouseSchema = z
  .object({
    withdrawable: decimalString.default('0'),
    assetPositions: z
      .array(
        z
          .object({
            position: z.object({ coin: z.string(), szi: decimalString.optional() }).passthrough(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

const midsSchema = z.record(z.string(), z.unknown());

const orderStatusSchema = z.union([
  z.object({ filled: z.object({ totalSz: decimalString, avgPx: decimalString, oid: z.number() }).passthrough() }),
  z.object({ resting: z.object({ oid: z.number() }).passthrough() }),
  z.object({ error: z.string() }),
]);

const exchangeReplySchema = z.object({
  status: z.string(),
  response: z.unknown().optional(),
});

const okPayloadSchema = z.object({
  type: z.string(),
  data: z.object({ statuses: z.array(z.unknown()) }).passthrough().optional(),
});

/**
 * Decode a reply from the exchange endpoint. The top-level status can be "ok"
 * while individual orders inside it were rejected, so per-order statuses are
 * kept alongside it.
 */
export function decodeOrderResponse(raw: unknown): OrderResult {
  const reply = exchangeReplySchema.safeParse(raw);
  if (!reply.success) {
    return { status: 'err', message: 'Malformed exchange response', raw };
  }
  if (reply.data.status !== 'ok') {
    const detail = reply.data.response;
    const message = typeof detail === 'string' ? detail : `Exchange returned status ${reply.data.status}`;
    return { status: 'err', message, raw };
  }
  const payload = okPayloadSchema.safeParse(reply.data.response);
  const entries = payload.success ? payload.data.data?.statuses ?? [] : [];
  const statuses: OrderStatus[] = [];
  for (const entry of entries) {
    const parsed = orderStatusSchema.safeParse(entry);
    if (!parsed.success) {
      statuses.push({ kind: 'error', message: `Unrecognised order status: ${JSON.stringify(entry)}` });
      continue;
    }
    const s = parsed.data;
    if ('filled' in s) {
      statuses.push({ kind: 'filled', totalSz: s.filled.totalSz, avgPx: s.filled.avgPx, oid: s.filled.oid });
    } else if ('resting' in s) {
      statuses.push({ kind: 'resting', oid: s.resting.oid });
    } else {
      statuses.push({ kind: 'error', message: s.error });
    }
  }
  return { status: 'ok', statuses, raw };
}

export function createHyperliquidHttp(cfg: Pick<HyperliquidClientConfig, 'apiUrl' | 'requestTimeoutMs'>): AxiosInstance {
  return axios.create({
    baseURL: cfg.apiUrl,
    headers: { 'Content-Type': 'application/json' },
    timeout: cfg.requestTimeoutMs,
  });
}

/** Millisecond nonces that never repeat within one process, even for concurrent writes. */
export function monotonicNonce(now: () => number = Date.now): () => number {
  let last = 0;
  return () => {
    last = Math.max(now(), last + 1);
    return last;
  };
}

function findBySymbol<T>(items: T[], symbol: string, key: (item: T) => string): T | undefined {
  const exact = items.find((i) => key(i) === symbol);
  if (exact) return exact;
  const upper = symbol.toUpperCase();
  return items.find((i) => key(i).toUpperCase() === upper);
}

export class HyperliquidClient implements ExchangeClient {
  readonly name = 'hyperliquid';
  readonly address: string;
  private readonly wallet: Wallet;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly retry: Partial<RetryOptions>;
  private readonly nonce: () => number;
  private readonly isMainnet: boolean;

  constructor(cfg: HyperliquidClientConfig, opts: HyperliquidClientOptions = {}) {
    this.wallet = new Wallet(cfg.privateKey);
    this.address = this.wallet.address;
    this.isMainnet = cfg.isMainnet;
    this.http = opts.http ?? createHyperliquidHttp(cfg);
    this.logger = opts.logger ?? componentLogger('hyperliquid');
    this.retry = opts.retry ?? {};
    this.nonce = opts.nonce ?? monotonicNonce();
  }

  async getAccountState(address: string): Promise<AccountState> {
    const state = await this.info({ type: 'clearinghouseState', user: address }, clearinghouseSchema);
    const positions: Position[] = [];
    for (const ap of state.assetPositions) {
      const { coin, szi } = ap.position;
      if (szi === undefined) {
        this.logger.warn({ coin }, 'skipping position with no size information');
        continue;
      }
      const signedSize = new Decimal(szi);
      if (signedSize.isZero()) continue;
      positions.push({ asset: coin, signedSize });
    }
    return { address, withdrawable: new Decimal(state.withdrawable), positions };
  }

  async getAssetMetadata(): Promise<AssetMetadata[]> {
    const meta = await this.info({ type: 'meta' }, metaSchema);
    const assets: AssetMetadata[] = [];
    meta.universe.forEach((u, index) => {
      if (u.isDelisted) return;
      assets.push({ symbol: u.name, index, maxLeverage: u.maxLeverage, szDecimals: u.szDecimals });
    });
    return assets;
  }

  async getMarketPrice(symbol: string): Promise<Decimal | undefined> {
    const mids = await this.info({ type: 'allMids' }, midsSchema);
    const entry = findBySymbol(Object.entries(mids), symbol, ([name]) => name);
    if (!entry) return undefined;
    const parsed = decimalString.safeParse(entry[1]);
    return parsed.success ? new Decimal(parsed.data) : undefined;
  }

  async setLeverage(symbol: string, leverage: number): Promise<OrderResult> {
    const asset = await this.resolveAsset(symbol);
    if (!asset) return { status: 'err', message: `Unknown asset ${symbol}`, raw: null };
    return this.postAction({ type: 'updateLeverage', asset: asset.index, isCross: true, leverage });
  }

  async submitMarketOrder(symbol: string, isBuy: boolean, size: Decimal, slippage: number): Promise<OrderResult> {
    const asset = await this.resolveAsset(symbol);
    if (!asset) return { status: 'err', message: `Unknown asset ${symbol}`, raw: null };
    return this.marketOrder(asset, isBuy, size, slippage, false);
  }

  async submitMarketClose(symbol: string, slippage: number): Promise<OrderResult> {
    const state = await this.getAccountState(this.address);
    const position = state.positions.find((p) => p.asset === symbol);
    if (!position) return { status: 'err', message: `No open position for ${symbol}`, raw: null };
    const asset = await this.resolveAsset(position.asset);
    if (!asset) return { status: 'err', message: `Unknown asset ${symbol}`, raw: null };
    return this.marketOrder(asset, position.signedSize.isNegative(), position.signedSize.abs(), slippage, true);
  }

  private async marketOrder(
    asset: AssetMetadata,
    isBuy: boolean,
    size: Decimal,
    slippage: number,
    reduceOnly: boolean,
  ): Promise<OrderResult> {
    const mid = await this.getMarketPrice(asset.symbol);
    if (!mid) return { status: 'err', message: `No mid price for ${asset.symbol}`, raw: null };
    const px = slippagePrice(mid, isBuy, slippage, asset.szDecimals);
    const order: OrderWire = {
      a: asset.index,
      b: isBuy,
      p: floatToWire(px),
      s: floatToWire(size),
      r: reduceOnly,
      t: { limit: { tif: 'Ioc' } },
    };
    this.logger.debug({ asset: asset.symbol, order }, 'submitting IOC order');
    return this.postAction({ type: 'order', orders: [order], grouping: 'na' });
  }

  private async resolveAsset(symbol: string): Promise<AssetMetadata | undefined> {
    const assets = await this.getAssetMetadata();
    return findBySymbol(assets, symbol, (a) => a.symbol);
  }

  private async postAction(action: HyperliquidAction): Promise<OrderResult> {
    const nonce = this.nonce();
    const signature = await signL1Action(this.wallet, action, nonce, this.isMainnet);
    // writes are not idempotent; no retry here
    const res = await this.http.post('/exchange', { action, nonce, signature, vaultAddress: null });
    const decoded = decodeOrderResponse(res.data);
    this.logger.debug({ action: action.type, status: decoded.status, response: res.data }, 'exchange response');
    return decoded;
  }

  private async info<S extends z.ZodTypeAny>(body: { type: string; user?: string }, schema: S): Promise<z.infer<S>> {
    const res = await withRetry(() => this.http.post('/info', body), `info:${body.type}`, {
      logger: this.logger,
      ...this.retry,
    });
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      throw new Error(`Unexpected ${body.type} response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
