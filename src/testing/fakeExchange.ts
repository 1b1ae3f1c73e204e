import Decimal from 'decimal.js';
import pino from 'pino';
import type { ExchangeClient } from '../exchanges/types';
import type { AccountState, AssetMetadata, OrderResult, Position } from '../trading/types';

export const silentLogger = pino({ level: 'silent' });

export const OK: OrderResult = { status: 'ok', statuses: [], raw: { status: 'ok' } };

export function filled(totalSz: string, avgPx: string, oid: number): OrderResult {
  const raw = { status: 'ok', response: { type: 'order', data: { statuses: [{ filled: { totalSz, avgPx, oid } }] } } };
  return { status: 'ok', statuses: [{ kind: 'filled', totalSz, avgPx, oid }], raw };
}

export function rejected(message: string): OrderResult {
  const raw = { status: 'ok', response: { type: 'order', data: { statuses: [{ error: message }] } } };
  return { status: 'ok', statuses: [{ kind: 'error', message }], raw };
}

export function asset(symbol: string, maxLeverage: number, szDecimals = 4, index = 0): AssetMetadata {
  return { symbol, index, maxLeverage, szDecimals };
}

export function position(assetName: string, signedSize: Decimal.Value): Position {
  return { asset: assetName, signedSize: new Decimal(signedSize) };
}

type Outcome = OrderResult | Error;

export interface FakeExchangeSetup {
  assets?: AssetMetadata[];
  prices?: Record<string, Decimal.Value>;
  positions?: Position[];
  /** Withdrawable balance per getAccountState call; the last value repeats. */
  balances?: Decimal.Value[];
  leverageResult?: Outcome;
  orderResult?: Outcome;
  closeResults?: Record<string, Outcome>;
}

/**
 * In-memory exchange. Records every call in order and removes a position
 * once its close succeeds, like the venue would.
 */
export class FakeExchange implements ExchangeClient {
  readonly name = 'fake';
  readonly address = '0x00000000000000000000000000000000000000aa';
  readonly calls: string[] = [];
  assets: AssetMetadata[];
  prices: Record<string, Decimal.Value>;
  positions: Position[];
  balances: Decimal.Value[];
  leverageResult: Outcome;
  orderResult: Outcome;
  closeResults: Record<string, Outcome>;
  private accountReads = 0;

  constructor(setup: FakeExchangeSetup = {}) {
    this.assets = setup.assets ?? [asset('BTC', 20, 5, 0)];
    this.prices = setup.prices ?? { BTC: 50000 };
    this.positions = setup.positions ?? [];
    this.balances = setup.balances ?? [1000];
    this.leverageResult = setup.leverageResult ?? OK;
    this.orderResult = setup.orderResult ?? OK;
    this.closeResults = setup.closeResults ?? {};
  }

  get writes(): string[] {
    return this.calls.filter((c) => !c.startsWith('read:'));
  }

  async getAccountState(address: string): Promise<AccountState> {
    const balance = this.balances[Math.min(this.accountReads, this.balances.length - 1)] ?? 0;
    this.accountReads += 1;
    this.calls.push(`read:account:${balance.toString()}`);
    return { address, withdrawable: new Decimal(balance), positions: [...this.positions] };
  }

  async getAssetMetadata(): Promise<AssetMetadata[]> {
    this.calls.push('read:meta');
    return this.assets;
  }

  async getMarketPrice(symbol: string): Promise<Decimal | undefined> {
    this.calls.push(`read:price:${symbol}`);
    const price = this.prices[symbol];
    return price === undefined ? undefined : new Decimal(price);
  }

  async setLeverage(symbol: string, leverage: number): Promise<OrderResult> {
    this.calls.push(`leverage:${symbol}:${leverage}`);
    return settle(this.leverageResult);
  }

  async submitMarketOrder(symbol: string, isBuy: boolean, size: Decimal, slippage: number): Promise<OrderResult> {
    this.calls.push(`order:${symbol}:${isBuy ? 'buy' : 'sell'}:${size.toFixed()}:${slippage}`);
    return settle(this.orderResult);
  }

  async submitMarketClose(symbol: string, slippage: number): Promise<OrderResult> {
    this.calls.push(`close:${symbol}:${slippage}`);
    const result = await settle(this.closeResults[symbol] ?? OK);
    if (result.status === 'ok' && !result.statuses.some((s) => s.kind === 'error')) {
      this.positions = this.positions.filter((p) => p.asset !== symbol);
    }
    return result;
  }
}

async function settle(outcome: Outcome): Promise<OrderResult> {
  if (outcome instanceof Error) throw outcome;
  return outcome;
}
