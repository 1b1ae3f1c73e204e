import type Decimal from 'decimal.js';
import type { ExchangeClient } from '../exchanges/types';
import { componentLogger } from '../logger';
import type { Logger } from '../logger';
import { errorMessage, ok, validationError } from '../result';
import type { Result, TradeError } from '../result';
import { interpretOrderResult } from './orderResult';
import { computeSize, quantizationFor } from './sizer';
import { sideOf } from './types';
import type { AssetMetadata, FailedPositionItem, FillDetails, OpenDetails, Position, PositionItem, Side } from './types';

export const DEFAULT_SLIPPAGE = 0.01;

export const NO_BALANCE = 'Insufficient balance: no USDC available for trading';

export interface PositionManagerOptions {
  integerAssets: readonly string[];
  slippage?: number;
  logger?: Logger;
}

export interface OpenOutcome {
  message: string;
  details: OpenDetails;
  fill?: FillDetails;
}

/** A failed open; `closed` is set when an opposite position was already closed on the way. */
export interface OpenFailure extends TradeError {
  closed?: PositionItem;
}

export interface CloseAllReport {
  message: string;
  closed: PositionItem[];
  failed: FailedPositionItem[];
}

export interface CloseAllFailure extends TradeError {
  kind: 'partial' | 'exchange';
  report: CloseAllReport;
}

function bySymbol<T>(items: T[], symbol: string, key: (item: T) => string): T | undefined {
  return items.find((i) => key(i) === symbol) ?? items.find((i) => key(i).toUpperCase() === symbol.toUpperCase());
}

function toItem(p: Position): PositionItem {
  return { asset: p.asset, size: p.signedSize.abs().toFixed(), side: sideOf(p.signedSize) };
}

/**
 * Runs one trading action against live exchange state: resolve, optionally
 * flip an opposite position, size, submit, interpret. Account and market
 * state are fetched per call and never kept between calls.
 */
export class PositionManager {
  private readonly logger: Logger;
  private readonly integerAssets: readonly string[];
  private readonly slippage: number;

  constructor(
    private readonly exchange: ExchangeClient,
    opts: PositionManagerOptions,
  ) {
    this.integerAssets = opts.integerAssets;
    this.slippage = opts.slippage ?? DEFAULT_SLIPPAGE;
    this.logger = opts.logger ?? componentLogger('position-manager');
  }

  async openPosition(ticker: string, side: Side, percent: number): Promise<Result<OpenOutcome, OpenFailure>> {
    if (!Number.isInteger(percent) || percent < 1 || percent > 100) {
      return validationError(`Percentage must be between 1 and 100, got ${percent}`);
    }

    const asset = await this.resolveAsset(ticker);
    if (!asset) return validationError(`Asset ${ticker.trim().toUpperCase()} not found`);
    const symbol = asset.symbol;

    const account = await this.exchange.getAccountState(this.exchange.address);
    if (account.withdrawable.lte(0)) return validationError(NO_BALANCE);

    const price = await this.exchange.getMarketPrice(symbol);
    if (!price) return validationError(`Could not get current price for ${symbol}`);
    if (price.lte(0)) return validationError(`Invalid price (0 or negative) for ${symbol}`);

    const leverage = asset.maxLeverage;
    await this.updateLeverage(symbol, leverage);

    const existing = bySymbol(account.positions, symbol, (p) => p.asset);
    if (!existing || sideOf(existing.signedSize) === side) {
      return this.placeOpen(asset, side, percent, price, account.withdrawable);
    }

    this.logger.info(
      { asset: symbol, size: existing.signedSize.toFixed() },
      'existing position in opposite direction; closing it first',
    );
    const closed = await this.closePosition(symbol);
    if (!closed.ok) {
      this.logger.error({ asset: symbol, error: closed.error.message }, 'failed to close opposite position');
      return closed;
    }

    // The close went through; whatever fails from here is partial.
    const flipped = toItem(existing);
    try {
      const refreshed = await this.exchange.getAccountState(this.exchange.address);
      if (refreshed.withdrawable.lte(0)) {
        const message = `${NO_BALANCE} after closing opposite position`;
        return this.flipFailure(flipped, side, { kind: 'validation', message });
      }
      const opened = await this.placeOpen(asset, side, percent, price, refreshed.withdrawable);
      return opened.ok ? opened : this.flipFailure(flipped, side, opened.error);
    } catch (err) {
      return this.flipFailure(flipped, side, { kind: 'exchange', message: errorMessage(err) });
    }
  }

  private async placeOpen(
    asset: AssetMetadata,
    side: Side,
    percent: number,
    price: Decimal,
    withdrawable: Decimal,
  ): Promise<Result<OpenOutcome>> {
    const symbol = asset.symbol;
    const leverage = asset.maxLeverage;
    const sized = computeSize({
      withdrawable,
      percent,
      maxLeverage: leverage,
      price,
      quantization: quantizationFor(asset, this.integerAssets),
    });
    if (!sized.ok) {
      this.logger.error({ asset: symbol, percent, withdrawable: withdrawable.toFixed() }, sized.error.message);
      return sized;
    }
    const size = sized.value;

    this.logger.info({ asset: symbol, side, size: size.toFixed(), leverage }, 'placing market order');
    const result = await this.exchange.submitMarketOrder(symbol, side === 'long', size, this.slippage);
    const submitted = interpretOrderResult(result, 'Failed to open position');
    if (!submitted.ok) {
      this.logger.error({ asset: symbol, error: submitted.error.message }, 'order rejected');
      return submitted;
    }

    return ok({
      message: `Successfully opened ${side} position for ${symbol}`,
      details: { asset: symbol, side, size: size.toFixed(), leverage, usd_value: notional(size, price) },
      fill: submitted.value.fill,
    });
  }

  private flipFailure(closed: PositionItem, side: Side, cause: TradeError): Result<never, OpenFailure> {
    const message = `Closed ${closed.asset} ${closed.side}; failed to open ${side}: ${cause.message}`;
    this.logger.error({ asset: closed.asset, side, error: cause.message }, 'opposite position closed but open failed');
    const error: OpenFailure = { kind: 'partial', message, closed };
    if (cause.detail !== undefined) error.detail = cause.detail;
    return { ok: false, error };
  }

  async closePosition(asset: string): Promise<Result<string>> {
    const account = await this.exchange.getAccountState(this.exchange.address);
    const position = bySymbol(account.positions, asset, (p) => p.asset);
    if (!position) {
      this.logger.info({ asset }, 'no open position to close');
      return ok(`No open position found for ${asset} to close`);
    }
    const result = await this.exchange.submitMarketClose(position.asset, this.slippage);
    const closed = interpretOrderResult(result, `Failed to close ${position.asset} position`);
    if (!closed.ok) return closed;
    this.logger.info({ asset: position.asset }, 'closed position');
    return ok(`Successfully closed ${position.asset} position`);
  }

  async closeAllPositions(): Promise<Result<CloseAllReport, CloseAllFailure>> {
    const account = await this.exchange.getAccountState(this.exchange.address);
    if (account.positions.length === 0) {
      this.logger.info('no open positions to close');
      return ok({ message: 'No open positions to close', closed: [], failed: [] });
    }

    this.logger.info({ count: account.positions.length }, 'closing all positions');
    const outcomes = await Promise.all(account.positions.map((p) => this.closeOne(p)));

    const closed: PositionItem[] = [];
    const failed: FailedPositionItem[] = [];
    for (const o of outcomes) {
      if (o.failure === undefined) closed.push(o.item);
      else failed.push({ ...o.item, error: o.failure });
    }

    let message = `Closed ${closed.length} positions`;
    if (failed.length > 0) message += `, ${failed.length} failed`;
    const report: CloseAllReport = { message, closed, failed };

    if (failed.length === 0) return ok(report);
    const kind = closed.length > 0 ? 'partial' : 'exchange';
    return { ok: false, error: { kind, message, report } };
  }

  private async closeOne(p: Position): Promise<{ item: PositionItem; failure?: unknown }> {
    const item = toItem(p);
    try {
      const result = await this.exchange.submitMarketClose(p.asset, this.slippage);
      const closed = interpretOrderResult(result, `Failed to close ${p.asset} position`);
      if (closed.ok) return { item };
      this.logger.error({ asset: p.asset, error: closed.error.message }, 'close failed');
      return { item, failure: closed.error.detail ?? closed.error.message };
    } catch (err) {
      this.logger.error({ err, asset: p.asset }, 'close request failed');
      return { item, failure: errorMessage(err) };
    }
  }

  private async resolveAsset(ticker: string): Promise<AssetMetadata | undefined> {
    const assets = await this.exchange.getAssetMetadata();
    return bySymbol(assets, ticker.trim(), (a) => a.symbol);
  }

  // Leverage is best effort: sizing uses the asset maximum either way.
  private async updateLeverage(symbol: string, leverage: number): Promise<void> {
    try {
      const result = await this.exchange.setLeverage(symbol, leverage);
      const applied = interpretOrderResult(result, 'Leverage update failed');
      if (applied.ok) {
        this.logger.debug({ asset: symbol, leverage }, 'leverage set');
      } else {
        this.logger.warn({ asset: symbol, leverage, response: applied.error.detail }, 'leverage setting may have failed');
      }
    } catch (err) {
      this.logger.warn({ err, asset: symbol, leverage }, 'leverage setting may have failed');
    }
  }
}

function notional(size: Decimal, price: Decimal): string {
  return size.times(price).toFixed();
}
