import Decimal from 'decimal.js';
import { ok, validationError } from '../result';
import type { Result } from '../result';
import type { AssetMetadata, SizeQuantization } from './types';

export const MAX_SIZE_DECIMALS = 4;

export const SIZE_TOO_SMALL = 'Calculated position size too small. Try increasing the percentage.';

export interface SizeInput {
  withdrawable: Decimal;
  percent: number;
  maxLeverage: number;
  price: Decimal;
  quantization: SizeQuantization;
}

/**
 * Whole-unit assets come from static configuration; everything else trades
 * in at most four decimals, fewer when the venue's lot size is coarser.
 */
export function quantizationFor(asset: AssetMetadata, integerAssets: readonly string[]): SizeQuantization {
  if (integerAssets.includes(asset.symbol.toUpperCase())) return { kind: 'integer' };
  return { kind: 'decimal', places: Math.min(MAX_SIZE_DECIMALS, asset.szDecimals) };
}

export function quantize(raw: Decimal, q: SizeQuantization): Decimal {
  if (q.kind === 'integer') return raw.toDecimalPlaces(0, Decimal.ROUND_DOWN);
  return raw.toDecimalPlaces(q.places, Decimal.ROUND_HALF_EVEN);
}

export function usdAmount(withdrawable: Decimal, percent: number): Decimal {
  return withdrawable.times(percent).dividedBy(100);
}

export function computeSize(input: SizeInput): Result<Decimal> {
  const { withdrawable, percent, maxLeverage, price, quantization } = input;
  if (!price.isFinite() || price.lte(0)) {
    return validationError(`Invalid price (0 or negative): ${price.toString()}`);
  }
  if (!withdrawable.isFinite() || withdrawable.lte(0)) {
    return validationError('Insufficient balance: no USDC available for trading');
  }
  const raw = usdAmount(withdrawable, percent).times(maxLeverage).dividedBy(price);
  const size = quantize(raw, quantization);
  if (size.lte(0)) return validationError(SIZE_TOO_SMALL, { rawSize: raw.toString() });
  return ok(size);
}
