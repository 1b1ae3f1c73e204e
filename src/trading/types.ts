import type Decimal from 'decimal.js';

export type TradeAction = 'long' | 'short' | 'close';
export type Side = 'long' | 'short';

export interface TradeSignal {
  action: TradeAction;
  ticker: string;
  amountPercent: number;
}

export type SizeQuantization = { kind: 'integer' } | { kind: 'decimal'; places: number };

export interface AssetMetadata {
  symbol: string;
  index: number;
  maxLeverage: number;
  szDecimals: number;
}

export interface Position {
  asset: string;
  signedSize: Decimal; // positive long, negative short
}

export interface AccountState {
  address: string;
  withdrawable: Decimal;
  positions: Position[];
}

export type OrderStatus =
  | { kind: 'filled'; totalSz: string; avgPx: string; oid: number }
  | { kind: 'resting'; oid: number }
  | { kind: 'error'; message: string };

/** Exchange reply to a write, decoded at the adapter boundary. */
export type OrderResult =
  | { status: 'ok'; statuses: OrderStatus[]; raw: unknown }
  | { status: 'err'; message: string; raw: unknown };

export interface FillDetails {
  size: string;
  average_price: string;
  order_id: number;
}

export interface OpenDetails {
  asset: string;
  side: Side;
  size: string;
  leverage: number;
  usd_value: string;
}

export interface PositionItem {
  asset: string;
  size: string;
  side: Side;
}

export interface FailedPositionItem extends PositionItem {
  error: unknown;
}

export type EnvelopeStatus = 'success' | 'partial' | 'error';

export interface ResponseEnvelope {
  status: EnvelopeStatus;
  message: string;
  details?: OpenDetails;
  filled?: FillDetails;
  closed_positions?: PositionItem[];
  failed_positions?: FailedPositionItem[];
  error?: unknown;
}

export function sideOf(signedSize: Decimal): Side {
  return signedSize.gt(0) ? 'long' : 'short';
}
