import type Decimal from 'decimal.js';
import type { AccountState, AssetMetadata, OrderResult } from '../trading/types';

/**
 * Venue operations the position manager depends on. Implementations decode
 * replies into domain types and throw only on transport failures.
 */
export interface ExchangeClient {
  readonly name: string;
  /** Account the client signs for. */
  readonly address: string;
  getAccountState(address: string): Promise<AccountState>;
  getAssetMetadata(): Promise<AssetMetadata[]>;
  /** Mid price, or undefined when the venue does not quote the symbol. */
  getMarketPrice(symbol: string): Promise<Decimal | undefined>;
  setLeverage(symbol: string, leverage: number): Promise<OrderResult>;
  submitMarketOrder(symbol: string, isBuy: boolean, size: Decimal, slippage: number): Promise<OrderResult>;
  submitMarketClose(symbol: string, slippage: number): Promise<OrderResult>;
}
