import type Decimal from 'decimal.js';
import { componentLogger } from '../logger';
import type { Logger } from '../logger';
import type { OrderResult } from '../trading/types';
import type { ExchangeClient } from './types';

function simulated(kind: string, params: Record<string, unknown>): OrderResult {
  return { status: 'ok', statuses: [], raw: { status: 'ok', simulated: true, kind, ...params } };
}

/**
 * Reads go to the wrapped client; writes are logged and answered with a
 * simulated "ok" carrying no fills.
 */
export function createDryRunClient(inner: ExchangeClient, logger: Logger = componentLogger('dry-run')): ExchangeClient {
  return {
    name: `${inner.name}:dry-run`,
    address: inner.address,
    getAccountState: (address) => inner.getAccountState(address),
    getAssetMetadata: () => inner.getAssetMetadata(),
    getMarketPrice: (symbol) => inner.getMarketPrice(symbol),
    async setLeverage(symbol: string, leverage: number) {
      logger.info({ symbol, leverage }, 'DRY_RUN update leverage');
      return simulated('updateLeverage', { symbol, leverage });
    },
    async submitMarketOrder(symbol: string, isBuy: boolean, size: Decimal, slippage: number) {
      logger.info({ symbol, isBuy, size: size.toString(), slippage }, 'DRY_RUN market order');
      return simulated('order', { symbol, isBuy, size: size.toString(), slippage });
    },
    async submitMarketClose(symbol: string, slippage: number) {
      logger.info({ symbol, slippage }, 'DRY_RUN market close');
      return simulated('close', { symbol, slippage });
    },
  };
}
