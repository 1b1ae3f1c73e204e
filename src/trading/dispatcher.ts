import { componentLogger } from '../logger';
import type { Logger } from '../logger';
import { errorMessage } from '../result';
import type { TradeError } from '../result';
import type { PositionManager } from './positionManager';
import type { ResponseEnvelope, TradeSignal } from './types';

export const DEFAULT_AMOUNT_PERCENT = 5;

export interface DispatchRequest {
  action: string;
  ticker: string;
  amountPercent: number;
}

export interface ActionDispatcher {
  dispatch(request: DispatchRequest): Promise<ResponseEnvelope>;
}

export function errorEnvelope(error: TradeError): ResponseEnvelope {
  const envelope: ResponseEnvelope = { status: 'error', message: error.message };
  if (error.detail !== undefined) envelope.error = error.detail;
  return envelope;
}

function toSignal(request: DispatchRequest): TradeSignal | TradeError {
  const action = request.action.trim().toLowerCase();
  if (action !== 'long' && action !== 'short' && action !== 'close') {
    return { kind: 'validation', message: `Unknown action: ${action}` };
  }
  const ticker = request.ticker.trim();
  if (action !== 'close' && ticker === '') {
    return { kind: 'validation', message: `Ticker is required for ${action}` };
  }
  return { action, ticker, amountPercent: request.amountPercent };
}

async function run(manager: PositionManager, signal: TradeSignal): Promise<ResponseEnvelope> {
  if (signal.action === 'close') {
    const result = await manager.closeAllPositions();
    if (result.ok) {
      return {
        status: 'success',
        message: result.value.message,
        closed_positions: result.value.closed,
        failed_positions: result.value.failed,
      };
    }
    const { kind, message, report } = result.error;
    return {
      status: kind === 'partial' ? 'partial' : 'error',
      message,
      closed_positions: report.closed,
      failed_positions: report.failed,
    };
  }

  const result = await manager.openPosition(signal.ticker, signal.action, signal.amountPercent);
  if (!result.ok) {
    const envelope = errorEnvelope(result.error);
    if (result.error.closed) {
      // an opposite position was closed before the open failed
      envelope.status = 'partial';
      envelope.closed_positions = [result.error.closed];
    }
    return envelope;
  }
  const envelope: ResponseEnvelope = {
    status: 'success',
    message: result.value.message,
    details: result.value.details,
  };
  if (result.value.fill) envelope.filled = result.value.fill;
  return envelope;
}

export function createDispatcher(manager: PositionManager, logger: Logger = componentLogger('dispatcher')): ActionDispatcher {
  return {
    async dispatch(request) {
      const signal = toSignal(request);
      if ('kind' in signal) {
        logger.error({ action: request.action }, signal.message);
        return errorEnvelope(signal);
      }
      logger.info(
        { action: signal.action, ticker: signal.ticker, amountPercent: signal.amountPercent },
        'processing signal',
      );
      try {
        return await run(manager, signal);
      } catch (err) {
        // transport faults from the exchange client end up here
        logger.error({ err, action: signal.action }, 'signal processing failed');
        return errorEnvelope({ kind: 'exchange', message: `Error processing ${signal.action}: ${errorMessage(err)}` });
      }
    },
  };
}
