import { exchangeError, ok } from '../result';
import type { Result } from '../result';
import type { FillDetails, OrderResult } from './types';

export interface Submission {
  fill?: FillDetails;
}

/**
 * Success needs a top-level "ok" and no rejected order inside it. Fill
 * details are optional: an IOC order may report a fill or nothing at all.
 */
export function interpretOrderResult(result: OrderResult, failurePrefix: string): Result<Submission> {
  if (result.status === 'err') {
    return exchangeError(`${failurePrefix}: ${result.message}`, result.raw);
  }
  const rejected = result.statuses.find((s) => s.kind === 'error');
  if (rejected && rejected.kind === 'error') {
    return exchangeError(`${failurePrefix}: ${rejected.message}`, result.raw);
  }
  const filled = result.statuses.find((s) => s.kind === 'filled');
  if (filled && filled.kind === 'filled') {
    return ok({ fill: { size: filled.totalSz, average_price: filled.avgPx, order_id: filled.oid } });
  }
  return ok({});
}
