export type TradeErrorKind = 'auth' | 'validation' | 'exchange' | 'partial';

export interface TradeError {
  kind: TradeErrorKind;
  message: string;
  // raw payload from the exchange or a structured breakdown (close-all)
  detail?: unknown;
}

export type Result<T, E = TradeError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(kind: TradeErrorKind, message: string, detail?: unknown): Result<never> {
  return { ok: false, error: detail === undefined ? { kind, message } : { kind, message, detail } };
}

export const validationError = (message: string, detail?: unknown): Result<never> =>
  fail('validation', message, detail);

export const exchangeError = (message: string, detail?: unknown): Result<never> =>
  fail('exchange', message, detail);

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
