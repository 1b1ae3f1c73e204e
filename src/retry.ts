// Retry with exponential backoff, for idempotent reads only
import { componentLogger } from './logger';
import type { Logger } from './logger';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  logger?: Logger;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
  jitterMs: 100,
};

export function sleep(ms: number, jitterMs = 0): Promise<void> {
  const jitter = jitterMs > 0 ? Math.random() * jitterMs : 0;
  return new Promise((resolve) => setTimeout(resolve, ms + jitter));
}

export function calculateBackoff(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, label: string, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = opts.logger ?? componentLogger('retry');
  let lastError: Error = new Error(`${label}: no attempts made`);

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < opts.maxRetries) {
        const delay = calculateBackoff(attempt, opts);
        logger.warn(
          { label, attempt: attempt + 1, maxRetries: opts.maxRetries, delayMs: delay, error: lastError.message },
          'retrying after error',
        );
        await sleep(delay, opts.jitterMs);
      }
    }
  }

  logger.error({ label, maxRetries: opts.maxRetries, error: lastError.message }, 'all retries exhausted');
  throw lastError;
}
