import { z } from 'zod';
import type { Authenticator } from './auth';
import { componentLogger } from './logger';
import type { Logger } from './logger';
import { DEFAULT_AMOUNT_PERCENT, errorEnvelope } from './trading/dispatcher';
import type { ActionDispatcher } from './trading/dispatcher';
import type { ResponseEnvelope } from './trading/types';

export interface WebhookRequest {
  /** Raw JSON text, or an already-decoded object when the transport parsed it. */
  body: string | object;
  /** Caller address, only when the transport wants it checked. */
  sourceAddress?: string;
}

export interface WebhookResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export type WebhookHandler = (request: WebhookRequest) => Promise<WebhookResponse>;

export interface WebhookHandlerDeps {
  authenticator: Authenticator;
  dispatcher: ActionDispatcher;
  logger?: Logger;
}

const signalSchema = z.object({
  action: z.string({ required_error: 'action is required', invalid_type_error: 'action must be a string' }),
  ticker: z.string({ invalid_type_error: 'ticker must be a string' }).default(''),
  amountPercent: z.coerce
    .number({ invalid_type_error: 'amountPercent must be a number' })
    .finite()
    .default(DEFAULT_AMOUNT_PERCENT),
});

export function jsonResponse(statusCode: number, payload: unknown): WebhookResponse {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  };
}

export function statusCodeFor(envelope: ResponseEnvelope): number {
  return envelope.status === 'error' ? 400 : 200;
}

function decodeBody(body: string | object): Record<string, unknown> | undefined {
  let value: unknown = body;
  if (typeof body === 'string') {
    try {
      value = JSON.parse(body);
    } catch {
      return undefined;
    }
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

export function createWebhookHandler(deps: WebhookHandlerDeps): WebhookHandler {
  const logger = deps.logger ?? componentLogger('webhook');
  return async ({ body, sourceAddress }) => {
    const decoded = decodeBody(body);
    if (!decoded) {
      logger.error('failed to parse request body as JSON');
      return jsonResponse(400, { status: 'error', message: 'Invalid JSON in request body' });
    }

    if (!deps.authenticator.authenticate(decoded, sourceAddress)) {
      return jsonResponse(403, errorEnvelope({ kind: 'auth', message: 'Unauthorized' }));
    }

    const parsed = signalSchema.safeParse(decoded);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => i.message).join('; ');
      logger.error({ issues: parsed.error.issues }, 'invalid signal payload');
      return jsonResponse(400, errorEnvelope({ kind: 'validation', message: `Invalid signal: ${message}` }));
    }

    const envelope = await deps.dispatcher.dispatch(parsed.data);
    logger.info({ status: envelope.status, message: envelope.message }, 'signal handled');
    return jsonResponse(statusCodeFor(envelope), envelope);
  };
}
