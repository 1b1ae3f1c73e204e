import 'dotenv/config';
import { z } from 'zod';
import { buildApp } from './app';
import type { App } from './app';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { logger } from './logger';
import type { WebhookResponse } from './webhook';

// The subset of an API Gateway proxy event this entry point reads.
const proxyEventSchema = z.object({
  body: z.string().nullable(),
  isBase64Encoded: z.boolean().optional(),
  requestContext: z
    .object({
      identity: z.object({ sourceIp: z.string().optional() }).optional(),
    })
    .optional(),
});

export type ProxyEvent = z.infer<typeof proxyEventSchema>;

export interface Runtime {
  cfg: AppConfig;
  app: App;
}

let runtime: Runtime | null = null;

// Built once per warm container.
function getRuntime(): Runtime {
  if (!runtime) {
    const cfg = loadConfig();
    logger.level = cfg.logLevel;
    runtime = { cfg, app: buildApp(cfg) };
  }
  return runtime;
}

/** Swap in prebuilt components, e.g. from tests. Pass null to reset. */
export function setRuntime(next: Runtime | null): void {
  runtime = next;
}

function rawBodyOf(event: ProxyEvent): string {
  const body = event.body ?? '';
  return event.isBase64Encoded ? Buffer.from(body, 'base64').toString('utf8') : body;
}

export async function handler(event: unknown): Promise<WebhookResponse> {
  const { cfg, app } = getRuntime();
  const parsed = proxyEventSchema.safeParse(event);
  if (!parsed.success) {
    // Direct invocation: the event is the signal itself.
    return app.handler({ body: typeof event === 'object' && event !== null ? event : '' });
  }
  const proxy = parsed.data;
  const sourceAddress = cfg.enforceSourceIp ? proxy.requestContext?.identity?.sourceIp : undefined;
  if (cfg.enforceSourceIp && proxy.requestContext && !sourceAddress) {
    logger.warn('source IP missing from request context; skipping address check');
  }
  return app.handler({ body: rawBodyOf(proxy), sourceAddress });
}
