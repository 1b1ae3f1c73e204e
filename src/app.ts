import { createAuthenticator } from './auth';
import type { Authenticator } from './auth';
import type { AppConfig } from './config';
import { createDryRunClient } from './exchanges/dryRun';
import { HyperliquidClient } from './exchanges/hyperliquid';
import type { ExchangeClient } from './exchanges/types';
import { componentLogger, logger as baseLogger } from './logger';
import type { Logger } from './logger';
import { createDispatcher } from './trading/dispatcher';
import type { ActionDispatcher } from './trading/dispatcher';
import { PositionManager } from './trading/positionManager';
import { createWebhookHandler } from './webhook';
import type { WebhookHandler } from './webhook';

export interface App {
  exchange: ExchangeClient;
  manager: PositionManager;
  dispatcher: ActionDispatcher;
  authenticator: Authenticator;
  handler: WebhookHandler;
}

export interface AppOverrides {
  exchange?: ExchangeClient;
  logger?: Logger;
}

/** Wires the components from one config; nothing below reads the environment. */
export function buildApp(cfg: AppConfig, overrides: AppOverrides = {}): App {
  const root = overrides.logger ?? baseLogger;
  const live =
    overrides.exchange ??
    new HyperliquidClient(
      {
        privateKey: cfg.privateKey,
        apiUrl: cfg.apiUrl,
        isMainnet: cfg.isMainnet,
        requestTimeoutMs: cfg.requestTimeoutMs,
      },
      { logger: componentLogger('hyperliquid', root) },
    );
  const exchange = cfg.dryRun ? createDryRunClient(live, componentLogger('dry-run', root)) : live;
  const manager = new PositionManager(exchange, {
    integerAssets: cfg.integerSizeAssets,
    logger: componentLogger('position-manager', root),
  });
  const dispatcher = createDispatcher(manager, componentLogger('dispatcher', root));
  const authenticator = createAuthenticator(
    { webhookPassword: cfg.webhookPassword, allowedSourceIps: cfg.allowedSourceIps },
    componentLogger('auth', root),
  );
  const handler = createWebhookHandler({ authenticator, dispatcher, logger: componentLogger('webhook', root) });
  return { exchange, manager, dispatcher, authenticator, handler };
}
