import 'dotenv/config';
import { buildApp } from './app';
import { describeConfig, loadConfig } from './config';
import { logger } from './logger';
import { createWebhookServer, listen } from './server';

async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.level = cfg.logLevel;
  logger.info(describeConfig(cfg), 'perp-signal-relay starting');
  if (!cfg.webhookPassword) {
    logger.warn('WEBHOOK_PASSWORD is not set; every webhook will be rejected');
  }

  const app = buildApp(cfg);
  logger.info({ exchange: app.exchange.name, address: app.exchange.address }, 'exchange client ready');

  const server = createWebhookServer({
    handler: app.handler,
    enforceSourceIp: cfg.enforceSourceIp,
    trustProxy: cfg.trustProxy,
    logger: logger.child({ component: 'server' }),
  });
  const port = await listen(server, cfg.port);
  logger.info({ port }, 'webhook server listening; point TradingView alerts at POST /webhook');

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
