import 'dotenv/config';
import { buildApp } from '../app';
import { loadConfig } from '../config';
import { logger } from '../logger';
import { DEFAULT_AMOUNT_PERCENT } from '../trading/dispatcher';

function getArg(name: string, fallback?: string): string | undefined {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

// Runs one signal through the dispatcher, skipping HTTP and authentication.
async function main(): Promise<void> {
  const action = getArg('--action');
  if (!action) {
    logger.warn('usage: sendSignal --action=long|short|close [--ticker=BTC] [--percent=5]');
    process.exitCode = 1;
    return;
  }
  const cfg = loadConfig();
  const { dispatcher } = buildApp(cfg);
  const envelope = await dispatcher.dispatch({
    action,
    ticker: getArg('--ticker', '') ?? '',
    amountPercent: Number(getArg('--percent', String(DEFAULT_AMOUNT_PERCENT))),
  });
  logger.info({ dryRun: cfg.dryRun, envelope }, 'signal processed');
  if (envelope.status === 'error') process.exitCode = 1;
}

main().catch((err) => {
  logger.error({ err }, 'sendSignal failed');
  process.exit(1);
});
