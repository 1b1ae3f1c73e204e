import 'dotenv/config';
import { buildApp } from '../app';
import { loadConfig } from '../config';
import { logger } from '../logger';

async function main(): Promise<void> {
  const cfg = loadConfig();
  const { exchange } = buildApp(cfg);
  const account = await exchange.getAccountState(exchange.address);
  const price = await exchange.getMarketPrice('BTC');
  logger.info(
    {
      network: cfg.isMainnet ? 'mainnet' : 'testnet',
      address: account.address,
      withdrawable: account.withdrawable.toFixed(),
      positions: account.positions.map((p) => ({ asset: p.asset, size: p.signedSize.toFixed() })),
      btcMid: price?.toFixed(),
    },
    'exchange reachable',
  );
}

main().catch((err) => {
  logger.error({ err }, 'exchange ping failed');
  process.exit(1);
});
