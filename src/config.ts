import { z } from 'zod';

export const TRADINGVIEW_WEBHOOK_IPS = ['52.89.214.238', '34.212.75.30', '54.218.53.128', '52.32.178.7'];
export const DEFAULT_INTEGER_SIZE_ASSETS = ['XRP', 'DOGE', 'SHIB', 'FARTCOIN'];

export const HYPERLIQUID_MAINNET_URL = 'https://api.hyperliquid.xyz';
export const HYPERLIQUID_TESTNET_URL = 'https://api.hyperliquid-testnet.xyz';

const flag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === 'true');

const csv = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((v) =>
      v === undefined
        ? fallback
        : v
            .split(',')
            .map((s) => s.trim())
            .filter(Boolean),
    );

const configSchema = z.object({
  WEBHOOK_PASSWORD: z.string().optional(),
  HYPERLIQUID_PRIVATE_KEY: z
    .string({ required_error: 'HYPERLIQUID_PRIVATE_KEY is required' })
    .regex(/^(0x)?[0-9a-fA-F]{64}$/, 'HYPERLIQUID_PRIVATE_KEY must be a 32-byte hex string'),
  HYPERLIQUID_USE_MAINNET: flag('true'),
  HYPERLIQUID_API_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(80),
  LOG_LEVEL: z.string().default('info'),
  ENFORCE_SOURCE_IP: flag('true'),
  TRUST_PROXY: flag('false'),
  ALLOWED_SOURCE_IPS: csv(TRADINGVIEW_WEBHOOK_IPS),
  INTEGER_SIZE_ASSETS: csv(DEFAULT_INTEGER_SIZE_ASSETS),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  DRY_RUN: flag('false'),
});

export interface AppConfig {
  webhookPassword?: string;
  privateKey: string;
  isMainnet: boolean;
  apiUrl: string;
  port: number;
  logLevel: string;
  enforceSourceIp: boolean;
  trustProxy: boolean;
  allowedSourceIps: string[];
  integerSizeAssets: string[];
  requestTimeoutMs: number;
  dryRun: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  const key = cfg.HYPERLIQUID_PRIVATE_KEY;
  return {
    webhookPassword: cfg.WEBHOOK_PASSWORD ? cfg.WEBHOOK_PASSWORD : undefined,
    privateKey: key.startsWith('0x') ? key : `0x${key}`,
    isMainnet: cfg.HYPERLIQUID_USE_MAINNET,
    apiUrl: (
      cfg.HYPERLIQUID_API_URL ?? (cfg.HYPERLIQUID_USE_MAINNET ? HYPERLIQUID_MAINNET_URL : HYPERLIQUID_TESTNET_URL)
    ).replace(/\/+$/, ''),
    port: cfg.PORT,
    logLevel: cfg.LOG_LEVEL,
    enforceSourceIp: cfg.ENFORCE_SOURCE_IP,
    trustProxy: cfg.TRUST_PROXY,
    allowedSourceIps: cfg.ALLOWED_SOURCE_IPS,
    integerSizeAssets: cfg.INTEGER_SIZE_ASSETS.map((s) => s.toUpperCase()),
    requestTimeoutMs: cfg.REQUEST_TIMEOUT_MS,
    dryRun: cfg.DRY_RUN,
  };
}

/**
 * Summary safe to log on startup; secrets are reduced to presence flags.
 */
export function describeConfig(cfg: AppConfig): Record<string, unknown> {
  return {
    network: cfg.isMainnet ? 'mainnet' : 'testnet',
    apiUrl: cfg.apiUrl,
    port: cfg.port,
    webhookPasswordSet: Boolean(cfg.webhookPassword),
    enforceSourceIp: cfg.enforceSourceIp,
    trustProxy: cfg.trustProxy,
    allowedSourceIps: cfg.allowedSourceIps,
    integerSizeAssets: cfg.integerSizeAssets,
    requestTimeoutMs: cfg.requestTimeoutMs,
    dryRun: cfg.dryRun,
  };
}
