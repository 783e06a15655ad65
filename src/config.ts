import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from './types.js';
import { ConfigError } from './errors.js';

// Load environment variables
loadEnv();

// Validation schema
const envSchema = z.object({
  NEAR_RPC_URL: z.string().url().default('https://rpc.mainnet.near.org'),
  NEAR_RPC_FALLBACK_URLS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((url) => url.trim())
        .filter((url) => url.length > 0)
    )
    .pipe(z.array(z.string().url())),
  NEARBLOCKS_API_URL: z.string().url().default('https://api.nearblocks.io'),
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WATCHLIST_FILE: z.string().min(1).default('monitored_accounts.json'),
  SUBSCRIBERS_FILE: z.string().min(1).default('users.json'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_PRETTY: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env files count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const envResult = envSchema.safeParse(present);

  if (!envResult.success) {
    const errors = envResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Environment validation failed:\n${errors.join('\n')}`);
  }

  const parsed = envResult.data;

  return {
    rpcUrl: parsed.NEAR_RPC_URL,
    rpcFallbackUrls: parsed.NEAR_RPC_FALLBACK_URLS,
    nearBlocksApiUrl: parsed.NEARBLOCKS_API_URL,
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
    pollIntervalMs: parsed.POLL_INTERVAL_SECONDS * 1000,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    watchlistFile: parsed.WATCHLIST_FILE,
    subscribersFile: parsed.SUBSCRIBERS_FILE,
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
  };
}

export interface ConfigOptions {
  pollIntervalSeconds?: number;
}

/**
 * Load config with optional CLI overrides
 */
export function initConfig(options?: ConfigOptions): AppConfig {
  const baseConfig = loadConfig();

  let pollIntervalMs = baseConfig.pollIntervalMs;

  if (options?.pollIntervalSeconds !== undefined) {
    if (!Number.isInteger(options.pollIntervalSeconds) || options.pollIntervalSeconds <= 0) {
      throw new ConfigError(
        `Poll interval must be a positive whole number of seconds, got ${options.pollIntervalSeconds}`
      );
    }
    pollIntervalMs = options.pollIntervalSeconds * 1000;
  }

  return {
    ...baseConfig,
    pollIntervalMs,
  };
}

// Defaults plus environment, read once for the logger
export const config = loadConfig();
