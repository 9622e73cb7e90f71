import { DEFAULT_COIN_ID, DEFAULT_COINGECKO_BASE_URL, DEFAULT_HTTP_TIMEOUT_MS } from './constants';
import type { CoinGeckoClientConfig } from '../types/crypto';

export interface AppConfig {
  coinGecko: CoinGeckoClientConfig;
  coinId: string;
}

/**
 * Reads runtime settings from the environment. Callers load `.env` first
 * (the CLI entry points import `dotenv/config`).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    coinGecko: {
      baseUrl: env.COINGECKO_BASE_URL || DEFAULT_COINGECKO_BASE_URL,
      timeoutMs: DEFAULT_HTTP_TIMEOUT_MS,
    },
    coinId: env.COIN_ID || DEFAULT_COIN_ID,
  };
}
