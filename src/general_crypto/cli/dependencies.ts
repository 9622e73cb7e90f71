import type { AppConfig } from '../../config/env';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { CoinGeckoClient } from '../fetcher/coingecko-client';

/** What a CLI run reads and talks to; the defaults are the real environment and API. */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createSource?: (config: AppConfig) => MarketDataSource;
  print?: (line: string) => void;
}

export const defaultSource = (config: AppConfig): MarketDataSource => new CoinGeckoClient(config.coinGecko);
