import type { CoinSummary, TrendingCoin } from '../../types/crypto';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { RSI_CONFIG, TRENDING_CONFIG } from '../../config/constants';
import { DataFetcher } from '../fetcher/data-fetcher';
import { CoinGeckoApiError } from '../fetcher/coingecko-client';
import { classifySignal, computeRsi } from '../utils/technical-indicators';
import { createLogger } from '../../utils/logger';

const logger = createLogger('TrendingAnalyzer');

/** First `limit` entries in source order; no reordering or filtering. */
export function selectTrending<T>(coins: readonly T[], limit: number = TRENDING_CONFIG.LIMIT): T[] {
  return coins.slice(0, Math.max(0, limit));
}

export interface TrendingAnalyzerOptions {
  historyDays?: number;
  rsiPeriod?: number;
  limit?: number;
}

export class TrendingAnalyzer {
  private readonly fetcher: DataFetcher;
  private readonly historyDays: number;
  private readonly rsiPeriod: number;
  private readonly limit: number;

  constructor(private readonly source: MarketDataSource, options: TrendingAnalyzerOptions = {}) {
    this.fetcher = new DataFetcher(source);
    this.historyDays = options.historyDays ?? TRENDING_CONFIG.HISTORY_DAYS;
    this.rsiPeriod = options.rsiPeriod ?? RSI_CONFIG.PERIOD;
    this.limit = options.limit ?? TRENDING_CONFIG.LIMIT;
  }

  /**
   * Closing prices for one coin. A failed request degrades to an empty list
   * so that one coin cannot abort the whole batch.
   */
  private async fetchPricesIsolated(coin: TrendingCoin): Promise<number[]> {
    if (!coin.id) {
      logger.warn('Trending entry has no coin id, skipping price history', { name: coin.name });
      return [];
    }
    try {
      return await this.fetcher.fetchClosingPrices(coin.id, this.historyDays);
    } catch (error) {
      if (error instanceof CoinGeckoApiError) {
        logger.warn(`Price history unavailable for ${coin.id}`, { error: error.message, status: error.status });
        return [];
      }
      throw error;
    }
  }

  async analyzeCoin(coin: TrendingCoin): Promise<CoinSummary> {
    const prices = await this.fetchPricesIsolated(coin);
    const rsi = computeRsi(prices, this.rsiPeriod);
    return {
      name: coin.name,
      symbol: coin.symbol,
      rsi,
      signal: classifySignal(rsi),
    };
  }

  /**
   * Analyzes the top trending coins one at a time, in ranking order.
   * Failing to fetch the trending list itself propagates.
   */
  async analyzeTrending(onCoinAnalyzed?: (summary: CoinSummary) => void): Promise<CoinSummary[]> {
    const coins = selectTrending(await this.source.getTrending(), this.limit);
    logger.info(`Analyzing ${coins.length} trending coins`);

    const results: CoinSummary[] = [];
    for (const coin of coins) {
      const summary = await this.analyzeCoin(coin);
      results.push(summary);
      onCoinAnalyzed?.(summary);
    }
    return results;
  }
}
