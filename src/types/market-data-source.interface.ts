import type { CoinDetails, PriceSample, TrendingCoin } from './crypto';

/**
 * Market Data Source Interface
 *
 * What the price-history and trending reports need from a market data API.
 * CoinGeckoClient is the production implementation; tests provide in-memory ones.
 */
export interface MarketDataSource {
  /**
   * Look up name, symbol and current USD price of a coin.
   */
  getCoinDetails(coinId: string): Promise<CoinDetails>;

  /**
   * Fetch raw daily USD price samples for the last `days` days.
   * Samples are returned as received, duplicates and ordering included.
   */
  getMarketChart(coinId: string, days: number): Promise<PriceSample[]>;

  /**
   * Fetch the trending coins list in the order the API ranks it.
   */
  getTrending(): Promise<TrendingCoin[]>;
}
