import type { DailySeries, PricePoint, PriceSample } from '../../types/crypto';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { createLogger } from '../../utils/logger';

const logger = createLogger('DataFetcher');

/** UTC calendar date (YYYY-MM-DD) of a millisecond timestamp. */
export function toUtcDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Collapses raw samples to one point per UTC date. CoinGecko repeats the
 * current day, so when a date occurs more than once the sample seen last in
 * input order wins. Output is sorted by date regardless of input order.
 */
export function dedupeDailyPrices(samples: readonly PriceSample[]): DailySeries {
  const perDate = new Map<string, PricePoint>();
  for (const [timestamp, price] of samples) {
    perDate.set(toUtcDate(timestamp), {
      timestamp: Math.trunc(timestamp),
      price: typeof price === 'number' ? price : null,
    });
  }

  return Array.from(perDate.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, point]) => point);
}

export class DataFetcher {
  constructor(private readonly source: MarketDataSource) {}

  /**
   * Daily USD series for the last `days` days. Request failures propagate;
   * there are no partial results.
   */
  async fetchDailySeries(coinId: string, days: number): Promise<DailySeries> {
    const samples = await this.source.getMarketChart(coinId, days);
    const series = dedupeDailyPrices(samples);
    logger.info(`Fetched historical data for ${coinId}`, {
      days,
      samples: samples.length,
      dailyPoints: series.length
    });
    return series;
  }

  /**
   * Raw closing prices in the order received, without date deduplication.
   * Samples without a price are skipped.
   */
  async fetchClosingPrices(coinId: string, days: number): Promise<number[]> {
    const samples = await this.source.getMarketChart(coinId, days);
    return samples.flatMap(([, price]) => (typeof price === 'number' ? [price] : []));
  }
}
