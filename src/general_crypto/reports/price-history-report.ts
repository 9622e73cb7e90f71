import type { DailySeries } from '../../types/crypto';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { DataFetcher, toUtcDate } from '../fetcher/data-fetcher';
import { writePriceHistoryCsv } from '../storage/csv-writer';
import { withDatabase } from '../storage/sqlite-manager';
import { createLogger } from '../../utils/logger';

const logger = createLogger('PriceHistoryReport');

export interface PriceHistoryOptions {
  coinId: string;
  days: number;
  csvPath?: string;
  dbPath?: string;
}

const display = (value: string | number | null): string => (value === null ? 'n/a' : String(value));

/**
 * Prints the coin's current price, fetches its daily history and writes it to
 * the requested sinks. Any request failure propagates to the caller.
 */
export async function runPriceHistory(
  source: MarketDataSource,
  options: PriceHistoryOptions,
  print: (line: string) => void = console.log
): Promise<DailySeries> {
  logger.info(`Starting price history for ${options.coinId}`, { days: options.days });

  print('Fetching coin details...');
  const details = await source.getCoinDetails(options.coinId);
  print(`${display(details.name)} (${display(details.symbol)}) current price: ${display(details.currentPriceUsd)} USD`);

  print('Fetching historical prices...');
  const series = await new DataFetcher(source).fetchDailySeries(options.coinId, options.days);
  print(`Fetched ${series.length} daily prices`);
  if (series.length > 0) {
    const first = toUtcDate(series[0].timestamp);
    const last = toUtcDate(series[series.length - 1].timestamp);
    print(`Range: ${first} to ${last}`);
  }

  if (options.csvPath) {
    writePriceHistoryCsv(series, options.csvPath);
    print(`Saved CSV to ${options.csvPath}`);
  }

  if (options.dbPath) {
    withDatabase(options.dbPath, storage => storage.replacePrices(series));
    print(`Saved DB to ${options.dbPath}`);
  }

  return series;
}
