import type { CoinSummary } from '../../types/crypto';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { TrendingAnalyzer, type TrendingAnalyzerOptions } from '../analysis/trending-analyzer';
import { formatRsi } from '../utils/technical-indicators';
import { writeTrendingCsv } from '../storage/csv-writer';
import { withDatabase } from '../storage/sqlite-manager';

export interface TrendingReportOptions {
  csvPath?: string;
  dbPath?: string;
  analyzer?: TrendingAnalyzerOptions;
}

export function formatSummaryLine(summary: CoinSummary): string {
  return `${summary.name ?? 'n/a'} (${summary.symbol ?? 'n/a'}) - RSI ${formatRsi(summary.rsi)} -> ${summary.signal}`;
}

/**
 * Prints an RSI signal line per trending coin as it is analyzed, then writes
 * all results to the requested sinks.
 */
export async function runTrendingReport(
  source: MarketDataSource,
  options: TrendingReportOptions = {},
  print: (line: string) => void = console.log
): Promise<CoinSummary[]> {
  const analyzer = new TrendingAnalyzer(source, options.analyzer);
  const results = await analyzer.analyzeTrending(summary => print(formatSummaryLine(summary)));

  if (options.csvPath) {
    writeTrendingCsv(results, options.csvPath);
    print(`Saved results to ${options.csvPath}`);
  }

  if (options.dbPath) {
    withDatabase(options.dbPath, storage => storage.replaceTrending(results));
    print(`Saved results to ${options.dbPath}`);
  }

  return results;
}
