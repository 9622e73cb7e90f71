import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import type { CoinSummary, DailySeries } from '../../types/crypto';
import { toUtcDate } from '../fetcher/data-fetcher';
import { roundRsi } from '../utils/technical-indicators';
import { createLogger } from '../../utils/logger';

const logger = createLogger('CsvWriter');

export const PRICE_HISTORY_HEADERS = ['date', 'price_usd'];
export const TRENDING_HEADERS = ['name', 'symbol', 'rsi', 'signal'];

type CsvCell = string | number | null;

function writeCsv(filePath: string, fields: string[], data: CsvCell[][]): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  // Header goes in as the first row; Papa leaves null cells blank
  const csv = Papa.unparse([fields, ...data], { newline: '\n' });
  fs.writeFileSync(filePath, `${csv}\n`, 'utf-8');
  logger.info(`Wrote ${data.length} rows to ${filePath}`);
}

/** Replaces `filePath` with a `date,price_usd` table of the series. */
export function writePriceHistoryCsv(series: DailySeries, filePath: string): void {
  writeCsv(
    filePath,
    PRICE_HISTORY_HEADERS,
    series.map(point => [toUtcDate(point.timestamp), point.price])
  );
}

/** Replaces `filePath` with one row per coin; RSI is blank when unavailable. */
export function writeTrendingCsv(results: readonly CoinSummary[], filePath: string): void {
  writeCsv(
    filePath,
    TRENDING_HEADERS,
    results.map(r => [r.name, r.symbol, roundRsi(r.rsi), r.signal])
  );
}
