import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { CoinSummary, DailySeries } from '../../types/crypto';
import { toUtcDate } from '../fetcher/data-fetcher';
import { roundRsi } from '../utils/technical-indicators';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SQLiteManager');

export interface PriceRow {
  date: string;
  price: number | null;
}

export interface TrendingRow {
  name: string | null;
  symbol: string | null;
  rsi: number | null;
  signal: string;
}

export class SQLiteManager {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.ensureDirectoryExists(path.dirname(dbPath));
    this.db = new Database(dbPath);
  }

  private ensureDirectoryExists(dir: string) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info(`Created directory: ${dir}`);
    }
  }

  /**
   * Replaces the contents of `prices` with the series. The table is created
   * if missing, cleared and refilled in a single transaction.
   */
  replacePrices(series: DailySeries) {
    const replaceAll = this.db.transaction((points: DailySeries) => {
      this.db.exec('CREATE TABLE IF NOT EXISTS prices (date TEXT, price REAL)');
      this.db.exec('DELETE FROM prices');
      const insert = this.db.prepare('INSERT INTO prices (date, price) VALUES (?, ?)');
      for (const point of points) {
        insert.run(toUtcDate(point.timestamp), point.price);
      }
    });

    replaceAll(series);
    logger.info(`Stored ${series.length} daily prices`);
  }

  /** Same replace semantics as `replacePrices`, for the `trending` table. */
  replaceTrending(results: readonly CoinSummary[]) {
    const replaceAll = this.db.transaction((rows: readonly CoinSummary[]) => {
      this.db.exec('CREATE TABLE IF NOT EXISTS trending (name TEXT, symbol TEXT, rsi REAL, signal TEXT)');
      this.db.exec('DELETE FROM trending');
      const insert = this.db.prepare('INSERT INTO trending (name, symbol, rsi, signal) VALUES (?, ?, ?, ?)');
      for (const row of rows) {
        insert.run(row.name, row.symbol, roundRsi(row.rsi), row.signal);
      }
    });

    replaceAll(results);
    logger.info(`Stored ${results.length} trending results`);
  }

  getPrices(): PriceRow[] {
    return this.db.prepare<[], PriceRow>('SELECT date, price FROM prices ORDER BY rowid').all();
  }

  getTrending(): TrendingRow[] {
    return this.db.prepare<[], TrendingRow>('SELECT name, symbol, rsi, signal FROM trending ORDER BY rowid').all();
  }

  close() {
    this.db.close();
  }
}

/** Opens the database, runs `fn` and closes the connection on every exit path. */
export function withDatabase<T>(dbPath: string, fn: (storage: SQLiteManager) => T): T {
  const storage = new SQLiteManager(dbPath);
  try {
    return fn(storage);
  } finally {
    storage.close();
  }
}
