import yargs from 'yargs';
import { loadConfig } from '../../config/env';
import { DEFAULT_HISTORY_DAYS } from '../../config/constants';
import { runPriceHistory } from '../reports/price-history-report';
import { createLogger } from '../../utils/logger';
import { defaultSource, type CliDependencies } from './dependencies';

const logger = createLogger('PriceHistory');

export function buildPriceHistoryCli(args: string[], deps: CliDependencies = {}) {
  const config = loadConfig(deps.env);
  const createSource = deps.createSource ?? defaultSource;

  return yargs(args)
    .scriptName('price-history')
    .command(
      '$0',
      'Fetch daily price history for a coin from CoinGecko',
      (yargs) => {
        return yargs
          .option('csv', {
            type: 'string',
            describe: 'Path to CSV file to store price history',
          })
          .option('db', {
            type: 'string',
            describe: 'Path to SQLite DB to store price history',
          })
          .option('days', {
            alias: 'd',
            type: 'number',
            describe: `Number of days of historical data to fetch (default: ${DEFAULT_HISTORY_DAYS})`,
            default: DEFAULT_HISTORY_DAYS,
          })
          .option('coin', {
            type: 'string',
            describe: 'CoinGecko coin id',
            default: config.coinId,
          })
          .check((argv) => {
            if (!Number.isInteger(argv.days) || argv.days < 1) {
              return '--days must be a positive integer';
            }
            return true;
          })
          .example('npm run price-history -- --csv prices.csv', 'Save the last 365 days to prices.csv')
          .example('npm run price-history -- --days 30 --db prices.db', 'Save the last 30 days to a SQLite table');
      },
      async (argv) => {
        await runPriceHistory(createSource(config), {
          coinId: argv.coin,
          days: argv.days,
          csvPath: argv.csv,
          dbPath: argv.db,
        }, deps.print);
      }
    )
    .strict()
    .fail(false)
    .exitProcess(false)
    .help()
    .alias('help', 'h');
}

/** Parses `args`, runs the tool and resolves to the process exit code. */
export async function runPriceHistoryCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  try {
    await buildPriceHistoryCli(args, deps).parseAsync();
    return 0;
  } catch (error) {
    logger.error('Price history run failed', { error: error instanceof Error ? error.message : String(error) });
    return 1;
  }
}
