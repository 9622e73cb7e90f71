import yargs from 'yargs';
import { loadConfig } from '../../config/env';
import { runTrendingReport } from '../reports/trending-report';
import { createLogger } from '../../utils/logger';
import { defaultSource, type CliDependencies } from './dependencies';

const logger = createLogger('TrendingRsi');

export function buildTrendingRsiCli(args: string[], deps: CliDependencies = {}) {
  const createSource = deps.createSource ?? defaultSource;

  return yargs(args)
    .scriptName('trending-rsi')
    .command(
      '$0',
      'Fetch trending cryptocurrencies from CoinGecko and rate them by RSI',
      (yargs) => {
        return yargs
          .option('csv', {
            type: 'string',
            describe: 'Path to CSV file to store the results',
          })
          .option('db', {
            type: 'string',
            describe: 'Path to SQLite database to store the results',
          });
      },
      async (argv) => {
        await runTrendingReport(createSource(loadConfig(deps.env)), {
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

export async function runTrendingRsiCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  try {
    await buildTrendingRsiCli(args, deps).parseAsync();
    return 0;
  } catch (error) {
    logger.error('Trending analysis failed', { error: error instanceof Error ? error.message : String(error) });
    return 1;
  }
}
