#!/usr/bin/env node
// Fetches a coin's daily USD price history and optionally saves it to CSV and/or SQLite

import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { runPriceHistoryCli } from '../cli/price-history-cli';

void runPriceHistoryCli(hideBin(process.argv)).then((exitCode) => {
  process.exitCode = exitCode;
});
