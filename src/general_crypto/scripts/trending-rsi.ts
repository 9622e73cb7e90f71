#!/usr/bin/env node
// Computes RSI(14) buy/sell/neutral signals for the top trending coins on CoinGecko

import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { runTrendingRsiCli } from '../cli/trending-rsi-cli';

void runTrendingRsiCli(hideBin(process.argv)).then((exitCode) => {
  process.exitCode = exitCode;
});
