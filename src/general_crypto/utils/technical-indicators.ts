import type { RsiResult, Signal } from '../../types/crypto';
import { RSI_CONFIG } from '../../config/constants';

/**
 * Calculates the Relative Strength Index over the leading window of a series.
 *
 * Only the first `period + 1` prices are used: gains and losses of the
 * `period` day-over-day changes are averaged with a simple mean. Later prices
 * never affect the result. A series with `period` or fewer prices has no RSI.
 *
 * @param prices closing prices, oldest first
 * @param period lookback period, typically 14
 */
export function computeRsi(prices: readonly number[], period: number = RSI_CONFIG.PERIOD): RsiResult {
  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`RSI period must be a positive integer, got ${period}`);
  }
  if (prices.length <= period) {
    return { status: 'unavailable' };
  }

  let gains = 0;
  let losses = 0;
  for (let i = 1; i <= period; i++) {
    const change = prices[i] - prices[i - 1];
    if (change > 0) {
      gains += change;
    } else {
      losses -= change; // Losses are positive values
    }
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;

  if (avgLoss === 0) {
    return { status: 'ok', value: 100 };
  }
  const rs = avgGain / avgLoss;
  return { status: 'ok', value: 100 - (100 / (1 + rs)) };
}

/**
 * buy below the oversold level, sell above the overbought level, neutral
 * otherwise. The levels themselves are neutral, as is a missing RSI.
 */
export function classifySignal(rsi: RsiResult): Signal {
  if (rsi.status === 'unavailable') {
    return 'neutral';
  }
  if (rsi.value < RSI_CONFIG.OVERSOLD) return 'buy';
  if (rsi.value > RSI_CONFIG.OVERBOUGHT) return 'sell';
  return 'neutral';
}

/** RSI rounded for output, or null when it could not be computed. */
export function roundRsi(rsi: RsiResult, decimals: number = RSI_CONFIG.DISPLAY_DECIMALS): number | null {
  return rsi.status === 'ok' ? parseFloat(rsi.value.toFixed(decimals)) : null;
}

export function formatRsi(rsi: RsiResult, decimals: number = RSI_CONFIG.DISPLAY_DECIMALS): string {
  return rsi.status === 'ok' ? rsi.value.toFixed(decimals) : 'n/a';
}
