/**
 * A single [timestamp, price] sample as returned by the market_chart endpoint.
 * The price is null when CoinGecko has no quote for that moment.
 */
export type PriceSample = [number, number | null];

export interface PricePoint {
  /** Milliseconds since epoch. */
  timestamp: number;
  /** Price in USD, null when missing upstream. */
  price: number | null;
}

/** Price points ordered by UTC date, one per date. */
export type DailySeries = PricePoint[];

export type RsiResult =
  | { status: 'ok'; value: number }
  | { status: 'unavailable' };

export type Signal = 'buy' | 'sell' | 'neutral';

export interface TrendingCoin {
  id: string | null;
  name: string | null;
  symbol: string | null;
}

export interface CoinSummary {
  name: string | null;
  symbol: string | null;
  rsi: RsiResult;
  signal: Signal;
}

export interface CoinDetails {
  id: string;
  name: string | null;
  symbol: string | null;
  currentPriceUsd: number | null;
}

export interface CoinGeckoClientConfig {
  baseUrl: string;
  timeoutMs: number;
}
