export const DEFAULT_COINGECKO_BASE_URL = 'https://api.coingecko.com/api/v3';
export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

// Coin tracked by the price-history tool unless COIN_ID or --coin says otherwise
export const DEFAULT_COIN_ID = 'blockasset';
export const DEFAULT_HISTORY_DAYS = 365;

export const QUOTE_CURRENCY = 'usd';

export const RSI_CONFIG = {
  PERIOD: 14,
  OVERSOLD: 30, // below => buy
  OVERBOUGHT: 70, // above => sell
  DISPLAY_DECIMALS: 2,
} as const;

export const TRENDING_CONFIG = {
  LIMIT: 7,
  HISTORY_DAYS: 15, // RSI(14) needs 15 closes
} as const;
