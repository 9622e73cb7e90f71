import axios, { type AxiosInstance } from 'axios';
import type { CoinDetails, CoinGeckoClientConfig, PriceSample, TrendingCoin } from '../../types/crypto';
import type { MarketDataSource } from '../../types/market-data-source.interface';
import { QUOTE_CURRENCY } from '../../config/constants';
import { createLogger } from '../../utils/logger';

const logger = createLogger('CoinGeckoClient');

type QueryParams = Record<string, string | number | boolean>;

interface CoinDetailResponse {
  id?: string;
  name?: string;
  symbol?: string;
  market_data?: {
    current_price?: Record<string, number | undefined>;
  };
}

interface MarketChartResponse {
  prices?: PriceSample[];
}

interface TrendingResponse {
  coins?: Array<{
    item?: {
      id?: string;
      name?: string;
      symbol?: string;
    };
  }>;
}

/**
 * Raised for any failed CoinGecko request: transport errors, timeouts and
 * non-2xx responses alike.
 */
export class CoinGeckoApiError extends Error {
  constructor(
    message: string,
    readonly endpoint: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'CoinGeckoApiError';
  }
}

export class CoinGeckoClient implements MarketDataSource {
  private readonly api: AxiosInstance;

  /**
   * @param api preconfigured axios instance; when omitted one is created from `config`
   */
  constructor(config: CoinGeckoClientConfig, api?: AxiosInstance) {
    this.api = api ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
    });
  }

  private async get<T>(endpoint: string, params?: QueryParams): Promise<T> {
    try {
      const response = await this.api.get<T>(endpoint, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        logger.debug(`CoinGecko request failed: ${endpoint}`, { error: error.message, status });
        throw new CoinGeckoApiError(
          `CoinGecko request to ${endpoint} failed: ${error.message}`,
          endpoint,
          status,
          error
        );
      }
      throw error;
    }
  }

  async getCoinDetails(coinId: string): Promise<CoinDetails> {
    const data = await this.get<CoinDetailResponse>(`/coins/${coinId}`, {
      localization: 'false',
      tickers: 'false',
      market_data: 'true',
      community_data: 'true',
      developer_data: 'true',
      sparkline: 'false',
    });

    return {
      id: data.id ?? coinId,
      name: data.name ?? null,
      symbol: data.symbol ?? null,
      currentPriceUsd: data.market_data?.current_price?.[QUOTE_CURRENCY] ?? null,
    };
  }

  async getMarketChart(coinId: string, days: number): Promise<PriceSample[]> {
    const data = await this.get<MarketChartResponse>(`/coins/${coinId}/market_chart`, {
      vs_currency: QUOTE_CURRENCY,
      days,
      interval: 'daily',
    });
    return data.prices ?? [];
  }

  async getTrending(): Promise<TrendingCoin[]> {
    const data = await this.get<TrendingResponse>('/search/trending');
    return (data.coins ?? []).map(({ item }) => ({
      id: item?.id ?? null,
      name: item?.name ?? null,
      symbol: item?.symbol ?? null,
    }));
  }
}
