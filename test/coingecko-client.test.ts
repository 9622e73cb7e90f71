import { expect } from 'chai';
import { CoinGeckoApiError, CoinGeckoClient } from '../src/general_crypto/fetcher/coingecko-client';
import { type RecordedRequest, createStubApi } from './helpers/fake-market-data';

const clientConfig = { baseUrl: 'https://coingecko.test/api/v3', timeoutMs: 10000 };

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('CoinGeckoClient', () => {
  it('should map coin details and request them without tickers', async () => {
    const requests: RecordedRequest[] = [];
    const api = createStubApi({
      '/coins/blockasset': {
        status: 200,
        data: { id: 'blockasset', name: 'Blockasset', symbol: 'block', market_data: { current_price: { usd: 0.042, eur: 0.039 } } },
      },
    }, requests);
    const client = new CoinGeckoClient(clientConfig, api);

    const details = await client.getCoinDetails('blockasset');

    expect(details).to.deep.equal({ id: 'blockasset', name: 'Blockasset', symbol: 'block', currentPriceUsd: 0.042 });
    expect(requests[0].params).to.deep.equal({
      localization: 'false',
      tickers: 'false',
      market_data: 'true',
      community_data: 'true',
      developer_data: 'true',
      sparkline: 'false',
    });
  });

  it('should surface missing detail fields as null', async () => {
    const api = createStubApi({ '/coins/blockasset': { status: 200, data: {} } });
    const details = await new CoinGeckoClient(clientConfig, api).getCoinDetails('blockasset');
    expect(details).to.deep.equal({ id: 'blockasset', name: null, symbol: null, currentPriceUsd: null });
  });

  it('should request a daily usd market chart', async () => {
    const requests: RecordedRequest[] = [];
    const api = createStubApi({
      '/coins/blockasset/market_chart': { status: 200, data: { prices: [[1704067200000, 0.05], [1704153600000, 0.051]] } },
    }, requests);

    const prices = await new CoinGeckoClient(clientConfig, api).getMarketChart('blockasset', 365);

    expect(prices).to.deep.equal([[1704067200000, 0.05], [1704153600000, 0.051]]);
    expect(requests[0]).to.deep.equal({
      url: '/coins/blockasset/market_chart',
      params: { vs_currency: 'usd', days: 365, interval: 'daily' },
    });
  });

  it('should return no prices when the chart has none', async () => {
    const api = createStubApi({ '/coins/blockasset/market_chart': { status: 200, data: {} } });
    expect(await new CoinGeckoClient(clientConfig, api).getMarketChart('blockasset', 1)).to.deep.equal([]);
  });

  it('should unwrap trending items in source order', async () => {
    const api = createStubApi({
      '/search/trending': {
        status: 200,
        data: {
          coins: [
            { item: { id: 'pepe', name: 'Pepe', symbol: 'PEPE', score: 0 } },
            { item: { id: 'bonk', name: 'Bonk', symbol: 'BONK', score: 1 } },
            { item: { name: 'Nameless' } },
          ],
        },
      },
    });

    const trending = await new CoinGeckoClient(clientConfig, api).getTrending();

    expect(trending).to.deep.equal([
      { id: 'pepe', name: 'Pepe', symbol: 'PEPE' },
      { id: 'bonk', name: 'Bonk', symbol: 'BONK' },
      { id: null, name: 'Nameless', symbol: null },
    ]);
  });

  it('should raise CoinGeckoApiError with the status of a non-2xx response', async () => {
    const api = createStubApi({ '/coins/blockasset/market_chart': { status: 429, data: { error: 'throttled' } } });
    const error = await captureError(new CoinGeckoClient(clientConfig, api).getMarketChart('blockasset', 30));

    expect(error).to.be.instanceOf(CoinGeckoApiError);
    if (error instanceof CoinGeckoApiError) {
      expect(error.status).to.equal(429);
      expect(error.endpoint).to.equal('/coins/blockasset/market_chart');
      expect(error.message).to.equal('CoinGecko request to /coins/blockasset/market_chart failed: Request failed with status code 429');
    }
  });

  it('should raise CoinGeckoApiError without a status on transport failure', async () => {
    const api = createStubApi({ '/search/trending': { networkError: 'socket hang up' } });
    const error = await captureError(new CoinGeckoClient(clientConfig, api).getTrending());

    expect(error).to.be.instanceOf(CoinGeckoApiError);
    if (error instanceof CoinGeckoApiError) {
      expect(error.status).to.equal(undefined);
      expect(error.message).to.equal('CoinGecko request to /search/trending failed: socket hang up');
    }
  });
});
