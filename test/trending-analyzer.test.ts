import { expect } from 'chai';
import { TrendingAnalyzer, selectTrending } from '../src/general_crypto/analysis/trending-analyzer';
import type { CoinSummary, TrendingCoin } from '../src/types/crypto';
import { FakeMarketDataSource, dailySamples } from './helpers/fake-market-data';

const coin = (id: string): TrendingCoin => ({ id, name: id.toUpperCase(), symbol: id.slice(0, 3) });

// 15 rising closes (RSI 100) and 15 falling closes (RSI 0)
const RISING = dailySamples([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15]);
const FALLING = dailySamples([15, 14, 13, 12, 11, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1]);

describe('selectTrending', () => {
  it('should keep only the first 7 entries in source order', () => {
    const coins = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
    expect(selectTrending(coins)).to.deep.equal(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
  });

  it('should return every entry of a shorter list', () => {
    expect(selectTrending(['z', 'y', 'z'])).to.deep.equal(['z', 'y', 'z']);
    expect(selectTrending([])).to.deep.equal([]);
  });
});

describe('TrendingAnalyzer', () => {
  it('should classify each coin from its own price history', async () => {
    const source = new FakeMarketDataSource({ charts: { up: RISING, down: FALLING } });
    const analyzer = new TrendingAnalyzer(source);

    expect(await analyzer.analyzeCoin(coin('up'))).to.deep.equal({
      name: 'UP', symbol: 'up', rsi: { status: 'ok', value: 100 }, signal: 'sell',
    });
    expect(await analyzer.analyzeCoin(coin('down'))).to.deep.equal({
      name: 'DOWN', symbol: 'dow', rsi: { status: 'ok', value: 0 }, signal: 'buy',
    });
  });

  it('should request a 15 day history per coin', async () => {
    const source = new FakeMarketDataSource({ trending: [coin('up')], charts: { up: RISING } });
    await new TrendingAnalyzer(source).analyzeTrending();
    expect(source.chartRequests).to.deep.equal([{ coinId: 'up', days: 15 }]);
  });

  it('should analyze at most 7 trending coins, in ranking order', async () => {
    const ids = ['c1', 'c2', 'c3', 'c4', 'c5', 'c6', 'c7', 'c8', 'c9'];
    const source = new FakeMarketDataSource({ trending: ids.map(coin) });

    const results = await new TrendingAnalyzer(source).analyzeTrending();

    expect(results.map(r => r.name)).to.deep.equal(['C1', 'C2', 'C3', 'C4', 'C5', 'C6', 'C7']);
    expect(source.chartRequests.map(r => r.coinId)).to.deep.equal(ids.slice(0, 7));
  });

  it('should degrade a coin whose history fails to neutral and keep going', async () => {
    const source = new FakeMarketDataSource({
      trending: [coin('up'), coin('broken'), coin('down')],
      charts: { up: RISING, down: FALLING },
      failingCharts: ['broken'],
    });

    const results = await new TrendingAnalyzer(source).analyzeTrending();

    expect(results.map(r => [r.name, r.signal])).to.deep.equal([
      ['UP', 'sell'],
      ['BROKEN', 'neutral'],
      ['DOWN', 'buy'],
    ]);
    expect(results[1].rsi).to.deep.equal({ status: 'unavailable' });
  });

  it('should treat a coin without an id as unavailable without requesting it', async () => {
    const source = new FakeMarketDataSource({ trending: [{ id: null, name: 'Ghost', symbol: null }] });

    const results = await new TrendingAnalyzer(source).analyzeTrending();

    expect(results).to.deep.equal([{ name: 'Ghost', symbol: null, rsi: { status: 'unavailable' }, signal: 'neutral' }]);
    expect(source.chartRequests).to.deep.equal([]);
  });

  it('should report each summary as it is produced', async () => {
    const source = new FakeMarketDataSource({ trending: [coin('up'), coin('down')], charts: { up: RISING, down: FALLING } });
    const seen: CoinSummary[] = [];

    const results = await new TrendingAnalyzer(source).analyzeTrending(summary => seen.push(summary));

    expect(seen).to.deep.equal(results);
  });

  it('should propagate a failure to fetch the trending list', async () => {
    const source = new FakeMarketDataSource({ failTrending: true });
    let caught: unknown;
    try {
      await new TrendingAnalyzer(source).analyzeTrending();
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(Error);
  });

  it('should honour a custom limit and period', async () => {
    const source = new FakeMarketDataSource({
      trending: [coin('up'), coin('down')],
      charts: { up: dailySamples([10, 12, 11]) },
    });

    const results = await new TrendingAnalyzer(source, { limit: 1, rsiPeriod: 2, historyDays: 3 }).analyzeTrending();

    expect(results).to.have.lengthOf(1);
    expect(results[0].signal).to.equal('neutral');
    expect(source.chartRequests).to.deep.equal([{ coinId: 'up', days: 3 }]);
  });
});
