import { YahooMarketDataProvider } from './yahoo-market-data.provider';
import { HistoricalOptions, SearchOptions, YahooFinanceClient } from './yahoo-finance.client';

class StubYahooClient implements YahooFinanceClient {
  quoteResult: unknown = undefined;
  historicalResult: unknown = [];
  searchResult: unknown = { quotes: [] };
  historicalCalls: Array<{ symbol: string; options: HistoricalOptions }> = [];
  searchCalls: Array<{ query: string; options: SearchOptions }> = [];

  async quote(): Promise<unknown> {
    return this.quoteResult;
  }

  async historical(symbol: string, options: HistoricalOptions): Promise<unknown> {
    this.historicalCalls.push({ symbol, options });
    return this.historicalResult;
  }

  async search(query: string, options: SearchOptions): Promise<unknown> {
    this.searchCalls.push({ query, options });
    return this.searchResult;
  }
}

describe('YahooMarketDataProvider', () => {
  let client: StubYahooClient;
  let provider: YahooMarketDataProvider;

  beforeEach(() => {
    client = new StubYahooClient();
    provider = new YahooMarketDataProvider(client);
  });

  describe('getCurrentPrice', () => {
    it('should read the price through the extractor chain', async () => {
      client.quoteResult = { symbol: 'BRK-B', regularMarketPrice: 187.4, regularMarketPreviousClose: 185 };

      await expect(provider.getCurrentPrice('BRK-B')).resolves.toBe(187.4);
    });

    it('should fall back to the previous close outside the session', async () => {
      client.quoteResult = { symbol: 'AAPL', regularMarketPreviousClose: 185.5 };

      await expect(provider.getCurrentPrice('AAPL')).resolves.toBe(185.5);
    });

    it('should return null for an unknown symbol', async () => {
      client.quoteResult = undefined;

      await expect(provider.getCurrentPrice('NOPE')).resolves.toBeNull();
    });

    it('should propagate client errors', async () => {
      client.quote = () => Promise.reject(new Error('Failed to get crumb'));

      await expect(provider.getCurrentPrice('AAPL')).rejects.toThrow('Failed to get crumb');
    });
  });

  describe('getDailyCloses', () => {
    it('should request through the day after the end of the range', async () => {
      const from = new Date('2026-01-05T00:00:00.000Z');
      const to = new Date('2026-01-07T00:00:00.000Z');

      await provider.getDailyCloses('AAPL', from, to);

      expect(client.historicalCalls).toEqual([
        {
          symbol: 'AAPL',
          options: { period1: from, period2: new Date('2026-01-08T00:00:00.000Z'), interval: '1d' },
        },
      ]);
    });

    it('should key closes by their UTC trading date and skip empty rows', async () => {
      client.historicalResult = [
        { date: new Date('2026-01-05T14:30:00.000Z'), close: 100.5 },
        { date: new Date('2026-01-06T14:30:00.000Z'), close: null },
        { date: new Date('2026-01-07T00:00:00.000Z'), close: 101.25 },
        { date: '2026-01-08', close: 102 },
      ];

      await expect(
        provider.getDailyCloses('AAPL', new Date('2026-01-05T00:00:00.000Z'), new Date('2026-01-08T00:00:00.000Z')),
      ).resolves.toEqual([
        { day: '2026-01-05', close: 100.5 },
        { day: '2026-01-07', close: 101.25 },
      ]);
    });

    it('should propagate history errors', async () => {
      client.historical = () => Promise.reject(new Error('No data found, symbol may be delisted'));

      await expect(provider.getDailyCloses('GONE', new Date(), new Date())).rejects.toThrow('symbol may be delisted');
    });
  });

  describe('search', () => {
    it('should map quote hits and drop entries without a symbol', async () => {
      client.searchResult = {
        quotes: [
          { symbol: 'AAPL', longname: 'Apple Inc.', exchDisp: 'NASDAQ', quoteType: 'EQUITY' },
          { symbol: 'APLE', shortname: 'Apple Hospitality', exchange: 'NYQ', typeDisp: 'Equity' },
          { index: 'urn:news', name: 'no symbol' },
        ],
      };

      await expect(provider.search('apple')).resolves.toEqual([
        { symbol: 'AAPL', name: 'Apple Inc.', exchange: 'NASDAQ', type: 'EQUITY' },
        { symbol: 'APLE', name: 'Apple Hospitality', exchange: 'NYQ', type: 'Equity' },
      ]);
      expect(client.searchCalls).toEqual([{ query: 'apple', options: { quotesCount: 10, newsCount: 0 } }]);
    });
  });
});
