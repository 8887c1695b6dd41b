export const YAHOO_FINANCE_CLIENT = 'YAHOO_FINANCE_CLIENT';

export interface HistoricalOptions {
  period1: Date;
  period2: Date;
  interval: '1d';
}

export interface SearchOptions {
  quotesCount: number;
  newsCount: number;
}

/**
 * The slice of yahoo-finance2 the provider calls. Results are narrowed by
 * the provider, so they are typed `unknown` here.
 */
export interface YahooFinanceClient {
  quote(symbol: string): Promise<unknown>;
  historical(symbol: string, options: HistoricalOptions): Promise<unknown>;
  search(query: string, options: SearchOptions): Promise<unknown>;
}
