import { DayKey } from '../../common/utils/date.util';

export const MARKET_DATA_PROVIDER = 'MARKET_DATA_PROVIDER';

export interface DailyClose {
  day: DayKey;
  close: number;
}

export interface SymbolMatch {
  symbol: string;
  name: string;
  exchange: string;
  type: string;
}

/**
 * Upstream stock-data source. Implementations may throw on transport
 * failures; the price cache decides how each caller degrades.
 */
export interface MarketDataProvider {
  /** Latest traded price, or null when the upstream has none. */
  getCurrentPrice(symbol: string): Promise<number | null>;

  /** Daily closes between `from` and `to`, oldest first, trading days only. */
  getDailyCloses(symbol: string, from: Date, to: Date): Promise<DailyClose[]>;

  search(query: string): Promise<SymbolMatch[]>;
}
