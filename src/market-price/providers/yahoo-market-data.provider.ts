import { Inject, Injectable, Logger } from '@nestjs/common';
import { toUtcDayKey } from '../../common/utils/date.util';
import { DailyClose, MarketDataProvider, SymbolMatch } from './market-data.provider';
import { asPrice, extractPrice, isPayload } from './price-extractors';
import { YAHOO_FINANCE_CLIENT, YahooFinanceClient } from './yahoo-finance.client';

const SEARCH_RESULT_LIMIT = 10;
const ONE_DAY_MS = 86_400_000;

/**
 * Quotes, daily history and symbol search through yahoo-finance2.
 * Timeouts are applied by the price cache.
 */
@Injectable()
export class YahooMarketDataProvider implements MarketDataProvider {
  private readonly logger = new Logger(YahooMarketDataProvider.name);

  constructor(@Inject(YAHOO_FINANCE_CLIENT) private readonly yahoo: YahooFinanceClient) {}

  async getCurrentPrice(symbol: string): Promise<number | null> {
    const quote = await this.yahoo.quote(symbol);
    if (!isPayload(quote)) {
      return null;
    }

    const extracted = extractPrice(quote);
    if (!extracted) {
      return null;
    }
    this.logger.debug(`Quote ${symbol}=${extracted.price} via ${extracted.source}`);
    return extracted.price;
  }

  async getDailyCloses(symbol: string, from: Date, to: Date): Promise<DailyClose[]> {
    // period2 is exclusive upstream; pad a day so `to` itself is covered
    const rows = await this.yahoo.historical(symbol, {
      period1: from,
      period2: new Date(to.getTime() + ONE_DAY_MS),
      interval: '1d',
    });
    if (!Array.isArray(rows)) {
      return [];
    }

    const closes: DailyClose[] = [];
    for (const row of rows) {
      if (!isPayload(row) || !(row.date instanceof Date)) {
        continue;
      }
      const close = asPrice(row.close);
      if (close !== undefined) {
        // rows are stamped in UTC on the exchange's trading date
        closes.push({ day: toUtcDayKey(row.date), close });
      }
    }
    return closes;
  }

  async search(query: string): Promise<SymbolMatch[]> {
    const result = await this.yahoo.search(query, { quotesCount: SEARCH_RESULT_LIMIT, newsCount: 0 });
    if (!isPayload(result) || !Array.isArray(result.quotes)) {
      return [];
    }

    const matches: SymbolMatch[] = [];
    for (const quote of result.quotes) {
      if (!isPayload(quote) || typeof quote.symbol !== 'string') {
        continue;
      }
      matches.push({
        symbol: quote.symbol,
        name: firstString(quote.longname, quote.shortname) ?? quote.symbol,
        exchange: firstString(quote.exchDisp, quote.exchange) ?? '',
        type: firstString(quote.quoteType, quote.typeDisp) ?? '',
      });
    }
    return matches;
  }
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}
