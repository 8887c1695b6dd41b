import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { CLOCK, Clock } from '../common/clock/clock';
import { TtlCache } from '../common/cache/ttl-cache';
import { withTimeout } from '../common/utils/timeout.util';
import { eachDayKey, toDayKey } from '../common/utils/date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { DailyClose, MARKET_DATA_PROVIDER, MarketDataProvider, SymbolMatch } from './providers/market-data.provider';
import { DailySeries, fillDailySeries } from './price-series.util';

export type PriceSource = 'live' | 'fallback';

export interface ValuationPrice {
  price: Decimal;
  source: PriceSource;
}

/**
 * Read-through price cache in front of the market data provider.
 *
 * Quotes live for `quoteTtlSeconds`, raw daily series for
 * `equityCurveTtlSeconds`. Shared by every request; a stale read is
 * acceptable, so there is no per-symbol locking.
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);
  private readonly quotes: TtlCache<string, Decimal>;
  private readonly series: TtlCache<string, DailyClose[]>;

  constructor(
    @Inject(MARKET_DATA_PROVIDER) private readonly provider: MarketDataProvider,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.quotes = new TtlCache(config.quoteTtlSeconds * 1000, clock);
    this.series = new TtlCache(config.equityCurveTtlSeconds * 1000, clock);
  }

  /**
   * Current price, from cache when fresh.
   * Returns null when the provider fails, times out or has no price.
   */
  async currentPrice(symbol: string): Promise<Decimal | null> {
    const cached = this.quotes.get(symbol);
    if (cached) {
      this.logger.debug(`Quote cache hit for ${symbol}`);
      return cached;
    }

    try {
      const price = await withTimeout(
        this.provider.getCurrentPrice(symbol),
        this.config.marketDataTimeoutMs,
        `quote ${symbol}`,
      );
      if (price === null || !Number.isFinite(price) || price <= 0) {
        this.logger.warn(`No price available for ${symbol}`);
        return null;
      }
      const decimalPrice = toDecimal(price);
      this.quotes.set(symbol, decimalPrice);
      return decimalPrice;
    } catch (err) {
      this.logger.warn(`Quote fetch failed for ${symbol}: ${describe(err)}`);
      return null;
    }
  }

  /**
   * Batch valuation lookup. A symbol whose quote cannot be obtained takes
   * its fallback (normally the lot's average cost); without a fallback it
   * is left out. Never rejects.
   */
  async currentPrices(
    symbols: string[],
    fallbacks: ReadonlyMap<string, Decimal> = new Map(),
  ): Promise<Map<string, ValuationPrice>> {
    const unique = Array.from(new Set(symbols));
    const fetched = await Promise.all(unique.map((symbol) => this.currentPrice(symbol)));

    const prices = new Map<string, ValuationPrice>();
    unique.forEach((symbol, i) => {
      const live = fetched[i];
      if (live) {
        prices.set(symbol, { price: live, source: 'live' });
        return;
      }
      const fallback = fallbacks.get(symbol);
      if (fallback) {
        this.logger.warn(`Valuing ${symbol} at fallback price ${fallback.toString()}`);
        prices.set(symbol, { price: fallback, source: 'fallback' });
      }
    });
    return prices;
  }

  /**
   * Daily closes from `from` through today for each symbol, gap-filled so
   * every calendar day has a price. Symbols with no data in range are
   * omitted. Rejects when any fetch fails; seeding treats that as a
   * whole-unit failure.
   */
  async historicalCloses(symbols: string[], from: Date): Promise<Map<string, DailySeries>> {
    const to = this.clock.now();
    const days = eachDayKey(from, to);
    const unique = Array.from(new Set(symbols));

    const raw = await Promise.all(
      unique.map((symbol) => {
        const key = `${symbol}|${toDayKey(from)}|${toDayKey(to)}`;
        return this.series.getOrLoad(key, () =>
          withTimeout(
            this.provider.getDailyCloses(symbol, from, to),
            this.config.marketDataTimeoutMs,
            `daily closes ${symbol}`,
          ),
        );
      }),
    );

    this.logger.debug(`Series cache holds ${this.series.size} entries`);

    const result = new Map<string, DailySeries>();
    unique.forEach((symbol, i) => {
      const series = fillDailySeries(days, raw[i]);
      if (series.size > 0) {
        result.set(symbol, series);
      } else {
        this.logger.warn(`No daily closes for ${symbol} since ${toDayKey(from)}`);
      }
    });
    return result;
  }

  async search(query: string): Promise<SymbolMatch[]> {
    return withTimeout(
      this.provider.search(query),
      this.config.marketDataTimeoutMs,
      `search ${query}`,
    );
  }

  /** Drops every cached quote and series - test harness only */
  clearAll(): void {
    this.quotes.clear();
    this.series.clear();
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
