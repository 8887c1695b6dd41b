import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { CLOCK, Clock } from '../common/clock/clock';
import { TtlCache } from '../common/cache/ttl-cache';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { DayKey, dayKeyToDate, eachDayKey, earliest, toDayKey } from '../common/utils/date.util';
import { isDust, sum, toMoney } from '../common/utils/decimal.util';
import { HistorySeedError, SandboxNotFoundException } from '../common/errors/sandbox.errors';
import { MarketPriceService } from '../market-price/market-price.service';
import { DailySeries } from '../market-price/price-series.util';
import { LedgerStorageService } from '../ledger/ledger-storage.service';
import { SnapshotStorageService } from '../ledger/snapshot-storage.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { SandboxTransaction, TradeSide } from '../ledger/entities/sandbox-transaction.entity';
import { EquitySnapshot } from '../ledger/entities/equity-snapshot.entity';
import { SandboxValuation } from './valuation.service';

export interface EquityPoint {
  timestamp: number;          // ms since epoch
  value: number;
}

export type EquityCurveSource = 'snapshots' | 'seeded' | 'fallback';

export interface EquityCurve {
  points: EquityPoint[];
  source: EquityCurveSource;
  historyError?: string;
}

/**
 * Builds a sandbox's day-by-day equity curve.
 *
 * Steady state reads the snapshot store. A sandbox with fewer than two
 * snapshots is seeded by replaying its transaction log against gap-filled
 * daily closes; the replayed days are persisted so later reads take the
 * fast path. Seeding failure degrades to a flat two-point curve carrying
 * `historyError`.
 *
 * Curves are cached per sandbox for `equityCurveTtlSeconds`; a trade
 * invalidates its sandbox's entry.
 */
@Injectable()
export class EquityHistoryService {
  private readonly logger = new Logger(EquityHistoryService.name);
  private readonly curves: TtlCache<string, EquityCurve>;

  constructor(
    private readonly ledger: LedgerStorageService,
    private readonly snapshots: SnapshotStorageService,
    private readonly marketPriceService: MarketPriceService,
    private readonly mutex: KeyedMutex,
    @Inject(APP_CONFIG) config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.curves = new TtlCache(config.equityCurveTtlSeconds * 1000, clock);
  }

  async equityCurve(sandbox: Sandbox): Promise<EquityCurve> {
    const cached = this.curves.get(sandbox.id);
    if (cached) {
      this.logger.debug(`Equity curve cache hit for sandbox ${sandbox.id}`);
      return cached;
    }

    const stored = this.snapshots.readSnapshots(sandbox.id);
    if (stored.length >= 2) {
      const curve: EquityCurve = { points: stored.map(toPoint), source: 'snapshots' };
      this.curves.set(sandbox.id, curve);
      return curve;
    }

    try {
      return await this.mutex.runExclusive(sandbox.id, async () => {
        const seeded = await this.seed(sandbox);
        const curve: EquityCurve = { points: seeded.map(toPoint), source: 'seeded' };
        this.curves.set(sandbox.id, curve);
        return curve;
      });
    } catch (err) {
      if (err instanceof SandboxNotFoundException) {
        throw err;
      }
      const historyError = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Falling back to flat equity curve: ${historyError}`);
      // not cached: the next view retries seeding
      return this.fallbackCurve(sandbox, historyError);
    }
  }

  /**
   * Replays the transaction log from the earlier of creation and first
   * trade through today, persisting one snapshot per calendar day.
   * Callers hold the sandbox lock; the sandbox is re-read under it so a
   * delete queued ahead of the seed leaves no rows behind.
   *
   * @throws SandboxNotFoundException when the sandbox is gone
   * @throws HistorySeedError when the price series cannot be fetched
   */
  async seed(requested: Sandbox): Promise<EquitySnapshot[]> {
    const sandbox = this.ledger.getSandbox(requested.id);
    if (!sandbox) {
      throw new SandboxNotFoundException(requested.id);
    }
    const transactions = this.ledger.getTransactions(sandbox.id);
    const start =
      earliest([sandbox.createdAt, ...transactions.map((tx) => tx.executedAt)]) ?? sandbox.createdAt;
    const now = this.clock.now();
    const days = eachDayKey(start, now);
    const symbols = Array.from(new Set(transactions.map((tx) => tx.symbol)));

    let closes: Map<string, DailySeries>;
    try {
      closes = await this.marketPriceService.historicalCloses(symbols, start);
    } catch (err) {
      throw new HistorySeedError(sandbox.id, err);
    }

    const replayed = replayLedger(sandbox.initialCash, transactions, days, closes);
    const written = replayed.map((day) =>
      this.snapshots.upsertSnapshot({
        sandboxId: sandbox.id,
        date: day.date,
        totalEquity: day.cash.plus(day.holdingsValue),
        cash: day.cash,
        holdingsValue: day.holdingsValue,
        writtenAt: now,
      }),
    );
    this.logger.log(`Seeded ${written.length} equity snapshots for sandbox ${sandbox.id}`);
    return written;
  }

  /** Writes today's snapshot from a live valuation. Latest write wins. */
  recordSnapshot(valuation: SandboxValuation): EquitySnapshot {
    const now = this.clock.now();
    return this.snapshots.upsertSnapshot({
      sandboxId: valuation.sandboxId,
      date: toDayKey(now),
      totalEquity: valuation.totalEquity,
      cash: valuation.cash,
      holdingsValue: valuation.holdingsValue,
      writtenAt: now,
    });
  }

  /**
   * Curve with today's point set to `liveEquity`. Fallback curves are
   * returned unchanged.
   */
  withLivePoint(curve: EquityCurve, liveEquity: Decimal): EquityCurve {
    if (curve.source === 'fallback') {
      return curve;
    }
    const today = dayKeyToDate(toDayKey(this.clock.now())).getTime();
    const live: EquityPoint = { timestamp: today, value: toMoney(liveEquity) };
    const points = curve.points.filter((p) => p.timestamp !== today);
    points.push(live);
    points.sort((a, b) => a.timestamp - b.timestamp);
    return { ...curve, points };
  }

  invalidate(sandboxId: string): void {
    this.curves.invalidate(sandboxId);
  }

  private fallbackCurve(sandbox: Sandbox, historyError: string): EquityCurve {
    const initial = toMoney(sandbox.initialCash);
    return {
      points: [
        { timestamp: sandbox.createdAt.getTime(), value: initial },
        { timestamp: this.clock.now().getTime(), value: initial },
      ],
      source: 'fallback',
      historyError,
    };
  }
}

export interface ReplayedDay {
  date: DayKey;
  cash: Decimal;
  holdingsValue: Decimal;
}

/**
 * Pure day-by-day replay. Each day applies that day's trades in log order,
 * then values holdings at the day's close; a symbol without a series
 * contributes nothing.
 */
export function replayLedger(
  initialCash: Decimal,
  transactions: SandboxTransaction[],
  days: DayKey[],
  closes: ReadonlyMap<string, DailySeries>,
): ReplayedDay[] {
  const byDay = new Map<DayKey, SandboxTransaction[]>();
  for (const tx of transactions) {
    const day = toDayKey(tx.executedAt);
    const bucket = byDay.get(day);
    if (bucket) {
      bucket.push(tx);
    } else {
      byDay.set(day, [tx]);
    }
  }

  let cash = initialCash;
  const holdings = new Map<string, Decimal>();
  const result: ReplayedDay[] = [];

  for (const date of days) {
    for (const tx of byDay.get(date) ?? []) {
      const notional = tx.price.times(tx.quantity);
      const held = holdings.get(tx.symbol) ?? new Decimal(0);
      if (tx.side === TradeSide.BUY) {
        cash = cash.minus(notional);
        holdings.set(tx.symbol, held.plus(tx.quantity));
      } else {
        cash = cash.plus(notional);
        const remaining = held.minus(tx.quantity);
        if (isDust(remaining)) {
          holdings.delete(tx.symbol);
        } else {
          holdings.set(tx.symbol, remaining);
        }
      }
    }

    const values: Decimal[] = [];
    for (const [symbol, quantity] of holdings) {
      const close = closes.get(symbol)?.get(date);
      if (close) {
        values.push(close.times(quantity));
      }
    }
    result.push({ date, cash, holdingsValue: sum(values) });
  }

  return result;
}

function toPoint(snapshot: EquitySnapshot): EquityPoint {
  return {
    timestamp: dayKeyToDate(snapshot.date).getTime(),
    value: toMoney(snapshot.totalEquity),
  };
}
