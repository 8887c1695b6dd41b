import { ForbiddenException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import { SandboxQueryService } from './sandbox-query.service';
import { SandboxService } from './sandbox.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { SharingService } from '../sharing/sharing.service';
import { TradeSide } from '../ledger/entities/sandbox-transaction.entity';
import { createTestingModule, FakeClock, FakeMarketDataProvider } from '../testing/fakes';

describe('SandboxQueryService', () => {
  let queries: SandboxQueryService;
  let sandboxes: SandboxService;
  let sharing: SharingService;
  let marketPriceService: MarketPriceService;
  let provider: FakeMarketDataProvider;
  let clock: FakeClock;
  let sandboxId: string;

  const trade = (side: TradeSide, quantity: number, id = sandboxId) =>
    sandboxes.trade('alice', id, { side, symbol: 'AAPL', quantity });

  beforeEach(async () => {
    provider = new FakeMarketDataProvider().setPrice('AAPL', 100);
    clock = new FakeClock(new Date(2026, 0, 5, 10));
    const module: TestingModule = await createTestingModule(provider, clock);

    queries = module.get<SandboxQueryService>(SandboxQueryService);
    sandboxes = module.get<SandboxService>(SandboxService);
    sharing = module.get<SharingService>(SharingService);
    marketPriceService = module.get<MarketPriceService>(MarketPriceService);

    sandboxId = sandboxes.createSandbox('alice', { name: 'Growth', initialCash: 10000 }).id;
  });

  describe('getPortfolio', () => {
    it('should value holdings live and end the curve at today\'s equity', async () => {
      await trade(TradeSide.BUY, 10);
      clock.advanceDays(5);
      provider.setPrice('AAPL', 110);
      provider.setCloses('AAPL', [
        ['2026-01-05', 100],
        ['2026-01-06', 102],
        ['2026-01-07', 104],
        ['2026-01-08', 106],
        ['2026-01-09', 110],
      ]);

      const portfolio = await queries.getPortfolio('alice', sandboxId);

      expect(portfolio.lots).toEqual([
        {
          symbol: 'AAPL',
          quantity: 10,
          averageCost: 100,
          currentPrice: 110,
          priceSource: 'live',
          currentValue: 1100,
          gainLoss: 100,
          gainLossPercent: 10,
        },
      ]);
      expect(portfolio.cash).toBe(9000);
      expect(portfolio.holdingsValue).toBe(1100);
      expect(portfolio.totalEquity).toBe(10100);
      expect(portfolio.realizedPnl).toBe(0);
      expect(portfolio.permission).toBe('owner');
      expect(portfolio.historyDegraded).toBe(false);
      expect('historyError' in portfolio).toBe(false);
      expect(portfolio.equityCurve[0]).toEqual({ timestamp: new Date(2026, 0, 5).getTime(), value: 10000 });
      expect(portfolio.equityCurve[portfolio.equityCurve.length - 1]).toEqual({
        timestamp: new Date(2026, 0, 10).getTime(),
        value: 10100,
      });
      expect(portfolio.equityCurve).toHaveLength(6);
    });

    it('should sum realized gains of sells', async () => {
      await trade(TradeSide.BUY, 10);
      provider.setPrice('AAPL', 120);
      marketPriceService.clearAll();
      await trade(TradeSide.SELL, 5);

      const portfolio = await queries.getPortfolio('alice', sandboxId);

      expect(portfolio.realizedPnl).toBe(100);
      expect(portfolio.cash).toBe(9600);
      expect(portfolio.lots[0].quantity).toBe(5);
    });

    it('should value a lot at average cost when its quote fails', async () => {
      await trade(TradeSide.BUY, 10);
      marketPriceService.clearAll();
      provider.failingSymbols.add('AAPL');

      const portfolio = await queries.getPortfolio('alice', sandboxId);

      expect(portfolio.lots[0]).toMatchObject({ currentPrice: 100, priceSource: 'fallback', gainLoss: 0 });
      expect(portfolio.totalEquity).toBe(10000);
    });

    it('should report degraded history instead of failing', async () => {
      await trade(TradeSide.BUY, 10);
      clock.advanceDays(1);
      provider.failHistory = true;

      const portfolio = await queries.getPortfolio('alice', sandboxId);

      expect(portfolio.historyDegraded).toBe(true);
      expect(portfolio.historyError).toContain('Equity history could not be reconstructed');
      expect(portfolio.equityCurve.map((p) => p.value)).toEqual([10000, 10000]);
      expect(portfolio.totalEquity).toBe(10000);
    });

    it('should let a watcher read and refuse strangers', async () => {
      sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob' });

      await expect(queries.getPortfolio('bob', sandboxId)).resolves.toMatchObject({ permission: 'watch' });
      await expect(queries.getPortfolio('mallory', sandboxId)).rejects.toThrow(ForbiddenException);
    });
  });

  describe('listSandboxes', () => {
    it('should list own sandboxes newest first with live equity', async () => {
      await trade(TradeSide.BUY, 10);
      clock.advanceSeconds(60);
      const second = sandboxes.createSandbox('alice', { name: 'Income', initialCash: 500 });
      sandboxes.createSandbox('bob', { name: 'Other' });
      provider.setPrice('AAPL', 150);
      marketPriceService.clearAll();

      const summaries = await queries.listSandboxes('alice');

      expect(summaries.map((s) => [s.id, s.totalEquity])).toEqual([
        [second.id, 500],
        [sandboxId, 10500],
      ]);
      expect(summaries[1]).toMatchObject({ name: 'Growth', cash: 9000, initialCash: 10000 });
    });
  });

  describe('listSharedSandboxes', () => {
    it('should list what others shared with the caller', async () => {
      const { share } = sharing.shareSandbox('alice', sandboxId, { granteeId: 'bob', permission: 'edit' });

      const shared = await queries.listSharedSandboxes('bob');

      expect(shared).toEqual([
        {
          id: sandboxId,
          name: 'Growth',
          cash: 10000,
          initialCash: 10000,
          totalEquity: 10000,
          createdAt: new Date(2026, 0, 5, 10).toISOString(),
          permission: 'edit',
          shareId: share.id,
          ownerId: 'alice',
          isShared: true,
        },
      ]);
      await expect(queries.listSharedSandboxes('alice')).resolves.toEqual([]);
    });
  });

  describe('getTransactions', () => {
    it('should return the log newest first', async () => {
      await trade(TradeSide.BUY, 10);
      await trade(TradeSide.SELL, 4);

      const log = queries.getTransactions('alice', sandboxId);

      expect(log.map((t) => [t.side, t.quantity, t.total, t.realizedPnl])).toEqual([
        [TradeSide.SELL, 4, 400, 0],
        [TradeSide.BUY, 10, 1000, null],
      ]);
    });
  });
});
