import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { MarketPriceService, PriceSource, ValuationPrice } from '../market-price/market-price.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { Lot } from '../ledger/entities/lot.entity';
import { sum, ZERO } from '../common/utils/decimal.util';

export interface LotValuation {
  lot: Lot;
  price: Decimal;
  priceSource: PriceSource;
  currentValue: Decimal;
  gainLoss: Decimal;
  gainLossPercent: Decimal;
}

export interface SandboxValuation {
  sandboxId: string;
  cash: Decimal;
  holdingsValue: Decimal;
  totalEquity: Decimal;
  lots: LotValuation[];
}

export interface SandboxHoldings {
  sandbox: Sandbox;
  lots: Lot[];
}

/**
 * Marks lots to market. A lot whose quote is unavailable is valued at its
 * average cost, so a valuation always completes.
 */
@Injectable()
export class ValuationService {
  constructor(private readonly marketPriceService: MarketPriceService) {}

  async valueSandbox(sandbox: Sandbox, lots: Lot[]): Promise<SandboxValuation> {
    const fallbacks = new Map(lots.map((lot) => [lot.symbol, lot.averageCost]));
    const prices = await this.marketPriceService.currentPrices(
      lots.map((lot) => lot.symbol),
      fallbacks,
    );
    return this.buildValuation(sandbox, lots, prices);
  }

  /** One batched quote lookup across every sandbox. */
  async valueSandboxes(holdings: SandboxHoldings[]): Promise<SandboxValuation[]> {
    const symbols = holdings.flatMap(({ lots }) => lots.map((lot) => lot.symbol));
    const live = await this.marketPriceService.currentPrices(symbols);
    return holdings.map(({ sandbox, lots }) => this.buildValuation(sandbox, lots, live));
  }

  private buildValuation(
    sandbox: Sandbox,
    lots: Lot[],
    prices: ReadonlyMap<string, ValuationPrice>,
  ): SandboxValuation {
    const valued = lots.map((lot): LotValuation => {
      const fallback: ValuationPrice = { price: lot.averageCost, source: 'fallback' };
      const quote = prices.get(lot.symbol) ?? fallback;
      const currentValue = quote.price.times(lot.quantity);
      const gainLoss = quote.price.minus(lot.averageCost).times(lot.quantity);
      const gainLossPercent = lot.averageCost.greaterThan(0)
        ? quote.price.minus(lot.averageCost).dividedBy(lot.averageCost).times(100)
        : ZERO;
      return {
        lot,
        price: quote.price,
        priceSource: quote.source,
        currentValue,
        gainLoss,
        gainLossPercent,
      };
    });

    const holdingsValue = sum(valued.map((v) => v.currentValue));
    return {
      sandboxId: sandbox.id,
      cash: sandbox.cashBalance,
      holdingsValue,
      totalEquity: sandbox.cashBalance.plus(holdingsValue),
      lots: valued,
    };
  }
}
