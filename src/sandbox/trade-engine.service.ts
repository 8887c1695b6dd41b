import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStorageService, TradeCommit } from '../ledger/ledger-storage.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { Lot } from '../ledger/entities/lot.entity';
import { SandboxTransaction, TradeSide } from '../ledger/entities/sandbox-transaction.entity';
import { MarketPriceService } from '../market-price/market-price.service';
import { AccessGuardService } from '../sharing/access-guard.service';
import { EquityHistoryService } from './equity-history.service';
import { ValuationService } from './valuation.service';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { CLOCK, Clock } from '../common/clock/clock';
import { DecimalInput, isDust, toDecimal, ZERO } from '../common/utils/decimal.util';
import {
  InsufficientFundsException,
  InsufficientSharesException,
  InvalidQuantityException,
  QuoteUnavailableException,
  SandboxNotFoundException,
} from '../common/errors/sandbox.errors';

export interface TradeOrder {
  sandboxId: string;
  callerId: string;
  side: TradeSide;
  symbol: string;
  /** Share count. Takes precedence over `amount` whenever given. */
  quantity?: DecimalInput;
  /** Cash to spend or raise; converted at the execution price. */
  amount?: DecimalInput;
}

export interface TradeResult {
  transaction: SandboxTransaction;
  total: Decimal;
  cashBalance: Decimal;
}

// Executes market orders against a sandbox at the live price.
// Average-cost accounting: buys re-weight the lot's cost basis, sells
// leave it unchanged. All mutations for one sandbox run under its lock.
@Injectable()
export class TradeEngineService {
  private readonly logger = new Logger(TradeEngineService.name);

  constructor(
    private readonly ledger: LedgerStorageService,
    private readonly marketPriceService: MarketPriceService,
    private readonly accessGuard: AccessGuardService,
    private readonly history: EquityHistoryService,
    private readonly valuation: ValuationService,
    private readonly mutex: KeyedMutex,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Validates and executes one order.
   *
   * @throws PermissionDeniedException without edit access
   * @throws QuoteUnavailableException when no price can be obtained
   * @throws InvalidQuantityException, InsufficientFundsException,
   *   InsufficientSharesException before anything is written
   */
  async execute(order: TradeOrder): Promise<TradeResult> {
    this.accessGuard.require(order.sandboxId, order.callerId, 'edit');

    const symbol = order.symbol.trim().toUpperCase();
    // an explicit quantity wins over an amount, and is validated as given
    const requested = order.quantity !== undefined ? requirePositive(order.quantity) : null;
    const amount = requested ? ZERO : requirePositive(order.amount);

    const price = await this.marketPriceService.currentPrice(symbol);
    if (!price) {
      throw new QuoteUnavailableException(symbol);
    }

    const quantity = requested ?? amount.dividedBy(price);
    if (!quantity.greaterThan(0)) {
      throw new InvalidQuantityException(quantity);
    }

    const result = await this.mutex.runExclusive(order.sandboxId, async () => {
      const sandbox = this.ledger.getSandbox(order.sandboxId);
      if (!sandbox) {
        throw new SandboxNotFoundException(order.sandboxId);
      }

      const commit =
        order.side === TradeSide.BUY
          ? this.planBuy(sandbox, symbol, quantity, price)
          : this.planSell(sandbox, symbol, quantity, price);
      this.ledger.commitTrade(commit);
      await this.snapshotAfterTrade(sandbox.id);

      return {
        transaction: commit.transaction,
        total: price.times(quantity),
        cashBalance: commit.cashBalance,
      };
    });

    this.history.invalidate(order.sandboxId);
    this.logger.log(
      `${order.side} ${quantity.toString()} ${symbol} @ ${price.toString()} in sandbox ${order.sandboxId}`,
    );
    return result;
  }

  private planBuy(sandbox: Sandbox, symbol: string, quantity: Decimal, price: Decimal): TradeCommit {
    const totalCost = price.times(quantity);
    if (sandbox.cashBalance.lessThan(totalCost)) {
      throw new InsufficientFundsException(sandbox.cashBalance, totalCost);
    }

    const now = this.clock.now();
    const existing = this.ledger.getLot(sandbox.id, symbol);
    let lot: Lot;
    if (existing) {
      const newQuantity = existing.quantity.plus(quantity);
      const newAverage = existing.quantity
        .times(existing.averageCost)
        .plus(quantity.times(price))
        .dividedBy(newQuantity);
      lot = { ...existing, quantity: newQuantity, averageCost: newAverage, updatedAt: now };
    } else {
      lot = { sandboxId: sandbox.id, symbol, quantity, averageCost: price, updatedAt: now };
    }

    return {
      sandboxId: sandbox.id,
      symbol,
      cashBalance: sandbox.cashBalance.minus(totalCost),
      lot,
      transaction: this.buildTransaction(sandbox.id, symbol, TradeSide.BUY, quantity, price, null, now),
    };
  }

  private planSell(sandbox: Sandbox, symbol: string, quantity: Decimal, price: Decimal): TradeCommit {
    const existing = this.ledger.getLot(sandbox.id, symbol);
    const owned = existing ? existing.quantity : ZERO;
    if (!existing || owned.lessThan(quantity)) {
      throw new InsufficientSharesException(symbol, owned, quantity);
    }

    const now = this.clock.now();
    const remaining = owned.minus(quantity);
    const lot: Lot | null = isDust(remaining) ? null : { ...existing, quantity: remaining, updatedAt: now };
    const realizedPnl = price.minus(existing.averageCost).times(quantity);

    return {
      sandboxId: sandbox.id,
      symbol,
      cashBalance: sandbox.cashBalance.plus(price.times(quantity)),
      lot,
      transaction: this.buildTransaction(sandbox.id, symbol, TradeSide.SELL, quantity, price, realizedPnl, now),
    };
  }

  private buildTransaction(
    sandboxId: string,
    symbol: string,
    side: TradeSide,
    quantity: Decimal,
    price: Decimal,
    realizedPnl: Decimal | null,
    executedAt: Date,
  ): SandboxTransaction {
    return {
      id: uuidv4(),
      sequence: this.ledger.nextSequence(),
      sandboxId,
      symbol,
      side,
      quantity,
      price,
      realizedPnl,
      executedAt,
    };
  }

  // The trade is already committed; a snapshot failure only costs a
  // point on the curve.
  private async snapshotAfterTrade(sandboxId: string): Promise<void> {
    try {
      const sandbox = this.ledger.getSandbox(sandboxId);
      if (!sandbox) {
        return;
      }
      const valuation = await this.valuation.valueSandbox(sandbox, this.ledger.getLots(sandboxId));
      this.history.recordSnapshot(valuation);
    } catch (err) {
      this.logger.warn(
        `Post-trade snapshot failed for sandbox ${sandboxId}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}

function requirePositive(value: DecimalInput | undefined): Decimal {
  if (value === undefined) {
    throw new InvalidQuantityException(ZERO);
  }
  const decimal = toDecimal(value);
  if (!decimal.isFinite() || !decimal.greaterThan(0)) {
    throw new InvalidQuantityException(decimal);
  }
  return decimal;
}
