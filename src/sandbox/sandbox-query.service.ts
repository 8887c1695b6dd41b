import { Injectable } from '@nestjs/common';
import { LedgerStorageService } from '../ledger/ledger-storage.service';
import { Sandbox } from '../ledger/entities/sandbox.entity';
import { SandboxTransaction } from '../ledger/entities/sandbox-transaction.entity';
import { AccessGuardService } from '../sharing/access-guard.service';
import { ShareStorageService } from '../sharing/share-storage.service';
import { ValuationService, SandboxValuation } from './valuation.service';
import { EquityHistoryService } from './equity-history.service';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { SandboxNotFoundException } from '../common/errors/sandbox.errors';
import { sum, toMoney, toNumber } from '../common/utils/decimal.util';
import { PortfolioResponseDto } from './dto/portfolio-response.dto';
import { SandboxSummaryDto, SharedSandboxSummaryDto } from './dto/sandbox-summary.dto';
import { TransactionResponseDto } from './dto/transaction-response.dto';

// Read-only operations for sandbox data.
// A portfolio view also writes the day's equity snapshot.
@Injectable()
export class SandboxQueryService {
  constructor(
    private readonly ledger: LedgerStorageService,
    private readonly shares: ShareStorageService,
    private readonly accessGuard: AccessGuardService,
    private readonly valuation: ValuationService,
    private readonly history: EquityHistoryService,
    private readonly mutex: KeyedMutex,
  ) {}

  /** Caller's own sandboxes with live total equity, newest first */
  async listSandboxes(ownerId: string): Promise<SandboxSummaryDto[]> {
    const sandboxes = this.ledger.getSandboxesByOwner(ownerId);
    const valuations = await this.valuation.valueSandboxes(
      sandboxes.map((sandbox) => ({ sandbox, lots: this.ledger.getLots(sandbox.id) })),
    );
    return sandboxes.map((sandbox, i) => toSummary(sandbox, valuations[i]));
  }

  /** Sandboxes other users shared with the caller, newest share first */
  async listSharedSandboxes(callerId: string): Promise<SharedSandboxSummaryDto[]> {
    const granted = this.shares.getSharesByGrantee(callerId).flatMap((share) => {
      const sandbox = this.ledger.getSandbox(share.sandboxId);
      return sandbox ? [{ share, sandbox }] : [];
    });

    const valuations = await this.valuation.valueSandboxes(
      granted.map(({ sandbox }) => ({ sandbox, lots: this.ledger.getLots(sandbox.id) })),
    );
    return granted.map(({ share, sandbox }, i): SharedSandboxSummaryDto => ({
      ...toSummary(sandbox, valuations[i]),
      permission: share.permission,
      shareId: share.id,
      ownerId: share.ownerId,
      isShared: true,
    }));
  }

  /**
   * Lots at live prices, cash, equity and the equity curve.
   * Watch access suffices. Never fails on market-data problems: prices
   * fall back to average cost and history to a flat curve.
   */
  async getPortfolio(callerId: string, sandboxId: string): Promise<PortfolioResponseDto> {
    const { sandbox, access } = this.accessGuard.require(sandboxId, callerId, 'watch');

    const curve = await this.history.equityCurve(sandbox);

    // value and record today's snapshot against a state no trade can change underneath
    const { current, valuation } = await this.mutex.runExclusive(sandboxId, async () => {
      const latest = this.ledger.getSandbox(sandboxId);
      if (!latest) {
        throw new SandboxNotFoundException(sandboxId);
      }
      const valued = await this.valuation.valueSandbox(latest, this.ledger.getLots(sandboxId));
      this.history.recordSnapshot(valued);
      return { current: latest, valuation: valued };
    });

    const liveCurve = this.history.withLivePoint(curve, valuation.totalEquity);
    const realized = sum(
      this.ledger
        .getTransactions(sandboxId)
        .flatMap((tx) => (tx.realizedPnl ? [tx.realizedPnl] : [])),
    );

    return {
      sandboxId: current.id,
      name: current.name,
      lots: valuation.lots.map((v) => ({
        symbol: v.lot.symbol,
        quantity: toNumber(v.lot.quantity),
        averageCost: toNumber(v.lot.averageCost),
        currentPrice: toNumber(v.price),
        priceSource: v.priceSource,
        currentValue: toNumber(v.currentValue),
        gainLoss: toNumber(v.gainLoss),
        gainLossPercent: toMoney(v.gainLossPercent),
      })),
      cash: toNumber(valuation.cash),
      initialCash: toNumber(current.initialCash),
      holdingsValue: toNumber(valuation.holdingsValue),
      totalEquity: toNumber(valuation.totalEquity),
      realizedPnl: toNumber(realized),
      equityCurve: liveCurve.points,
      historyDegraded: liveCurve.source === 'fallback',
      ...(liveCurve.historyError !== undefined ? { historyError: liveCurve.historyError } : {}),
      permission: access.permission,
    };
  }

  /** Transaction log, newest first. Watch access suffices. */
  getTransactions(callerId: string, sandboxId: string): TransactionResponseDto[] {
    this.accessGuard.require(sandboxId, callerId, 'watch');
    return this.ledger.getTransactions(sandboxId).reverse().map(toTransactionResponse);
  }
}

function toSummary(sandbox: Sandbox, valuation: SandboxValuation): SandboxSummaryDto {
  return {
    id: sandbox.id,
    name: sandbox.name,
    cash: toNumber(sandbox.cashBalance),
    initialCash: toNumber(sandbox.initialCash),
    totalEquity: toNumber(valuation.totalEquity),
    createdAt: sandbox.createdAt.toISOString(),
  };
}

export function toTransactionResponse(tx: SandboxTransaction): TransactionResponseDto {
  return {
    id: tx.id,
    symbol: tx.symbol,
    side: tx.side,
    quantity: toNumber(tx.quantity),
    price: toNumber(tx.price),
    total: toNumber(tx.price.times(tx.quantity)),
    realizedPnl: tx.realizedPnl ? toNumber(tx.realizedPnl) : null,
    executedAt: tx.executedAt.toISOString(),
  };
}
