import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Sandbox } from './entities/sandbox.entity';
import { Lot } from './entities/lot.entity';
import { SandboxTransaction } from './entities/sandbox-transaction.entity';

/**
 * State change produced by one executed trade. `lot: null` removes the
 * holding of `symbol`.
 */
export interface TradeCommit {
  sandboxId: string;
  symbol: string;
  cashBalance: Decimal;
  lot: Lot | null;
  transaction: SandboxTransaction;
}

export function compareTransactions(a: SandboxTransaction, b: SandboxTransaction): number {
  const byTime = a.executedAt.getTime() - b.executedAt.getTime();
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

// In-memory ledger: sandboxes, their lots and their transaction logs.
// Reads hand out copies so callers cannot mutate stored rows.
@Injectable()
export class LedgerStorageService {
  private sandboxes: Map<string, Sandbox> = new Map();
  private lots: Map<string, Map<string, Lot>> = new Map();
  private transactions: Map<string, SandboxTransaction[]> = new Map();
  private sequence = 0;

  saveSandbox(sandbox: Sandbox): Sandbox {
    this.sandboxes.set(sandbox.id, { ...sandbox });
    if (!this.lots.has(sandbox.id)) {
      this.lots.set(sandbox.id, new Map());
    }
    if (!this.transactions.has(sandbox.id)) {
      this.transactions.set(sandbox.id, []);
    }
    return { ...sandbox };
  }

  getSandbox(sandboxId: string): Sandbox | undefined {
    const sandbox = this.sandboxes.get(sandboxId);
    return sandbox ? { ...sandbox } : undefined;
  }

  /** Owner's sandboxes, newest first */
  getSandboxesByOwner(ownerId: string): Sandbox[] {
    return Array.from(this.sandboxes.values())
      .filter((s) => s.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((s) => ({ ...s }));
  }

  getLot(sandboxId: string, symbol: string): Lot | undefined {
    const lot = this.lots.get(sandboxId)?.get(symbol);
    return lot ? { ...lot } : undefined;
  }

  getLots(sandboxId: string): Lot[] {
    const lots = this.lots.get(sandboxId);
    if (!lots) {
      return [];
    }
    return Array.from(lots.values())
      .sort((a, b) => a.symbol.localeCompare(b.symbol))
      .map((lot) => ({ ...lot }));
  }

  /** Transaction log in replay order (oldest first) */
  getTransactions(sandboxId: string): SandboxTransaction[] {
    return [...(this.transactions.get(sandboxId) ?? [])].sort(compareTransactions);
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /**
   * Applies cash, lot and log changes of one trade together.
   * Validation happens before any write.
   */
  commitTrade(commit: TradeCommit): void {
    const sandbox = this.sandboxes.get(commit.sandboxId);
    const lots = this.lots.get(commit.sandboxId);
    const log = this.transactions.get(commit.sandboxId);
    if (!sandbox || !lots || !log) {
      throw new Error(`Cannot commit trade: sandbox ${commit.sandboxId} does not exist`);
    }
    if (commit.lot && commit.lot.symbol !== commit.symbol) {
      throw new Error(`Lot symbol ${commit.lot.symbol} does not match trade symbol ${commit.symbol}`);
    }

    this.sandboxes.set(sandbox.id, { ...sandbox, cashBalance: commit.cashBalance });
    if (commit.lot) {
      lots.set(commit.symbol, { ...commit.lot });
    } else {
      lots.delete(commit.symbol);
    }
    log.push({ ...commit.transaction });
  }

  /** Removes the sandbox with its lots and transaction log. */
  deleteSandbox(sandboxId: string): boolean {
    const existed = this.sandboxes.delete(sandboxId);
    this.lots.delete(sandboxId);
    this.transactions.delete(sandboxId);
    return existed;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.sandboxes.clear();
    this.lots.clear();
    this.transactions.clear();
    this.sequence = 0;
  }
}
