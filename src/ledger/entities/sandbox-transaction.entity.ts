import Decimal from 'decimal.js';

export enum TradeSide {
  BUY = 'BUY',
  SELL = 'SELL',
}

// Executed trade. Append-only; replaying the log from creation reproduces
// cash and lots. Ordered by executedAt, ties by sequence.
export interface SandboxTransaction {
  id: string;
  sequence: number;           // insertion order, unique per process
  sandboxId: string;
  symbol: string;
  side: TradeSide;
  quantity: Decimal;
  price: Decimal;
  realizedPnl: Decimal | null; // quantity × (price − avg cost) on sells
  executedAt: Date;
}
