import Decimal from 'decimal.js';

// Current holding of one symbol in one sandbox.
// averageCost is the quantity-weighted purchase price, moved only by buys.
export interface Lot {
  sandboxId: string;
  symbol: string;
  quantity: Decimal;
  averageCost: Decimal;
  updatedAt: Date;
}
