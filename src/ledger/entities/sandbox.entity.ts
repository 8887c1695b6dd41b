import Decimal from 'decimal.js';

// Simulated brokerage account. cashBalance is only ever written by the
// trade engine; initialCash never changes after creation.
export interface Sandbox {
  id: string;
  ownerId: string;
  name: string;
  cashBalance: Decimal;
  initialCash: Decimal;
  createdAt: Date;
}
