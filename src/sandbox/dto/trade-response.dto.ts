// Response after executing a trade
export class TradeResponseDto {
  transactionId!: string;
  side!: string;
  symbol!: string;
  price!: number;                  // execution price
  quantity!: number;
  total!: number;                  // price × quantity
  newCashBalance!: number;
  realizedPnl!: number | null;     // sells only
  executedAt!: string;
}
