// One row of the sandbox transaction log
export class TransactionResponseDto {
  id!: string;
  symbol!: string;
  side!: string;
  quantity!: number;
  price!: number;
  total!: number;
  realizedPnl!: number | null;
  executedAt!: string;
}
