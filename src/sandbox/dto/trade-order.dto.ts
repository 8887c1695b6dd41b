import { Transform } from 'class-transformer';
import { IsEnum, IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';
import { TradeSide } from '../../ledger/entities/sandbox-transaction.entity';

function upperCase({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? value.trim().toUpperCase() : value;
}

// Market order against a sandbox. Give a share quantity, or a cash amount
// to be converted at the execution price. Positivity is enforced by the
// trade engine so the caller gets an InvalidQuantity error.
export class TradeOrderDto {
  @Transform(upperCase)
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Transform(upperCase)
  @IsEnum(TradeSide)
  side!: TradeSide;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  quantity?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  amount?: number;
}
