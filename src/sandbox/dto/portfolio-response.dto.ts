import { AccessLevel } from '../../sharing/entities/share.entity';
import { PriceSource } from '../../market-price/market-price.service';

// Current lot marked to market
export class LotDto {
  symbol!: string;
  quantity!: number;
  averageCost!: number;            // weighted average purchase price
  currentPrice!: number;
  priceSource!: PriceSource;       // fallback = valued at average cost
  currentValue!: number;
  gainLoss!: number;
  gainLossPercent!: number;
}

export class EquityPointDto {
  timestamp!: number;              // ms since epoch
  value!: number;
}

// Complete sandbox view
export class PortfolioResponseDto {
  sandboxId!: string;
  name!: string;
  lots!: LotDto[];
  cash!: number;
  initialCash!: number;
  holdingsValue!: number;
  totalEquity!: number;
  realizedPnl!: number;            // sum over sells
  equityCurve!: EquityPointDto[];
  historyDegraded!: boolean;       // true when equityCurve is the flat fallback
  historyError?: string;
  permission!: AccessLevel;
}
