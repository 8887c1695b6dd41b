import Decimal from 'decimal.js';
import { DayKey } from '../../common/utils/date.util';

// One equity sample per sandbox per calendar day.
export interface EquitySnapshot {
  sandboxId: string;
  date: DayKey;
  totalEquity: Decimal;       // cash + holdingsValue
  cash: Decimal;
  holdingsValue: Decimal;
  writtenAt: Date;
}
