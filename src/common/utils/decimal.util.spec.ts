import Decimal from 'decimal.js';
import { isDust, sum, toDecimal, toMoney, toNumber, toUSD } from './decimal.util';

describe('decimal utils', () => {
  it('should add without floating point drift', () => {
    expect(sum([toDecimal(0.1), toDecimal(0.2)]).toString()).toBe('0.3');
  });

  it('should round money half up to cents', () => {
    expect(toMoney(new Decimal('10.005'))).toBe(10.01);
    expect(toUSD(new Decimal('1234.5'))).toBe('1234.50');
  });

  it('should keep eight decimals for quantities', () => {
    expect(toNumber(new Decimal('2.123456789'))).toBe(2.12345679);
  });

  it('should treat remainders at or below one millionth as dust', () => {
    expect(isDust(new Decimal('0.000001'))).toBe(true);
    expect(isDust(new Decimal('0'))).toBe(true);
    expect(isDust(new Decimal('0.0000011'))).toBe(false);
  });
});
