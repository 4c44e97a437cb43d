import { describe, expect, it } from 'vitest';
import {
  applyPercentDiscount,
  divideRoundHalfUp,
  fromCents,
  sumCents,
  toCents
} from '../src/lib/money.js';

describe('money', () => {
  it('parses decimal strings and numbers into cents', () => {
    expect(toCents('29.75')).toBe(2975);
    expect(toCents('35')).toBe(3500);
    expect(toCents(' 40.1 ')).toBe(4010);
    expect(toCents(12.5)).toBe(1250);
    expect(toCents('-1.50')).toBe(-150);
  });

  it('rounds the third fractional digit half-up', () => {
    expect(toCents('0.005')).toBe(1);
    expect(toCents('0.004')).toBe(0);
    expect(toCents('2.675')).toBe(268);
  });

  it('rejects text that is not a decimal amount', () => {
    expect(() => toCents('12,50')).toThrow(RangeError);
    expect(() => toCents('abc')).toThrow(RangeError);
    expect(() => toCents(Number.NaN)).toThrow(RangeError);
  });

  it('formats cents with two decimals', () => {
    expect(fromCents(2975)).toBe('29.75');
    expect(fromCents(5)).toBe('0.05');
    expect(fromCents(5000)).toBe('50.00');
    expect(fromCents(-150)).toBe('-1.50');
  });

  it('divides with half-up rounding', () => {
    expect(divideRoundHalfUp(5, 2)).toBe(3);
    expect(divideRoundHalfUp(4, 3)).toBe(1);
    expect(divideRoundHalfUp(85_000, 10_000)).toBe(9);
  });

  it('applies percentage discounts held in hundredths of a percent', () => {
    expect(applyPercentDiscount(3500, 1500)).toBe(2975);
    expect(applyPercentDiscount(10, 1500)).toBe(9);
    expect(applyPercentDiscount(999, 1500)).toBe(849);
    expect(applyPercentDiscount(4000, 0)).toBe(4000);
  });

  it('sums amounts', () => {
    expect(sumCents([5000, 4000, 3500])).toBe(12500);
    expect(sumCents([])).toBe(0);
  });
});
