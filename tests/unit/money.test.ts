import { describe, it, expect } from 'vitest';
import {
  fromCents,
  hasAtMostTwoDecimals,
  multiplyMoney,
  parseMoney,
  sumMoney,
  toCents,
} from '../../src/utils/money';

describe('money', () => {
  it('converts between amounts and cents', () => {
    expect(toCents(10.1)).toBe(1010);
    expect(toCents(19.99)).toBe(1999);
    expect(fromCents(4500)).toBe(45);
  });

  it('multiplies a unit price without float drift', () => {
    expect(multiplyMoney(19.99, 3)).toBe(59.97);
    expect(multiplyMoney(0.1, 3)).toBe(0.3);
  });

  it('sums amounts in cents', () => {
    expect(sumMoney([0.1, 0.2])).toBe(0.3);
    expect(sumMoney([20, 25])).toBe(45);
    expect(sumMoney([])).toBe(0);
  });

  it('accepts at most two fraction digits', () => {
    expect(hasAtMostTwoDecimals(10)).toBe(true);
    expect(hasAtMostTwoDecimals(19.99)).toBe(true);
    expect(hasAtMostTwoDecimals(10.555)).toBe(false);
  });

  it('parses numeric columns rendered as strings', () => {
    expect(parseMoney('45.00')).toBe(45);
    expect(parseMoney('19.99')).toBe(19.99);
    expect(parseMoney(7.5)).toBe(7.5);
  });
});
