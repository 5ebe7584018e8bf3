/**
 * Money helpers
 *
 * Prices travel as decimal numbers with two fraction digits; all arithmetic
 * happens on integer cents so that 19.99 * 3 is 59.97 and not 59.970000000000006.
 */

export type Cents = number;

export function toCents(amount: number): Cents {
  return Math.round(amount * 100);
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

export function multiplyMoney(unitPrice: number, quantity: number): number {
  return fromCents(toCents(unitPrice) * quantity);
}

export function sumMoney(amounts: readonly number[]): number {
  return fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));
}

export function hasAtMostTwoDecimals(amount: number): boolean {
  return Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
}

// PostgREST may render numeric columns as strings
export function parseMoney(value: number | string): number {
  return fromCents(toCents(typeof value === 'string' ? Number(value) : value));
}
