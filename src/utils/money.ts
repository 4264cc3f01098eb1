import Decimal from 'decimal.js';
import { env } from '@/config/env';
import { MONEY } from '@/config/businessRules';

/**
 * Decimal constructor for monetary arithmetic
 * decimal.js defaults to 20 significant digits; balances need more
 */
export const Money = Decimal.clone({
  precision: MONEY.PRECISION,
  rounding: Decimal.ROUND_HALF_UP,
});

/**
 * Normalize any monetary value to the canonical stored form
 * Rounds half-up to two fraction digits: "1500" → "1500.00"
 */
export function toMoney(value: Decimal.Value): string {
  return new Money(value)
    .toDecimalPlaces(MONEY.FRACTION_DIGITS, Decimal.ROUND_HALF_UP)
    .toFixed(MONEY.FRACTION_DIGITS);
}

/**
 * Format an amount for display: "R$ 1500.00"
 * Dot separator and two fraction digits regardless of how it was typed
 */
export function formatCurrency(
  value: Decimal.Value,
  symbol: string = env.CURRENCY_SYMBOL
): string {
  return `${symbol} ${toMoney(value)}`;
}
