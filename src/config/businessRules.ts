/**
 * Business Rules Configuration
 *
 * Centralized configuration for the ledger limits.
 * These values can be adjusted without touching validation schemas or service logic.
 */

/**
 * Withdrawal Limits
 *
 * - MAX_AMOUNT_PER_OPERATION: Caps the value of a single withdrawal
 * - MAX_PER_DAY: Number of withdrawals accepted per calendar day and account
 */
export const WITHDRAWAL_LIMITS = {
  /**
   * Maximum amount per withdrawal
   * Kept as a string: monetary values are never held in JS floats
   */
  MAX_AMOUNT_PER_OPERATION: '500.00',

  /**
   * Maximum withdrawals per calendar day
   * The counter restarts on the first withdrawal of a new local day
   */
  MAX_PER_DAY: 3,
} as const;

/**
 * Money Representation
 *
 * - FRACTION_DIGITS: Fraction digits kept for every stored amount
 * - MAX_INTEGER_DIGITS: Longest integer part accepted from typed input
 * - PRECISION: Significant digits used for balance arithmetic
 * - ZERO: Opening balance of every account
 */
export const MONEY = {
  FRACTION_DIGITS: 2,
  MAX_INTEGER_DIGITS: 15,
  PRECISION: 64,
  ZERO: '0.00',
} as const;

/**
 * Type exports for TypeScript safety
 */
export type WithdrawalLimits = typeof WITHDRAWAL_LIMITS;
export type MoneyRules = typeof MONEY;
