/**
 * Transaction kinds recorded in an account's log
 */
export const TRANSACTION_KINDS = {
  DEPOSIT: 'DEPOSIT',
  WITHDRAWAL: 'WITHDRAWAL',
} as const;

/**
 * Error codes surfaced to the dispatch loop
 * One per failure kind a command can report
 */
export const ERROR_CODES = {
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
  LIMIT_EXCEEDED: 'LIMIT_EXCEEDED',
  DAILY_LIMIT_REACHED: 'DAILY_LIMIT_REACHED',
  DUPLICATE_USER: 'DUPLICATE_USER',
  USER_NOT_FOUND: 'USER_NOT_FOUND',
  ACCOUNT_NOT_FOUND: 'ACCOUNT_NOT_FOUND',
  INVALID_INPUT: 'INVALID_INPUT',
  INTERNAL: 'INTERNAL',
} as const;

// Type exports
export type TransactionKind = (typeof TRANSACTION_KINDS)[keyof typeof TRANSACTION_KINDS];
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
