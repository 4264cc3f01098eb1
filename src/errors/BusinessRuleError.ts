import { AppError } from './AppError';
import { ERROR_CODES } from '@/constants/ledger';

type BusinessRuleCode =
  | typeof ERROR_CODES.INVALID_AMOUNT
  | typeof ERROR_CODES.INSUFFICIENT_FUNDS
  | typeof ERROR_CODES.LIMIT_EXCEEDED
  | typeof ERROR_CODES.DAILY_LIMIT_REACHED;

/**
 * Business Rule Error
 * Raised when input is well formed but violates a ledger rule
 * Examples: insufficient funds, withdrawal above the per-operation cap
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, code: BusinessRuleCode) {
    super(message, code);
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
