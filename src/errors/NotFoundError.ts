import { AppError } from './AppError';
import { ERROR_CODES } from '@/constants/ledger';

type NotFoundCode = typeof ERROR_CODES.USER_NOT_FOUND | typeof ERROR_CODES.ACCOUNT_NOT_FOUND;

/**
 * Not Found Error
 * Raised when a requested user or account doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message: string, code: NotFoundCode) {
    super(message, code);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
