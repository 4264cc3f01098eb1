import { AppError } from './AppError';
import { ERROR_CODES } from '@/constants/ledger';

/**
 * Conflict Error (DUPLICATE_USER)
 * Raised when registering a national id that is already taken
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, ERROR_CODES.DUPLICATE_USER);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
