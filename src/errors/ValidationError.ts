import { AppError } from './AppError';
import { ERROR_CODES } from '@/constants/ledger';

/**
 * Validation Error (INVALID_INPUT)
 * Raised when typed input cannot be parsed or a command is unknown
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, ERROR_CODES.INVALID_INPUT);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
