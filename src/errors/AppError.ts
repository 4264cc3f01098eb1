import { ErrorCode } from '@/constants/ledger';

/**
 * Base application error
 * Every failure a command can report is an AppError carrying its code
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
