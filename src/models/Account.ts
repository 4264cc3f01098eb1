import { User } from './User';
import { Transaction } from './Transaction';

/**
 * Bank account
 *
 * IMPORTANT: monetary fields are strings with two fraction digits.
 * Arithmetic goes through Decimal.js, never through JS numbers.
 * Stored accounts are frozen; a movement produces a new Account.
 */
export interface Account {
  readonly branchCode: string;
  readonly number: number; // Sequential, starting at 1
  readonly owner: User;
  readonly balance: string; // Never negative
  readonly transactions: readonly Transaction[]; // Chronological, append-only
  readonly withdrawalsToday: number; // Counted within the calendar day of lastWithdrawalAt
  readonly lastWithdrawalAt: Date | null;
}

/**
 * Account creation input
 * Everything else starts empty
 */
export interface OpenAccountInput {
  branchCode: string;
  owner: User;
}

/**
 * Row produced when listing accounts
 */
export interface AccountSummary {
  branchCode: string;
  number: number;
  holderName: string;
  nationalId: string;
  balance: string;
}
