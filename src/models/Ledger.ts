import { Account } from './Account';
import { Transaction } from './Transaction';

/**
 * Result of a successful deposit or withdrawal
 */
export interface LedgerReceipt {
  account: Account;
  transaction: Transaction;
}

/**
 * Result of a successful withdrawal
 * Carries how many withdrawals are still allowed today
 */
export interface WithdrawalReceipt extends LedgerReceipt {
  withdrawalsRemaining: number;
}
