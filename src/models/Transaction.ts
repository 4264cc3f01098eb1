import { TransactionKind } from '@/constants/ledger';

/**
 * Ledger entry
 * Immutable once appended to an account's log
 */
export interface Transaction {
  readonly kind: TransactionKind;
  readonly amount: string; // Always > 0, two fraction digits
  readonly timestamp: Date;
}
