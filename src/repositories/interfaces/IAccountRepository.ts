import { Account, OpenAccountInput } from '@/models';

/**
 * Account Repository Interface
 * Defines the contract for account data access operations
 */
export interface IAccountRepository {
  /**
   * Create an account with the next sequential number
   * Balance starts at zero with an empty log
   */
  create(input: OpenAccountInput): Account;

  /**
   * Find an account by number
   * @returns Account or null if not found
   */
  findByNumber(accountNumber: number): Account | null;

  /**
   * Replace the stored state of an existing account
   */
  update(account: Account): Account;

  /**
   * All accounts in creation order
   * Each call starts a fresh iteration
   */
  findAll(): IterableIterator<Account>;
}
