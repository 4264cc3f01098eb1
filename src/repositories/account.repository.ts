import { Account, OpenAccountInput } from '@/models';
import { MONEY } from '@/config/businessRules';
import { ERROR_CODES } from '@/constants/ledger';
import { NotFoundError } from '@/errors';
import { IAccountRepository } from './interfaces/IAccountRepository';

/**
 * Account Repository
 * In-memory store; Map insertion order doubles as creation order
 */
export class AccountRepository implements IAccountRepository {
  private accounts = new Map<number, Account>();
  private lastNumber = 0;

  create(input: OpenAccountInput): Account {
    this.lastNumber += 1;

    return this.store({
      branchCode: input.branchCode,
      number: this.lastNumber,
      owner: input.owner,
      balance: MONEY.ZERO,
      transactions: [],
      withdrawalsToday: 0,
      lastWithdrawalAt: null,
    });
  }

  findByNumber(accountNumber: number): Account | null {
    return this.accounts.get(accountNumber) ?? null;
  }

  /**
   * Throws for numbers create() never handed out
   */
  update(account: Account): Account {
    if (!this.accounts.has(account.number)) {
      throw new NotFoundError(
        `Account ${account.number} not found`,
        ERROR_CODES.ACCOUNT_NOT_FOUND
      );
    }

    return this.store(account);
  }

  findAll(): IterableIterator<Account> {
    return this.accounts.values();
  }

  private store(account: Account): Account {
    const frozen = Object.freeze({
      ...account,
      transactions: Object.freeze([...account.transactions]),
    });
    this.accounts.set(frozen.number, frozen);
    return frozen;
  }
}
