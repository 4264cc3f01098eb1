import { Account, AccountSummary } from '@/models';
import { env } from '@/config/env';
import { ERROR_CODES } from '@/constants/ledger';
import { NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IAccountRepository, IUserRepository } from '@/repositories/interfaces';
import { Outcome, ok, fail } from '@/utils/outcome';

const logger = createLogger('BankService');

function toSummary(account: Account): AccountSummary {
  return {
    branchCode: account.branchCode,
    number: account.number,
    holderName: account.owner.fullName,
    nationalId: account.owner.nationalId,
    balance: account.balance,
  };
}

/**
 * Bank Service
 * Account registry: opening, listing and lookup
 */
export class BankService {
  constructor(
    private accountRepo: IAccountRepository,
    private userRepo: IUserRepository,
    private branchCode: string = env.BRANCH_CODE
  ) {}

  /**
   * Open an account for a registered user
   *
   * The owner is checked before a number is allocated:
   * a rejected request leaves the sequence untouched.
   */
  openAccount(nationalId: string): Outcome<Account, NotFoundError> {
    const key = nationalId.trim();
    const owner = this.userRepo.findByNationalId(key);
    if (!owner) {
      logger.warn({ nationalId: key }, 'Account rejected: user not found');
      return fail(
        new NotFoundError(`No user found with national id ${key}`, ERROR_CODES.USER_NOT_FOUND)
      );
    }

    const account = this.accountRepo.create({ branchCode: this.branchCode, owner });
    logger.info(
      { accountNumber: account.number, branchCode: account.branchCode, nationalId: key },
      'Account opened'
    );
    return ok(account);
  }

  /**
   * Summaries of every account in creation order
   * Lazy: rows are built while iterating, and every loop starts over
   */
  listAccounts(): Iterable<AccountSummary> {
    const accountRepo = this.accountRepo;
    return {
      *[Symbol.iterator]() {
        for (const account of accountRepo.findAll()) {
          yield toSummary(account);
        }
      },
    };
  }

  findByNumber(accountNumber: number): Account | null {
    return this.accountRepo.findByNumber(accountNumber);
  }

  requireAccount(accountNumber: number): Outcome<Account, NotFoundError> {
    const account = this.accountRepo.findByNumber(accountNumber);
    if (!account) {
      return fail(
        new NotFoundError(`Account ${accountNumber} not found`, ERROR_CODES.ACCOUNT_NOT_FOUND)
      );
    }
    return ok(account);
  }
}
