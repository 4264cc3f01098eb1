import Decimal from 'decimal.js';
import { Account, Transaction, LedgerReceipt, WithdrawalReceipt } from '@/models';
import { WITHDRAWAL_LIMITS } from '@/config/businessRules';
import { TRANSACTION_KINDS, ERROR_CODES } from '@/constants/ledger';
import { BusinessRuleError, NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IAccountRepository } from '@/repositories/interfaces';
import { IClock } from '@/interfaces/IClock';
import { Outcome, ok, fail } from '@/utils/outcome';
import { Money, toMoney, formatCurrency } from '@/utils/money';
import { formatTimestamp, isSameCalendarDay } from '@/utils/date';

const logger = createLogger('LedgerService');

export const STATEMENT_EMPTY_NOTICE = 'No movements were recorded.';

/**
 * Ledger Service
 * Deposit, withdrawal and statement rules for a single account
 *
 * Accounts are passed as handles: every operation re-reads the stored
 * state by number before applying a movement.
 */
export class LedgerService {
  constructor(
    private accountRepo: IAccountRepository,
    private clock: IClock
  ) {}

  /**
   * Deposit into an account
   *
   * Business Rules:
   * - Amount must be > 0 (after rounding to cents)
   */
  deposit(
    handle: Account,
    amount: Decimal.Value
  ): Outcome<LedgerReceipt, BusinessRuleError | NotFoundError> {
    const current = this.load(handle);
    if (!current.success) {
      return current;
    }
    const account = current.value;
    const value = new Money(toMoney(amount));

    if (value.lte(0)) {
      logger.warn(
        { accountNumber: account.number, amount: value.toFixed(2) },
        'Deposit rejected: invalid amount'
      );
      return fail(
        new BusinessRuleError('Deposits must be greater than zero', ERROR_CODES.INVALID_AMOUNT)
      );
    }

    const transaction: Transaction = {
      kind: TRANSACTION_KINDS.DEPOSIT,
      amount: toMoney(value),
      timestamp: this.clock.now(),
    };

    const updated = this.accountRepo.update({
      ...account,
      balance: toMoney(new Money(account.balance).plus(value)),
      transactions: [...account.transactions, transaction],
    });

    logger.info(
      { accountNumber: updated.number, amount: transaction.amount, balance: updated.balance },
      'Deposit recorded'
    );
    return ok({ account: updated, transaction });
  }

  /**
   * Withdraw from an account
   *
   * Business Rules, first match wins:
   * 1. Amount must be > 0
   * 2. Amount must not exceed the balance
   * 3. Amount must not exceed WITHDRAWAL_LIMITS.MAX_AMOUNT_PER_OPERATION
   * 4. Fewer than WITHDRAWAL_LIMITS.MAX_PER_DAY withdrawals today
   */
  withdraw(
    handle: Account,
    amount: Decimal.Value
  ): Outcome<WithdrawalReceipt, BusinessRuleError | NotFoundError> {
    const current = this.load(handle);
    if (!current.success) {
      return current;
    }
    const account = current.value;
    const value = new Money(toMoney(amount));
    const now = this.clock.now();
    const countedToday = this.countWithdrawalsToday(account, now);

    const rejection = this.checkWithdrawal(account, value, countedToday);
    if (rejection) {
      logger.warn(
        {
          accountNumber: account.number,
          amount: value.toFixed(2),
          code: rejection.code,
          withdrawalsToday: countedToday,
        },
        'Withdrawal rejected'
      );
      return fail(rejection);
    }

    const transaction: Transaction = {
      kind: TRANSACTION_KINDS.WITHDRAWAL,
      amount: toMoney(value),
      timestamp: now,
    };

    const updated = this.accountRepo.update({
      ...account,
      balance: toMoney(new Money(account.balance).minus(value)),
      transactions: [...account.transactions, transaction],
      withdrawalsToday: countedToday + 1,
      lastWithdrawalAt: now,
    });

    const withdrawalsRemaining = WITHDRAWAL_LIMITS.MAX_PER_DAY - updated.withdrawalsToday;

    logger.info(
      {
        accountNumber: updated.number,
        amount: transaction.amount,
        balance: updated.balance,
        withdrawalsRemaining,
      },
      'Withdrawal recorded'
    );
    return ok({ account: updated, transaction, withdrawalsRemaining });
  }

  /**
   * Printable statement: movements in order, then the balance
   * An empty log prints STATEMENT_EMPTY_NOTICE instead of entries
   */
  statement(handle: Account): Outcome<string[], NotFoundError> {
    const current = this.load(handle);
    if (!current.success) {
      return current;
    }
    const account = current.value;

    const entries =
      account.transactions.length === 0
        ? [STATEMENT_EMPTY_NOTICE]
        : account.transactions.map(
            (t) => `${formatTimestamp(t.timestamp)} - ${t.kind}: ${formatCurrency(t.amount)}`
          );

    logger.debug(
      { accountNumber: account.number, entries: account.transactions.length },
      'Statement rendered'
    );

    return ok([
      '=== STATEMENT ===',
      `Branch: ${account.branchCode}  Account: ${account.number}  Holder: ${account.owner.fullName}`,
      ...entries,
      '-----------------------------',
      `Balance: ${formatCurrency(account.balance)}`,
      '=================',
    ]);
  }

  /**
   * Withdrawals that count against today's limit
   * The stored counter belongs to the day of lastWithdrawalAt; any other day starts at zero
   */
  countWithdrawalsToday(account: Account, now: Date = this.clock.now()): number {
    if (!account.lastWithdrawalAt || !isSameCalendarDay(account.lastWithdrawalAt, now)) {
      return 0;
    }
    return account.withdrawalsToday;
  }

  private checkWithdrawal(
    account: Account,
    value: Decimal,
    countedToday: number
  ): BusinessRuleError | null {
    if (value.lte(0)) {
      return new BusinessRuleError(
        'Withdrawals must be greater than zero',
        ERROR_CODES.INVALID_AMOUNT
      );
    }
    if (value.gt(account.balance)) {
      return new BusinessRuleError(
        'Insufficient funds for this withdrawal',
        ERROR_CODES.INSUFFICIENT_FUNDS
      );
    }
    if (value.gt(WITHDRAWAL_LIMITS.MAX_AMOUNT_PER_OPERATION)) {
      return new BusinessRuleError(
        `The maximum per withdrawal is ${formatCurrency(WITHDRAWAL_LIMITS.MAX_AMOUNT_PER_OPERATION)}`,
        ERROR_CODES.LIMIT_EXCEEDED
      );
    }
    if (countedToday >= WITHDRAWAL_LIMITS.MAX_PER_DAY) {
      return new BusinessRuleError(
        `Daily withdrawal limit reached (${WITHDRAWAL_LIMITS.MAX_PER_DAY} per day)`,
        ERROR_CODES.DAILY_LIMIT_REACHED
      );
    }
    return null;
  }

  private load(handle: Account): Outcome<Account, NotFoundError> {
    const account = this.accountRepo.findByNumber(handle.number);
    if (!account) {
      return fail(
        new NotFoundError(`Account ${handle.number} not found`, ERROR_CODES.ACCOUNT_NOT_FOUND)
      );
    }
    return ok(account);
  }
}
