import Decimal from 'decimal.js';
import { COMMANDS, Command } from '@/constants/commands';
import { Account } from '@/models';
import { AppError } from '@/errors';
import { UserService } from '@/services/user.service';
import { BankService } from '@/services/bank.service';
import { LedgerService } from '@/services/ledger.service';
import { parseAccountNumber, parseAmount } from '@/validators/input.validator';
import { formatCurrency } from '@/utils/money';
import { Outcome } from '@/utils/outcome';
import { IOutput, IPrompt } from './ports';
import { FAREWELL, NO_ACCOUNTS, renderAccountRow, renderFailure } from './presenter';

export type HandlerResult = 'continue' | 'quit';
export type CommandHandler = () => Promise<HandlerResult>;

export interface HandlerContext {
  userService: UserService;
  bankService: BankService;
  ledgerService: LedgerService;
  prompt: IPrompt;
  output: IOutput;
}

/**
 * Command → handler table
 *
 * Each handler asks for its own arguments, calls the services and prints
 * the outcome. Input that ends mid-command returns 'quit'.
 */
export function createHandlers(ctx: HandlerContext): Record<Command, CommandHandler> {
  const { userService, bankService, ledgerService, prompt, output } = ctx;

  // Prints the failure and yields null, so callers can bail out in one line
  function unwrap<T>(outcome: Outcome<T, AppError>): T | null {
    if (!outcome.success) {
      output.print(renderFailure(outcome.error));
      return null;
    }
    return outcome.value;
  }

  async function askAccount(): Promise<Account | null | undefined> {
    const text = await prompt.ask('Account number: ');
    if (text === null) return undefined;

    const accountNumber = unwrap(parseAccountNumber(text));
    if (accountNumber === null) return null;

    return unwrap(bankService.requireAccount(accountNumber));
  }

  async function askAmount(action: string): Promise<Decimal | null | undefined> {
    const text = await prompt.ask(`Amount to ${action}: `);
    if (text === null) return undefined;
    return unwrap(parseAmount(text));
  }

  function listAccounts(withBalance: boolean): HandlerResult {
    let rows = 0;
    for (const summary of bankService.listAccounts()) {
      output.print(renderAccountRow(summary, withBalance));
      rows += 1;
    }
    if (rows === 0) {
      output.print(NO_ACCOUNTS);
    }
    return 'continue';
  }

  return {
    [COMMANDS.DEPOSIT]: async () => {
      const account = await askAccount();
      if (account === undefined) return 'quit';
      if (account === null) return 'continue';

      const amount = await askAmount('deposit');
      if (amount === undefined) return 'quit';
      if (amount === null) return 'continue';

      const receipt = unwrap(ledgerService.deposit(account, amount));
      if (receipt) {
        output.print(
          `Deposit of ${formatCurrency(receipt.transaction.amount)} completed. ` +
            `Balance: ${formatCurrency(receipt.account.balance)}`
        );
      }
      return 'continue';
    },

    [COMMANDS.WITHDRAW]: async () => {
      const account = await askAccount();
      if (account === undefined) return 'quit';
      if (account === null) return 'continue';

      const amount = await askAmount('withdraw');
      if (amount === undefined) return 'quit';
      if (amount === null) return 'continue';

      const receipt = unwrap(ledgerService.withdraw(account, amount));
      if (receipt) {
        output.print(
          `Withdrawal of ${formatCurrency(receipt.transaction.amount)} completed. ` +
            `Balance: ${formatCurrency(receipt.account.balance)}. ` +
            `Withdrawals left today: ${receipt.withdrawalsRemaining}`
        );
      }
      return 'continue';
    },

    [COMMANDS.STATEMENT]: async () => {
      const account = await askAccount();
      if (account === undefined) return 'quit';
      if (account === null) return 'continue';

      const lines = unwrap(ledgerService.statement(account));
      lines?.forEach((line) => output.print(line));
      return 'continue';
    },

    [COMMANDS.NEW_USER]: async () => {
      const nationalId = await prompt.ask('National id: ');
      if (nationalId === null) return 'quit';
      const fullName = await prompt.ask('Full name: ');
      if (fullName === null) return 'quit';
      const birthDate = await prompt.ask('Birth date (dd/mm/yyyy): ');
      if (birthDate === null) return 'quit';
      const address = await prompt.ask('Address (street, number - district - city/state): ');
      if (address === null) return 'quit';

      const user = unwrap(userService.register({ fullName, birthDate, nationalId, address }));
      if (user) {
        output.print(`User ${user.fullName} registered.`);
      }
      return 'continue';
    },

    [COMMANDS.NEW_ACCOUNT]: async () => {
      const nationalId = await prompt.ask('Owner national id: ');
      if (nationalId === null) return 'quit';

      const account = unwrap(bankService.openAccount(nationalId));
      if (account) {
        output.print(
          `Account created. Branch: ${account.branchCode} | Account: ${account.number} | ` +
            `Holder: ${account.owner.fullName}`
        );
      }
      return 'continue';
    },

    [COMMANDS.LIST_ACCOUNTS]: async () => listAccounts(false),

    [COMMANDS.LIST_ACCOUNTS_DETAILED]: async () => listAccounts(true),

    [COMMANDS.QUIT]: async () => {
      output.print(FAREWELL);
      return 'quit';
    },
  };
}
