import { COMMANDS, COMMAND_LABELS } from '@/constants/commands';
import { AccountSummary } from '@/models';
import { AppError } from '@/errors';
import { formatCurrency } from '@/utils/money';

export const WELCOME = 'Welcome to the Banking System';
export const FAREWELL = 'Closing. Thank you for using the Banking System.';
export const UNEXPECTED_ERROR = 'Unexpected error, please try again.';
export const NO_ACCOUNTS = 'No accounts registered.';

export function renderMenu(): string[] {
  const entries = Object.values(COMMANDS).map((token) => `[${token}] ${COMMAND_LABELS[token]}`);
  return ['', 'Choose an option:', ...entries];
}

export function renderFailure(error: AppError): string {
  return `Error: ${error.message}`;
}

export function renderAccountRow(summary: AccountSummary, withBalance: boolean): string {
  const row =
    `Branch: ${summary.branchCode} | Account: ${summary.number} | ` +
    `Holder: ${summary.holderName} (${summary.nationalId})`;
  return withBalance ? `${row} | Balance: ${formatCurrency(summary.balance)}` : row;
}
