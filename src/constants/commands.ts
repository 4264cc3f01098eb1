/**
 * Menu commands
 * Keys are the tokens typed at the prompt
 */
export const COMMANDS = {
  DEPOSIT: 'd',
  WITHDRAW: 's',
  STATEMENT: 'e',
  NEW_USER: 'nu',
  NEW_ACCOUNT: 'nc',
  LIST_ACCOUNTS: 'lc',
  LIST_ACCOUNTS_DETAILED: 'lcx',
  QUIT: 'q',
} as const;

/**
 * Menu labels, in display order
 */
export const COMMAND_LABELS: Record<Command, string> = {
  [COMMANDS.DEPOSIT]: 'Deposit',
  [COMMANDS.WITHDRAW]: 'Withdraw',
  [COMMANDS.STATEMENT]: 'Statement',
  [COMMANDS.NEW_USER]: 'New user',
  [COMMANDS.NEW_ACCOUNT]: 'New account',
  [COMMANDS.LIST_ACCOUNTS]: 'List accounts',
  [COMMANDS.LIST_ACCOUNTS_DETAILED]: 'List accounts with balances',
  [COMMANDS.QUIT]: 'Quit',
};

// Type exports
export type Command = (typeof COMMANDS)[keyof typeof COMMANDS];
