import { parseCommand } from '@/cli/commands';
import { renderMenu } from '@/cli/presenter';
import { COMMANDS } from '@/constants/commands';
import { ERROR_CODES } from '@/constants/ledger';
import { expectOk, expectFail } from '@/tests/utils/outcome';

describe('parseCommand', () => {
  it.each(Object.values(COMMANDS))('should accept %p', (token) => {
    expect(expectOk(parseCommand(token))).toBe(token);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(expectOk(parseCommand('  LCX '))).toBe(COMMANDS.LIST_ACCOUNTS_DETAILED);
  });

  it.each(['', 'x', 'deposit', 'l c'])('should reject %p with INVALID_INPUT', (token) => {
    const error = expectFail(parseCommand(token));

    expect(error.code).toBe(ERROR_CODES.INVALID_INPUT);
    expect(error.message).toBe('Invalid option. Please try again.');
  });
});

describe('renderMenu', () => {
  it('should list every command in order', () => {
    expect(renderMenu()).toEqual([
      '',
      'Choose an option:',
      '[d] Deposit',
      '[s] Withdraw',
      '[e] Statement',
      '[nu] New user',
      '[nc] New account',
      '[lc] List accounts',
      '[lcx] List accounts with balances',
      '[q] Quit',
    ]);
  });
});
