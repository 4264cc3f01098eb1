import { COMMANDS, Command } from '@/constants/commands';
import { ValidationError } from '@/errors';
import { Outcome, ok, fail } from '@/utils/outcome';

const COMMAND_TOKENS: ReadonlySet<string> = new Set(Object.values(COMMANDS));

function isCommand(token: string): token is Command {
  return COMMAND_TOKENS.has(token);
}

/**
 * Map a typed token to a command
 * Case and surrounding whitespace are ignored
 */
export function parseCommand(token: string): Outcome<Command, ValidationError> {
  const normalized = token.trim().toLowerCase();
  if (!isCommand(normalized)) {
    return fail(new ValidationError('Invalid option. Please try again.'));
  }
  return ok(normalized);
}
