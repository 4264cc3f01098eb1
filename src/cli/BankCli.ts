import { AppError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { parseCommand } from './commands';
import { Command } from '@/constants/commands';
import { CommandHandler, HandlerContext, HandlerResult, createHandlers } from './handlers';
import { UNEXPECTED_ERROR, WELCOME, renderFailure, renderMenu } from './presenter';

const logger = createLogger('cli');

/**
 * Interactive dispatch loop
 *
 * Strictly sequential: one command is read, handled and printed before
 * the next prompt. Ends on `q` or when input closes.
 */
export class BankCli {
  private handlers: Record<Command, CommandHandler>;

  constructor(private ctx: HandlerContext) {
    this.handlers = createHandlers(ctx);
  }

  async run(): Promise<void> {
    const { prompt, output } = this.ctx;
    output.print(WELCOME);

    for (;;) {
      renderMenu().forEach((line) => output.print(line));

      const token = await prompt.ask('> ');
      if (token === null) {
        logger.info('Input closed, leaving');
        break;
      }

      const command = parseCommand(token);
      if (!command.success) {
        output.print(renderFailure(command.error));
        continue;
      }

      logger.debug({ command: command.value }, 'Command dispatched');

      if ((await this.dispatch(command.value)) === 'quit') {
        break;
      }
    }

    prompt.close();
  }

  private async dispatch(command: Command): Promise<HandlerResult> {
    try {
      return await this.handlers[command]();
    } catch (error) {
      if (error instanceof AppError) {
        this.ctx.output.print(renderFailure(error));
        return 'continue';
      }

      logger.error(
        {
          command,
          error:
            error instanceof Error
              ? { name: error.name, message: error.message, stack: error.stack }
              : error,
        },
        'Command failed'
      );
      this.ctx.output.print(UNEXPECTED_ERROR);
      return 'continue';
    }
  }
}
