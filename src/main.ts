#!/usr/bin/env node
import { env } from '@/config/env';
import { createContainer } from '@/config/dependencies';
import { loadDemoSeed } from '@/config/demoSeed';
import { logger } from '@/adapters/logging/LoggerFactory';
import { BankCli } from '@/cli/BankCli';
import { ConsoleOutput, ReadlinePrompt } from '@/cli/readlinePrompt';

/**
 * CLI Entry Point
 * Wires the bank, optionally seeds demo data, and runs the menu loop
 */
async function main(): Promise<void> {
  const container = createContainer();

  if (env.SEED_DEMO_DATA) {
    const summary = container.seedService.apply(loadDemoSeed());
    logger.info({ ...summary }, 'Demo data loaded');
  }

  const prompt = new ReadlinePrompt();
  const output = new ConsoleOutput();

  // Ctrl+C closes input; the loop sees end of input and leaves normally
  process.on('SIGINT', () => {
    logger.info('SIGINT received, closing input');
    prompt.close();
  });

  const cli = new BankCli({
    userService: container.userService,
    bankService: container.bankService,
    ledgerService: container.ledgerService,
    prompt,
    output,
  });

  await cli.run();
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Failed to start');
    process.exit(1);
  });
