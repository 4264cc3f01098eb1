import { DemoSeed } from '@/validators/seed.validator';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { UserService } from './user.service';
import { BankService } from './bank.service';

const logger = createLogger('SeedService');

export interface SeedSummary {
  usersRegistered: number;
  accountsOpened: number;
}

/**
 * Seed Service
 * Pre-registers demo users and accounts through the public services
 */
export class SeedService {
  constructor(
    private userService: UserService,
    private bankService: BankService
  ) {}

  apply(seed: DemoSeed): SeedSummary {
    const summary: SeedSummary = { usersRegistered: 0, accountsOpened: 0 };

    for (const { accounts, ...user } of seed.users) {
      const registered = this.userService.register(user);
      if (!registered.success) {
        logger.warn(
          { nationalId: user.nationalId, reason: registered.error.message },
          'Seed user skipped'
        );
        continue;
      }
      summary.usersRegistered += 1;

      for (let i = 0; i < accounts; i++) {
        const opened = this.bankService.openAccount(registered.value.nationalId);
        if (opened.success) {
          summary.accountsOpened += 1;
        }
      }
    }

    logger.info({ ...summary }, 'Demo seed applied');
    return summary;
  }
}
