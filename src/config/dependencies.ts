/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * This is the single source of truth for dependency injection.
 * Every call builds a fresh, empty bank: state lives in the container,
 * never at module level.
 */

import { IClock } from '@/interfaces/IClock';
import { SystemClock } from '@/adapters/clock/SystemClock';

// Repository implementations
import { UserRepository } from '@/repositories/user.repository';
import { AccountRepository } from '@/repositories/account.repository';

// Service implementations
import { UserService } from '@/services/user.service';
import { BankService } from '@/services/bank.service';
import { LedgerService } from '@/services/ledger.service';
import { SeedService } from '@/services/seed.service';

export interface Container {
  userService: UserService;
  bankService: BankService;
  ledgerService: LedgerService;
  seedService: SeedService;
}

export function createContainer(clock: IClock = new SystemClock()): Container {
  // ==========================================================================
  // REPOSITORIES
  // ==========================================================================
  const userRepository = new UserRepository();
  const accountRepository = new AccountRepository();

  // ==========================================================================
  // SERVICES
  // ==========================================================================
  const userService = new UserService(userRepository);
  const bankService = new BankService(accountRepository, userRepository);
  const ledgerService = new LedgerService(accountRepository, clock);
  const seedService = new SeedService(userService, bankService);

  return { userService, bankService, ledgerService, seedService };
}
