import { User, RegisterUserInput } from '@/models';
import { ConflictError, ValidationError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IUserRepository } from '@/repositories/interfaces';
import { parseRegistration } from '@/validators/input.validator';
import { Outcome, ok, fail } from '@/utils/outcome';

const logger = createLogger('UserService');

/**
 * User Service
 * Registration and lookup of bank customers
 */
export class UserService {
  constructor(private userRepo: IUserRepository) {}

  /**
   * Register a new user
   *
   * Business Rules:
   * - Every field must be non-blank (values are trimmed)
   * - nationalId is unique across the registry
   */
  register(input: RegisterUserInput): Outcome<User, ValidationError | ConflictError> {
    const parsed = parseRegistration(input);
    if (!parsed.success) {
      logger.warn({ reason: parsed.error.message }, 'Registration rejected: invalid input');
      return parsed;
    }

    const data = parsed.value;
    if (this.userRepo.findByNationalId(data.nationalId)) {
      logger.warn({ nationalId: data.nationalId }, 'Registration rejected: duplicate user');
      return fail(
        new ConflictError(`A user with national id ${data.nationalId} already exists`)
      );
    }

    const user = this.userRepo.create(data);
    logger.info({ nationalId: user.nationalId }, 'User registered');
    return ok(user);
  }

  find(nationalId: string): User | null {
    return this.userRepo.findByNationalId(nationalId.trim());
  }
}
