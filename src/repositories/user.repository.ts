import { User } from '@/models';
import { IUserRepository } from './interfaces/IUserRepository';

/**
 * User Repository
 * In-memory store keyed by national id, alive for one run
 */
export class UserRepository implements IUserRepository {
  private users = new Map<string, User>();

  findByNationalId(nationalId: string): User | null {
    return this.users.get(nationalId) ?? null;
  }

  create(user: User): User {
    if (this.users.has(user.nationalId)) {
      throw new Error(`User ${user.nationalId} already stored`);
    }

    const stored: User = Object.freeze({ ...user });
    this.users.set(stored.nationalId, stored);
    return stored;
  }
}
