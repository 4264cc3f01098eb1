import { User } from '@/models';

/**
 * User Repository Interface
 * Defines the contract for user data access operations
 */
export interface IUserRepository {
  /**
   * Find a user by national id
   * @returns User or null if not found
   */
  findByNationalId(nationalId: string): User | null;

  /**
   * Store a new user
   * Callers check uniqueness first; the repository does not overwrite
   */
  create(user: User): User;
}
