/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IUserRepository';
export * from './IAccountRepository';
