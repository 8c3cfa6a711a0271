// Domain: User repository interfaces
// Defines the contract for account, role and activation code persistence

import type { ActivationToken, Role, User } from './types.js';

export type NewUser = Omit<User, 'id' | 'createdAt' | 'lastModifiedAt'>;

/**
 * Repository interface for User persistence
 * Implemented by infrastructure layer (LowDB, SQL, etc.)
 */
export interface IUserRepository {
  /** Returns null when the email is already registered */
  createIfEmailFree(data: NewUser): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  update(id: string, updates: Partial<Omit<User, 'id' | 'createdAt'>>): Promise<boolean>;
  delete(id: string): Promise<boolean>;
}

/**
 * Roles are reference data seeded when the store is initialized
 */
export interface IRoleRepository {
  findByName(name: string): Promise<Role | null>;
  ensure(name: string): Promise<Role>;
}

export interface IActivationTokenRepository {
  /**
   * Draws codes from `generateCode` until one matches no pending token, then
   * inserts it, all in one store update. Returns null after `maxAttempts` draws.
   */
  createWithUniqueCode(
    generateCode: () => string,
    data: Omit<ActivationToken, 'id' | 'token' | 'validatedAt'>,
    maxAttempts: number
  ): Promise<ActivationToken | null>;
  findByToken(token: string): Promise<ActivationToken | null>;
  /**
   * Marks the token validated and enables its owner in a single write.
   * Returns false when the token or its user no longer exists.
   */
  activate(tokenId: string, validatedAt: Date): Promise<boolean>;
  deleteByUserId(userId: string): Promise<number>;
  /**
   * Removes unvalidated tokens that expired before the cutoff. The newest
   * token of a still-disabled user is kept so the user can ask for a new one.
   */
  deleteExpiredBefore(cutoff: Date): Promise<number>;
}
