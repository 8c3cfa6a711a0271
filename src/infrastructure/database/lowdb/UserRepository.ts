// User Repository - LowDB implementation
// Handles account persistence with JSON file storage

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseConnection, UserRecord } from './connection.js';
import type { User } from '@/domain/user/types.js';
import type { IUserRepository, NewUser } from '@/domain/user/repository.js';

export class UserRepository implements IUserRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Insert the user unless the email (case-insensitive) is taken.
   * The lookup and the insert happen in one store update.
   */
  async createIfEmailFree(data: NewUser): Promise<User | null> {
    const record: UserRecord = {
      id: uuidv4(),
      firstname: data.firstname,
      lastname: data.lastname,
      email: data.email,
      password_hash: data.passwordHash,
      enabled: data.enabled ? 1 : 0,
      account_locked: data.accountLocked ? 1 : 0,
      roles: [...data.roles],
      created_at: new Date().toISOString(),
      last_modified_at: null,
    };

    const inserted = await this.db.atomicUpdate((schema) => {
      const needle = data.email.toLowerCase();
      if (schema.users.some((u) => u.email.toLowerCase() === needle)) return false;

      schema.users.push(record);
      return true;
    });

    return inserted ? this.rowToUser(record) : null;
  }

  /**
   * Get user by ID
   */
  async findById(id: string): Promise<User | null> {
    const user = this.db.getData().users.find((u) => u.id === id);
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Get user by email (case-insensitive)
   */
  async findByEmail(email: string): Promise<User | null> {
    const user = this.findRecordByEmail(email);
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Update user
   */
  async update(
    id: string,
    updates: Partial<Omit<User, 'id' | 'createdAt'>>
  ): Promise<boolean> {
    return this.db.atomicUpdate((schema) => {
      const user = schema.users.find((u) => u.id === id);
      if (!user) return false;

      if (updates.firstname !== undefined) user.firstname = updates.firstname;
      if (updates.lastname !== undefined) user.lastname = updates.lastname;
      if (updates.email !== undefined) user.email = updates.email;
      if (updates.passwordHash !== undefined) user.password_hash = updates.passwordHash;
      if (updates.enabled !== undefined) user.enabled = updates.enabled ? 1 : 0;
      if (updates.accountLocked !== undefined) user.account_locked = updates.accountLocked ? 1 : 0;
      if (updates.roles !== undefined) user.roles = [...updates.roles];
      user.last_modified_at = new Date().toISOString();

      return true;
    });
  }

  /**
   * Delete user
   */
  async delete(id: string): Promise<boolean> {
    return this.db.atomicUpdate((schema) => {
      const idx = schema.users.findIndex((u) => u.id === id);
      if (idx === -1) return false;

      schema.users.splice(idx, 1);
      return true;
    });
  }

  /**
   * Get user statistics
   */
  getStats(): { totalUsers: number; enabledUsers: number } {
    const users = this.db.getData().users;
    return {
      totalUsers: users.length,
      enabledUsers: users.filter((u) => u.enabled === 1).length,
    };
  }

  private findRecordByEmail(email: string): UserRecord | undefined {
    const needle = email.toLowerCase();
    return this.db.getData().users.find((u) => u.email.toLowerCase() === needle);
  }

  private rowToUser(row: UserRecord): User {
    return {
      id: row.id,
      firstname: row.firstname,
      lastname: row.lastname,
      email: row.email,
      passwordHash: row.password_hash,
      enabled: row.enabled === 1,
      accountLocked: row.account_locked === 1,
      roles: [...row.roles],
      createdAt: new Date(row.created_at),
      lastModifiedAt: row.last_modified_at ? new Date(row.last_modified_at) : null,
    };
  }
}
