// Activation Token Repository - LowDB implementation

import { v4 as uuidv4 } from 'uuid';
import type { ActivationTokenRecord, DatabaseConnection } from './connection.js';
import type { ActivationToken } from '@/domain/user/types.js';
import type { IActivationTokenRepository } from '@/domain/user/repository.js';

export class ActivationTokenRepository implements IActivationTokenRepository {
  constructor(private db: DatabaseConnection) {}

  async createWithUniqueCode(
    generateCode: () => string,
    data: Omit<ActivationToken, 'id' | 'token' | 'validatedAt'>,
    maxAttempts: number
  ): Promise<ActivationToken | null> {
    const record = await this.db.atomicUpdate((schema) => {
      const pending = new Set(
        schema.activationTokens.filter((t) => t.validated_at === null).map((t) => t.token)
      );

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const code = generateCode();
        if (pending.has(code)) continue;

        const created: ActivationTokenRecord = {
          id: uuidv4(),
          token: code,
          user_id: data.userId,
          created_at: data.createdAt.toISOString(),
          expired_at: data.expiredAt.toISOString(),
          validated_at: null,
        };
        schema.activationTokens.push(created);
        return created;
      }
      return null;
    });

    return record ? this.rowToToken(record) : null;
  }

  /**
   * Codes are short, so an old validated code may repeat: the newest row wins
   */
  async findByToken(token: string): Promise<ActivationToken | null> {
    const rows = this.db.getData().activationTokens;
    for (let i = rows.length - 1; i >= 0; i--) {
      if (rows[i].token === token) {
        return this.rowToToken(rows[i]);
      }
    }
    return null;
  }

  getStats(): { pendingTokens: number; validatedTokens: number } {
    const tokens = this.db.getData().activationTokens;
    const validated = tokens.filter((t) => t.validated_at !== null).length;
    return { pendingTokens: tokens.length - validated, validatedTokens: validated };
  }

  async activate(tokenId: string, validatedAt: Date): Promise<boolean> {
    return this.db.atomicUpdate((schema) => {
      const token = schema.activationTokens.find((t) => t.id === tokenId);
      if (!token) return false;

      const user = schema.users.find((u) => u.id === token.user_id);
      if (!user) return false;

      const at = validatedAt.toISOString();
      user.enabled = 1;
      user.last_modified_at = at;
      token.validated_at = at;
      return true;
    });
  }

  async deleteByUserId(userId: string): Promise<number> {
    return this.db.atomicUpdate((schema) => {
      const before = schema.activationTokens.length;
      schema.activationTokens = schema.activationTokens.filter((t) => t.user_id !== userId);
      return before - schema.activationTokens.length;
    });
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    return this.db.atomicUpdate((schema) => {
      const disabledUsers = new Set(schema.users.filter((u) => u.enabled === 0).map((u) => u.id));

      // Rows are appended in creation order: the last one per user is its newest
      const newestForDisabled = new Map<string, string>();
      for (const t of schema.activationTokens) {
        if (disabledUsers.has(t.user_id)) newestForDisabled.set(t.user_id, t.id);
      }
      const kept = new Set(newestForDisabled.values());

      const before = schema.activationTokens.length;
      schema.activationTokens = schema.activationTokens.filter(
        (t) =>
          t.validated_at !== null ||
          kept.has(t.id) ||
          Date.parse(t.expired_at) >= cutoff.getTime()
      );
      schema._lastCleanup = new Date().toISOString();
      return before - schema.activationTokens.length;
    });
  }

  private rowToToken(row: ActivationTokenRecord): ActivationToken {
    return {
      id: row.id,
      token: row.token,
      userId: row.user_id,
      createdAt: new Date(row.created_at),
      expiredAt: new Date(row.expired_at),
      validatedAt: row.validated_at ? new Date(row.validated_at) : null,
    };
  }
}
