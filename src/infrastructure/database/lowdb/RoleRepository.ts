// Role Repository - LowDB implementation
// Roles are reference data; `ensure` seeds them at startup

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseConnection, RoleRecord } from './connection.js';
import type { Role } from '@/domain/user/types.js';
import type { IRoleRepository } from '@/domain/user/repository.js';

export class RoleRepository implements IRoleRepository {
  constructor(private db: DatabaseConnection) {}

  async findByName(name: string): Promise<Role | null> {
    const role = this.db.getData().roles.find((r) => r.name === name);
    return role ? this.rowToRole(role) : null;
  }

  /**
   * Return the role, creating it when missing
   */
  async ensure(name: string): Promise<Role> {
    const record = await this.db.atomicUpdate((schema) => {
      const existing = schema.roles.find((r) => r.name === name);
      if (existing) return existing;

      const created: RoleRecord = {
        id: uuidv4(),
        name,
        created_at: new Date().toISOString(),
      };
      schema.roles.push(created);
      return created;
    });

    return this.rowToRole(record);
  }

  private rowToRole(row: RoleRecord): Role {
    return {
      id: row.id,
      name: row.name,
      createdAt: new Date(row.created_at),
    };
  }
}
