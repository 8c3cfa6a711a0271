import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DatabaseConnection } from '../lowdb/connection.js';

describe('DatabaseConnection', () => {
  it('starts every in-memory connection from empty collections', async () => {
    const first = new DatabaseConnection({ path: ':memory:', inMemory: true });
    const second = new DatabaseConnection({ path: ':memory:', inMemory: true });
    await first.init();
    await second.init();

    await first.atomicUpdate((data) => {
      data.roles.push({ id: 'role-1', name: 'USER', created_at: '2026-03-01T00:00:00.000Z' });
    });

    expect(first.getData().roles).toHaveLength(1);
    expect(second.getData().roles).toHaveLength(0);
    expect(first.isInMemory()).toBe(true);
  });

  it('runs updates one at a time and bumps the version per write', async () => {
    const db = new DatabaseConnection({ path: ':memory:', inMemory: true });
    await db.init();
    const start = db.getVersion();

    const results = await Promise.all(
      [1, 2, 3].map((n) =>
        db.atomicUpdate((data) => {
          const seen = data.roles.length;
          data.roles.push({ id: `role-${n}`, name: `ROLE_${n}`, created_at: '2026-03-01T00:00:00.000Z' });
          return seen;
        })
      )
    );

    expect(results).toEqual([0, 1, 2]);
    expect(db.getVersion()).toBe(start + 3);
  });

  it('keeps working after a failed update', async () => {
    const db = new DatabaseConnection({ path: ':memory:', inMemory: true });
    await db.init();

    await expect(
      db.atomicUpdate(() => {
        throw new Error('rejected');
      })
    ).rejects.toThrow('rejected');

    await expect(db.atomicUpdate(() => 'ok')).resolves.toBe('ok');
  });

  it('persists to a JSON file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'book-network-db-'));
    const path = join(dir, 'nested', 'db.json');

    try {
      const db = new DatabaseConnection({ path });
      await db.init();
      await db.atomicUpdate((data) => {
        data.roles.push({ id: 'role-1', name: 'USER', created_at: '2026-03-01T00:00:00.000Z' });
      });
      await db.close();

      const stored: { roles: Array<{ name: string }> } = JSON.parse(await readFile(path, 'utf8'));
      expect(stored.roles.map((r) => r.name)).toEqual(['USER']);

      const reopened = new DatabaseConnection({ path });
      await reopened.init();
      expect(reopened.getData().roles).toHaveLength(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
