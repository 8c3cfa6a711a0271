// LowDB connection and database instance management
// JSON document storage with serialized, all-or-nothing updates

import { Low, Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

// Database schema definition with version field, incremented on every write
export interface DatabaseSchema {
  _version: number;
  _lastCleanup?: string;         // Last token cleanup timestamp
  users: UserRecord[];
  roles: RoleRecord[];
  activationTokens: ActivationTokenRecord[];
  books: BookRecord[];
  bookTransactions: BookTransactionRecord[];
}

export interface UserRecord {
  id: string;
  firstname: string;
  lastname: string;
  email: string;
  password_hash: string;
  enabled: number;
  account_locked: number;
  roles: string[];
  created_at: string;
  last_modified_at: string | null;
}

export interface RoleRecord {
  id: string;
  name: string;
  created_at: string;
}

export interface ActivationTokenRecord {
  id: string;
  token: string;
  user_id: string;
  created_at: string;
  expired_at: string;
  validated_at: string | null;
}

export interface BookRecord {
  id: string;
  title: string;
  author_name: string;
  isbn: string;
  synopsis: string;
  owner_id: string;
  shareable: number;
  archived: number;
  book_cover: string | null;
  created_at: string;
  created_by: string;
  last_modified_at: string | null;
  last_modified_by: string | null;
}

export interface BookTransactionRecord {
  id: string;
  book_id: string;
  user_id: string;
  returned: number;
  return_approved: number;
  created_at: string;
  created_by: string;
  last_modified_at: string | null;
  last_modified_by: string | null;
}

// Fresh default data for every connection (the in-memory adapter keeps the object it is given)
export function createDefaultData(): DatabaseSchema {
  return {
    _version: 1,
    _lastCleanup: undefined,
    users: [],
    roles: [],
    activationTokens: [],
    books: [],
    bookTransactions: [],
  };
}

// Database configuration
export interface DatabaseConfig {
  path: string;
  inMemory?: boolean;            // Keep everything in process (tests)
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private config: DatabaseConfig;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(config: DatabaseConfig) {
    this.config = config;

    let adapter: Adapter<DatabaseSchema>;
    if (config.inMemory) {
      adapter = new Memory<DatabaseSchema>();
    } else {
      // Ensure directory exists
      mkdirSync(dirname(config.path), { recursive: true });
      adapter = new JSONFile<DatabaseSchema>(config.path);
    }

    this.db = new Low(adapter, createDefaultData());
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Collections added after a file was first written
    const defaults = createDefaultData();
    const data = this.db.data;
    data._version ??= defaults._version;
    data.users ??= defaults.users;
    data.roles ??= defaults.roles;
    data.activationTokens ??= defaults.activationTokens;
    data.books ??= defaults.books;
    data.bookTransactions ??= defaults.bookTransactions;

    await this.db.write();
  }

  /**
   * Get raw data (read-only use; mutate through atomicUpdate)
   */
  getData(): DatabaseSchema {
    return this.db.data;
  }

  /**
   * Apply an update and persist it. Updates run one at a time, so a check
   * and the write that depends on it cannot interleave with another update.
   * Updaters must validate before mutating: a thrown error skips the write.
   */
  async atomicUpdate<T>(updater: (data: DatabaseSchema) => T): Promise<T> {
    const run = this.writeQueue.then(async () => {
      const data = this.db.data;
      const result = updater(data);
      data._version += 1;
      await this.db.write();
      return result;
    });

    // Keep the queue alive after a failed update
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  /**
   * Get current version
   */
  getVersion(): number {
    return this.db.data._version;
  }

  isInMemory(): boolean {
    return this.config.inMemory === true;
  }

  /**
   * Close: wait for queued writes
   */
  async close(): Promise<void> {
    await this.writeQueue;
  }
}

// Singleton instance for the running server
let instance: DatabaseConnection | null = null;

export async function getDatabase(config?: DatabaseConfig): Promise<DatabaseConnection> {
  if (!instance) {
    if (!config) {
      throw new Error('Database config required for first initialization');
    }
    instance = new DatabaseConnection(config);
    await instance.init();
  }
  return instance;
}

export async function closeDatabase(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
}
