// Database Service - Main entry point for database operations
// Provides access to all repositories and handles initialization

import {
  getDatabase,
  closeDatabase,
  DatabaseConnection,
  type DatabaseConfig,
  UserRepository,
  RoleRepository,
  ActivationTokenRepository,
  BookRepository,
  TransactionHistoryRepository,
  ActivationTokenCleanupJob,
  defaultCleanupConfig,
  type TokenCleanupConfig,
} from './lowdb/index.js';
import { DEFAULT_ROLE } from '@/domain/user/types.js';

export class DatabaseService {
  // Repositories
  public readonly users: UserRepository;
  public readonly roles: RoleRepository;
  public readonly activationTokens: ActivationTokenRepository;
  public readonly books: BookRepository;
  public readonly transactions: TransactionHistoryRepository;

  // Cleanup job
  private tokenCleanupJob: ActivationTokenCleanupJob;

  private constructor(db: DatabaseConnection, cleanupConfig: TokenCleanupConfig) {
    this.users = new UserRepository(db);
    this.roles = new RoleRepository(db);
    this.activationTokens = new ActivationTokenRepository(db);
    this.books = new BookRepository(db);
    this.transactions = new TransactionHistoryRepository(db);

    this.tokenCleanupJob = new ActivationTokenCleanupJob(this.activationTokens, cleanupConfig);
  }

  /**
   * Initialize the shared database and seed reference data
   */
  static async initialize(config: DatabaseConfig): Promise<DatabaseService> {
    const db = await getDatabase(config);
    if (!instance) {
      instance = new DatabaseService(db, defaultCleanupConfig());
      await instance.seedRoles();
      instance.tokenCleanupJob.start();
    }
    return instance;
  }

  /**
   * Standalone in-memory store, not shared with the singleton (tests)
   */
  static async inMemory(options: { seedRoles?: boolean } = {}): Promise<DatabaseService> {
    const db = new DatabaseConnection({ path: ':memory:', inMemory: true });
    await db.init();

    const service = new DatabaseService(db, { ...defaultCleanupConfig(), enabled: false });
    if (options.seedRoles ?? true) {
      await service.seedRoles();
    }
    return service;
  }

  /**
   * Close the database connection
   */
  static async close(): Promise<void> {
    instance?.tokenCleanupJob.stop();
    await closeDatabase();
    instance = null;
  }

  /**
   * Get database statistics
   */
  getStats() {
    return {
      users: this.users.getStats(),
      activationTokens: this.activationTokens.getStats(),
    };
  }

  private async seedRoles(): Promise<void> {
    await this.roles.ensure(DEFAULT_ROLE);
  }
}

// Singleton instance
let instance: DatabaseService | null = null;

/**
 * Initialize database service with environment-based config
 */
export async function initDatabaseService(dbPath?: string): Promise<DatabaseService> {
  const config: DatabaseConfig = {
    path: dbPath || process.env.DB_PATH || './data/book-network.json',
  };

  return DatabaseService.initialize(config);
}

export default DatabaseService;
