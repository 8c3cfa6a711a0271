// LowDB Repository exports

export { DatabaseConnection, getDatabase, closeDatabase, createDefaultData } from './connection.js';
export { UserRepository } from './UserRepository.js';
export { RoleRepository } from './RoleRepository.js';
export { ActivationTokenRepository } from './ActivationTokenRepository.js';
export { BookRepository } from './BookRepository.js';
export { TransactionHistoryRepository } from './TransactionHistoryRepository.js';
export { ActivationTokenCleanupJob, defaultCleanupConfig } from './ActivationTokenCleanupJob.js';

export type { DatabaseConfig, DatabaseSchema } from './connection.js';
export type { TokenCleanupConfig } from './ActivationTokenCleanupJob.js';
