// Composition: wires repositories, services and the auth middleware
// Shared by the server entry point and the HTTP tests

import type {
  IActivationTokenRepository,
  IBookRepository,
  IRoleRepository,
  ITransactionHistoryRepository,
  IUserRepository,
} from '@/domain/index.js';
import { AuthService } from '@/application/auth/AuthService.js';
import { BcryptPasswordEncoder } from '@/application/auth/PasswordEncoder.js';
import { createTokenService, type TokenService } from '@/application/auth/TokenService.js';
import { BookService } from '@/application/book/BookService.js';
import type { EmailSender } from '@/application/email/EmailService.js';
import { FileStorageService } from '@/application/file/FileStorageService.js';
import { LendingService } from '@/application/lending/LendingService.js';
import { createAuthModule, type AuthModule } from '@/api/middleware/AuthModule.js';
import type { MailConfig, SecurityConfig, StorageConfig } from '@/utils/config.js';

export interface Repositories {
  users: IUserRepository;
  roles: IRoleRepository;
  activationTokens: IActivationTokenRepository;
  books: IBookRepository;
  transactions: ITransactionHistoryRepository;
}

export interface ServiceConfig {
  security: SecurityConfig;
  mail: Pick<MailConfig, 'activationUrl' | 'activationEmailPolicy'>;
  storage: StorageConfig;
}

export interface Services {
  authService: AuthService;
  tokenService: TokenService;
  bookService: BookService;
  lendingService: LendingService;
  authModule: AuthModule;
}

export function createServices(
  repositories: Repositories,
  emailSender: EmailSender,
  config: ServiceConfig
): Services {
  const tokenService = createTokenService(config.security);
  const fileStorage = new FileStorageService(config.storage.uploadsDir);

  const authService = new AuthService(
    {
      users: repositories.users,
      roles: repositories.roles,
      activationTokens: repositories.activationTokens,
      passwordEncoder: new BcryptPasswordEncoder(config.security.bcryptRounds),
      tokenService,
      emailSender,
    },
    {
      activationUrl: config.mail.activationUrl,
      activationEmailPolicy: config.mail.activationEmailPolicy,
    }
  );

  return {
    authService,
    tokenService,
    bookService: new BookService(repositories.books, repositories.users, fileStorage),
    lendingService: new LendingService(repositories.books, repositories.transactions),
    authModule: createAuthModule(tokenService, repositories.users),
  };
}
