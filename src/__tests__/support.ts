// Shared test fixtures: in-memory store, recording mailer, wired services

import { once } from 'node:events';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Application } from 'express';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import type { EmailSender, TemplatedEmail } from '@/application/email/EmailService.js';
import type { ActivationEmailPolicy } from '@/utils/config.js';
import type { BookRequest } from '@/domain/book/types.js';
import type { RegistrationRequest, User } from '@/domain/user/types.js';
import { createServices, type Services } from '@/services.js';

// 36 bytes once base64-decoded
export const TEST_JWT_SECRET = Buffer.from('test-secret-test-secret-test-secret!').toString('base64');

export const TEST_PASSWORD = 'test-password';

/**
 * Email sender that records every message; can be told to fail
 */
export class RecordingEmailSender implements EmailSender {
  readonly sent: TemplatedEmail[] = [];
  failure: Error | null = null;

  async sendEmail(email: TemplatedEmail): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push(email);
  }

  lastCodeFor(address: string): string {
    const messages = this.sent.filter((email) => email.to === address);
    const last = messages[messages.length - 1];
    if (!last) {
      throw new Error(`No email sent to ${address}`);
    }
    return last.activationCode;
  }
}

export interface TestContext extends Services {
  db: DatabaseService;
  mailer: RecordingEmailSender;
  uploadsDir: string;
  cleanup: () => Promise<void>;
}

export async function createTestContext(
  options: { policy?: ActivationEmailPolicy } = {}
): Promise<TestContext> {
  const db = await DatabaseService.inMemory();
  const mailer = new RecordingEmailSender();
  const uploadsDir = await mkdtemp(join(tmpdir(), 'book-network-test-'));

  const services = createServices(
    {
      users: db.users,
      roles: db.roles,
      activationTokens: db.activationTokens,
      books: db.books,
      transactions: db.transactions,
    },
    mailer,
    {
      security: { jwtSecretKey: TEST_JWT_SECRET, jwtExpirationMs: 60 * 60 * 1000, bcryptRounds: 4 },
      mail: {
        activationUrl: 'http://localhost:4200/activate-account',
        activationEmailPolicy: options.policy ?? 'strict',
      },
      storage: { uploadsDir },
    }
  );

  return {
    ...services,
    db,
    mailer,
    uploadsDir,
    cleanup: () => rm(uploadsDir, { recursive: true, force: true }),
  };
}

export function registrationFor(firstname: string, overrides: Partial<RegistrationRequest> = {}): RegistrationRequest {
  return {
    firstname,
    lastname: 'Tester',
    email: `${firstname.toLowerCase()}@example.com`,
    password: TEST_PASSWORD,
    ...overrides,
  };
}

/**
 * Register, activate and reload an account
 */
export async function activeUser(ctx: TestContext, firstname: string): Promise<User> {
  const request = registrationFor(firstname);
  await ctx.authService.register(request);
  await ctx.authService.activateAccount(ctx.mailer.lastCodeFor(request.email));

  const user = await ctx.db.users.findByEmail(request.email);
  if (!user) {
    throw new Error(`User ${request.email} was not stored`);
  }
  return user;
}

export function bookRequest(overrides: Partial<BookRequest> = {}): BookRequest {
  return {
    title: 'The Left Hand of Darkness',
    authorName: 'Ursula K. Le Guin',
    isbn: '978-0441478125',
    synopsis: 'An envoy visits a planet whose people have no fixed sex.',
    shareable: true,
    ...overrides,
  };
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Start an app on an ephemeral localhost port
 */
export async function listen(app: Application): Promise<RunningServer> {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: async () => {
      server.close();
      await once(server, 'close');
    },
  };
}
