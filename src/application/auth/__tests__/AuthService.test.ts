import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { generateActivationCode } from '../AuthService.js';
import {
  ActivationError,
  AuthError,
  ConflictError,
  EmailDeliveryError,
} from '@/utils/errors.js';
import { accountStateOf } from '@/domain/user/types.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import {
  ActivationTokenCleanupJob,
  defaultCleanupConfig,
} from '@/infrastructure/database/lowdb/ActivationTokenCleanupJob.js';
import { createServices } from '@/services.js';
import {
  activeUser,
  createTestContext,
  RecordingEmailSender,
  registrationFor,
  TEST_JWT_SECRET,
  TEST_PASSWORD,
  type TestContext,
} from '@/__tests__/support.js';

describe('AuthService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await ctx.cleanup();
  });

  describe('generateActivationCode', () => {
    it('produces numeric codes of the requested length', () => {
      for (let i = 0; i < 20; i++) {
        expect(generateActivationCode(6)).toMatch(/^\d{6}$/);
      }
    });
  });

  describe('register', () => {
    it('stores a disabled user with the default role and mails a code', async () => {
      const user = await ctx.authService.register(registrationFor('Alice'));

      expect(user.enabled).toBe(false);
      expect(accountStateOf(user)).toBe('PENDING');
      expect(user.accountLocked).toBe(false);
      expect(user.roles).toEqual(['USER']);
      expect(user.passwordHash).not.toBe(TEST_PASSWORD);

      expect(ctx.mailer.sent).toHaveLength(1);
      const [email] = ctx.mailer.sent;
      expect(email.to).toBe('alice@example.com');
      expect(email.username).toBe('Alice Tester');
      expect(email.template).toBe('activate-account');
      expect(email.confirmationUrl).toBe('http://localhost:4200/activate-account');
      expect(email.activationCode).toMatch(/^\d{6}$/);

      expect(ctx.db.getStats().activationTokens.pendingTokens).toBe(1);
      const token = await ctx.db.activationTokens.findByToken(email.activationCode);
      expect(token?.userId).toBe(user.id);
      expect(token && token.expiredAt.getTime() - token.createdAt.getTime()).toBe(15 * 60 * 1000);
    });

    it('rejects an email that is already registered, ignoring case', async () => {
      await ctx.authService.register(registrationFor('Alice'));

      await expect(
        ctx.authService.register(registrationFor('Alice', { email: 'ALICE@example.com' }))
      ).rejects.toBeInstanceOf(ConflictError);
      expect(ctx.db.getStats().users.totalUsers).toBe(1);
    });

    it('accepts only one of two simultaneous registrations for the same email', async () => {
      const results = await Promise.allSettled([
        ctx.authService.register(registrationFor('Dup')),
        ctx.authService.register(registrationFor('Dup', { email: 'DUP@example.com' })),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
      expect(ctx.db.getStats().users.totalUsers).toBe(1);
      expect(ctx.mailer.sent).toHaveLength(1);
    });

    it('gives simultaneous registrations distinct pending codes', async () => {
      await Promise.all(['Ann', 'Ben', 'Cid', 'Dee'].map((name) => ctx.authService.register(registrationFor(name))));

      const codes = ctx.mailer.sent.map((email) => email.activationCode);
      expect(new Set(codes).size).toBe(4);
    });

    it('fails hard when the default role is missing', async () => {
      const db = await DatabaseService.inMemory({ seedRoles: false });
      const { authService } = createServices(db, new RecordingEmailSender(), {
        security: { jwtSecretKey: TEST_JWT_SECRET, jwtExpirationMs: 60_000, bcryptRounds: 4 },
        mail: { activationUrl: 'http://localhost:4200/activate-account', activationEmailPolicy: 'strict' },
        storage: { uploadsDir: ctx.uploadsDir },
      });

      await expect(authService.register(registrationFor('Alice'))).rejects.toThrow(
        "Role 'USER' was not initialized"
      );
      expect(db.getStats().users.totalUsers).toBe(0);
    });

    it('removes the user again when the email fails under the strict policy', async () => {
      ctx.mailer.failure = new Error('SMTP unavailable');

      await expect(ctx.authService.register(registrationFor('Alice'))).rejects.toBeInstanceOf(
        EmailDeliveryError
      );
      expect(await ctx.db.users.findByEmail('alice@example.com')).toBeNull();
      expect(ctx.db.getStats().users.totalUsers).toBe(0);
    });

    it('keeps the user when the email fails under the best-effort policy', async () => {
      const lenient = await createTestContext({ policy: 'best-effort' });
      lenient.mailer.failure = new Error('SMTP unavailable');

      const user = await lenient.authService.register(registrationFor('Alice'));

      const stored = await lenient.db.users.findById(user.id);
      expect(stored?.enabled).toBe(false);
      expect(lenient.db.getStats().activationTokens.pendingTokens).toBe(1);
      await lenient.cleanup();
    });
  });

  describe('activateAccount', () => {
    it('enables the user and marks the code as used', async () => {
      const user = await ctx.authService.register(registrationFor('Alice'));
      const code = ctx.mailer.lastCodeFor('alice@example.com');

      await ctx.authService.activateAccount(code);

      const activated = await ctx.db.users.findById(user.id);
      expect(activated && accountStateOf(activated)).toBe('ACTIVE');
      const token = await ctx.db.activationTokens.findByToken(code);
      expect(token?.validatedAt).toBeInstanceOf(Date);
    });

    it('rejects an unknown code', async () => {
      await expect(ctx.authService.activateAccount('not-a-code')).rejects.toThrow('Invalid token');
    });

    it('rejects a code that was already used', async () => {
      await ctx.authService.register(registrationFor('Alice'));
      const code = ctx.mailer.lastCodeFor('alice@example.com');
      await ctx.authService.activateAccount(code);

      await expect(ctx.authService.activateAccount(code)).rejects.toThrow('Token has already been used');
    });

    it('issues a new code when the old one expired, then accepts the new one', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));

      const user = await ctx.authService.register(registrationFor('Alice'));
      const expiredCode = ctx.mailer.lastCodeFor('alice@example.com');

      vi.setSystemTime(new Date('2026-03-01T10:16:00Z'));

      const attempt = ctx.authService.activateAccount(expiredCode);
      await expect(attempt).rejects.toBeInstanceOf(ActivationError);
      await expect(attempt).rejects.toThrow(
        'Activation token has expired. A new token has been sent to the same email address'
      );

      expect(ctx.mailer.sent).toHaveLength(2);
      const freshCode = ctx.mailer.lastCodeFor('alice@example.com');
      expect(freshCode).not.toBe(expiredCode);
      expect((await ctx.db.users.findById(user.id))?.enabled).toBe(false);

      await ctx.authService.activateAccount(freshCode);
      expect((await ctx.db.users.findById(user.id))?.enabled).toBe(true);
    });

    it('still mails a new code after the cleanup job ran on a long-expired one', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));

      const user = await ctx.authService.register(registrationFor('Alice'));
      const staleCode = ctx.mailer.lastCodeFor('alice@example.com');

      const later = new Date('2026-03-10T10:00:00Z');
      vi.setSystemTime(later);
      const job = new ActivationTokenCleanupJob(ctx.db.activationTokens, {
        ...defaultCleanupConfig(),
        logEnabled: false,
      });
      expect(await job.runOnce(later)).toBe(0);

      await expect(ctx.authService.activateAccount(staleCode)).rejects.toThrow(
        'Activation token has expired. A new token has been sent to the same email address'
      );

      await ctx.authService.activateAccount(ctx.mailer.lastCodeFor('alice@example.com'));
      expect((await ctx.db.users.findById(user.id))?.enabled).toBe(true);
    });

    it('still accepts a code at the exact expiry instant', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));

      const user = await ctx.authService.register(registrationFor('Alice'));
      vi.setSystemTime(new Date('2026-03-01T10:15:00Z'));

      await ctx.authService.activateAccount(ctx.mailer.lastCodeFor('alice@example.com'));
      expect((await ctx.db.users.findById(user.id))?.enabled).toBe(true);
    });
  });

  describe('authenticate', () => {
    it('returns a token carrying the subject, full name and authorities', async () => {
      await activeUser(ctx, 'Alice');

      const { token } = await ctx.authService.authenticate({
        email: 'alice@example.com',
        password: TEST_PASSWORD,
      });

      const claims = await ctx.tokenService.verify(token);
      expect(claims?.sub).toBe('alice@example.com');
      expect(claims?.fullName).toBe('Alice Tester');
      expect(claims?.authorities).toEqual(['USER']);
    });

    it('answers bad credentials for an unknown email', async () => {
      await expect(
        ctx.authService.authenticate({ email: 'nobody@example.com', password: TEST_PASSWORD })
      ).rejects.toMatchObject({ code: 'BAD_CREDENTIALS', businessCode: 304, statusCode: 403 });
    });

    it('answers bad credentials for a wrong password', async () => {
      await activeUser(ctx, 'Alice');

      await expect(
        ctx.authService.authenticate({ email: 'alice@example.com', password: 'wrong-password' })
      ).rejects.toMatchObject({ code: 'BAD_CREDENTIALS', businessCode: 304 });
    });

    it('rejects a disabled account', async () => {
      await ctx.authService.register(registrationFor('Alice'));

      await expect(
        ctx.authService.authenticate({ email: 'alice@example.com', password: TEST_PASSWORD })
      ).rejects.toMatchObject({ code: 'ACCOUNT_DISABLED', businessCode: 303 });
    });

    it('checks the lock before the password', async () => {
      const user = await activeUser(ctx, 'Alice');
      await ctx.db.users.update(user.id, { accountLocked: true });

      const attempt = ctx.authService.authenticate({
        email: 'alice@example.com',
        password: 'wrong-password',
      });
      await expect(attempt).rejects.toBeInstanceOf(AuthError);
      await expect(attempt).rejects.toMatchObject({ code: 'ACCOUNT_LOCKED', businessCode: 302 });
    });
  });

  describe('changePassword', () => {
    it('replaces the password after checking the current one', async () => {
      const user = await activeUser(ctx, 'Alice');

      await ctx.authService.changePassword(user, {
        currentPassword: TEST_PASSWORD,
        newPassword: 'another-password',
        confirmationPassword: 'another-password',
      });

      await expect(
        ctx.authService.authenticate({ email: 'alice@example.com', password: TEST_PASSWORD })
      ).rejects.toMatchObject({ businessCode: 304 });
      const { token } = await ctx.authService.authenticate({
        email: 'alice@example.com',
        password: 'another-password',
      });
      expect(token.split('.')).toHaveLength(3);
    });

    it('rejects a wrong current password with code 300', async () => {
      const user = await activeUser(ctx, 'Alice');

      await expect(
        ctx.authService.changePassword(user, {
          currentPassword: 'wrong-password',
          newPassword: 'another-password',
          confirmationPassword: 'another-password',
        })
      ).rejects.toMatchObject({ businessCode: 300, statusCode: 400 });
    });

    it('rejects a confirmation that differs with code 301', async () => {
      const user = await activeUser(ctx, 'Alice');

      await expect(
        ctx.authService.changePassword(user, {
          currentPassword: TEST_PASSWORD,
          newPassword: 'another-password',
          confirmationPassword: 'different-password',
        })
      ).rejects.toMatchObject({ businessCode: 301, statusCode: 400 });
    });
  });
});
