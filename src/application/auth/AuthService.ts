// Application: Authentication Service
// Handles registration, account activation, login and password changes

import { randomInt } from 'crypto';
import {
  DEFAULT_ROLE,
  fullName,
  type AuthenticationRequest,
  type AuthenticationResponse,
  type ChangePasswordRequest,
  type RegistrationRequest,
  type User,
} from '@/domain/user/types.js';
import type {
  IActivationTokenRepository,
  IRoleRepository,
  IUserRepository,
} from '@/domain/user/repository.js';
import type { ActivationEmailPolicy } from '@/utils/config.js';
import {
  ActivationError,
  AuthError,
  ConflictError,
  EmailDeliveryError,
  EntityNotFoundError,
} from '@/utils/errors.js';
import { authLogger, errorMessage } from '@/utils/logger.js';
import { EmailTemplateName, type EmailSender } from '../email/EmailService.js';
import type { PasswordEncoder } from './PasswordEncoder.js';
import type { TokenService } from './TokenService.js';

export interface AuthServiceConfig {
  activationUrl: string;
  activationEmailPolicy: ActivationEmailPolicy;
  activationCodeLength?: number;      // default: 6
  activationTtlMinutes?: number;      // default: 15
}

export interface AuthServiceDeps {
  users: IUserRepository;
  roles: IRoleRepository;
  activationTokens: IActivationTokenRepository;
  passwordEncoder: PasswordEncoder;
  tokenService: TokenService;
  emailSender: EmailSender;
}

const MAX_CODE_ATTEMPTS = 10;

/**
 * Numeric code drawn digit by digit from a cryptographically secure source
 */
export function generateActivationCode(length: number): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += String(randomInt(0, 10));
  }
  return code;
}

export class AuthService {
  private readonly users: IUserRepository;
  private readonly roles: IRoleRepository;
  private readonly activationTokens: IActivationTokenRepository;
  private readonly passwordEncoder: PasswordEncoder;
  private readonly tokenService: TokenService;
  private readonly emailSender: EmailSender;

  constructor(
    deps: AuthServiceDeps,
    private readonly config: AuthServiceConfig
  ) {
    this.users = deps.users;
    this.roles = deps.roles;
    this.activationTokens = deps.activationTokens;
    this.passwordEncoder = deps.passwordEncoder;
    this.tokenService = deps.tokenService;
    this.emailSender = deps.emailSender;
  }

  /**
   * Register a new, disabled user and mail them an activation code
   */
  async register(request: RegistrationRequest): Promise<User> {
    const userRole = await this.roles.findByName(DEFAULT_ROLE);
    if (!userRole) {
      throw new Error(`Role '${DEFAULT_ROLE}' was not initialized`);
    }

    const user = await this.users.createIfEmailFree({
      firstname: request.firstname,
      lastname: request.lastname,
      email: request.email,
      passwordHash: await this.passwordEncoder.encode(request.password),
      enabled: false,
      accountLocked: false,
      roles: [userRole.name],
    });
    if (!user) {
      authLogger.warn('Registration failed: email taken', { email: request.email });
      throw new ConflictError('An account with this email already exists');
    }

    authLogger.info('User registered', { userId: user.id, email: user.email });

    try {
      await this.sendValidationEmail(user);
    } catch (error) {
      // No activation code could be delivered: undo the registration
      await this.activationTokens.deleteByUserId(user.id);
      await this.users.delete(user.id);
      authLogger.warn('Registration rolled back: activation email failed', {
        email: user.email,
        error: errorMessage(error),
      });
      throw error;
    }

    return user;
  }

  /**
   * Enable the account owning a valid activation code.
   * An expired code triggers a new one before failing.
   */
  async activateAccount(token: string): Promise<void> {
    const savedToken = await this.activationTokens.findByToken(token);
    if (!savedToken) {
      throw new ActivationError('Invalid token');
    }

    if (savedToken.validatedAt) {
      throw new ActivationError('Token has already been used');
    }

    if (Date.now() > savedToken.expiredAt.getTime()) {
      const user = await this.users.findById(savedToken.userId);
      if (!user) {
        throw new EntityNotFoundError('User not found');
      }

      await this.sendValidationEmail(user);
      authLogger.info('Expired activation token replaced', { userId: user.id });
      throw new ActivationError(
        'Activation token has expired. A new token has been sent to the same email address'
      );
    }

    const activated = await this.activationTokens.activate(savedToken.id, new Date());
    if (!activated) {
      throw new EntityNotFoundError('User not found');
    }

    authLogger.info('Account activated', { userId: savedToken.userId });
  }

  /**
   * Check credentials and issue a JWT carrying the user's full name and roles
   */
  async authenticate(request: AuthenticationRequest): Promise<AuthenticationResponse> {
    const user = await this.users.findByEmail(request.email);
    if (!user) {
      authLogger.warn('Login failed: user not found', { email: request.email });
      throw new AuthError('BAD_CREDENTIALS');
    }

    // Account status is checked before the password
    if (user.accountLocked) {
      authLogger.warn('Login failed: account locked', { userId: user.id });
      throw new AuthError('ACCOUNT_LOCKED', 'User account is locked');
    }

    if (!user.enabled) {
      authLogger.warn('Login failed: account disabled', { userId: user.id });
      throw new AuthError('ACCOUNT_DISABLED', 'User is disabled');
    }

    const passwordMatches = await this.passwordEncoder.matches(request.password, user.passwordHash);
    if (!passwordMatches) {
      authLogger.warn('Login failed: invalid password', { userId: user.id });
      throw new AuthError('BAD_CREDENTIALS');
    }

    const token = await this.tokenService.generateToken(user, { fullName: fullName(user) });

    authLogger.info('User logged in', { userId: user.id });
    return { token };
  }

  /**
   * Change password of the authenticated user
   */
  async changePassword(user: User, request: ChangePasswordRequest): Promise<void> {
    const current = await this.users.findById(user.id);
    if (!current) {
      throw new EntityNotFoundError('User not found');
    }

    const currentMatches = await this.passwordEncoder.matches(
      request.currentPassword,
      current.passwordHash
    );
    if (!currentMatches) {
      throw new AuthError('INCORRECT_CURRENT_PASSWORD');
    }

    if (request.newPassword !== request.confirmationPassword) {
      throw new AuthError('NEW_PASSWORD_DOES_NOT_MATCH');
    }

    await this.users.update(current.id, {
      passwordHash: await this.passwordEncoder.encode(request.newPassword),
    });

    authLogger.info('Password changed', { userId: current.id });
  }

  // ==================== Activation email ====================

  private async sendValidationEmail(user: User): Promise<void> {
    const activationCode = await this.generateAndSaveActivationToken(user);

    const delivery = this.emailSender.sendEmail({
      to: user.email,
      username: fullName(user),
      template: EmailTemplateName.ACTIVATE_ACCOUNT,
      confirmationUrl: this.config.activationUrl,
      activationCode,
      subject: 'Account activation',
    });

    if (this.config.activationEmailPolicy === 'strict') {
      try {
        await delivery;
      } catch (error) {
        throw new EmailDeliveryError('Activation email could not be sent', {
          email: user.email,
          cause: errorMessage(error),
        });
      }
      return;
    }

    // best-effort: the caller does not wait for SMTP
    delivery.catch((error: unknown) => {
      authLogger.error('Activation email failed', {
        userId: user.id,
        email: user.email,
        error: errorMessage(error),
      });
    });
  }

  private async generateAndSaveActivationToken(user: User): Promise<string> {
    const length = this.config.activationCodeLength ?? 6;
    const ttlMinutes = this.config.activationTtlMinutes ?? 15;

    const createdAt = new Date();

    // A code must not shadow another user's pending code
    const token = await this.activationTokens.createWithUniqueCode(
      () => generateActivationCode(length),
      {
        userId: user.id,
        createdAt,
        expiredAt: new Date(createdAt.getTime() + ttlMinutes * 60 * 1000),
      },
      MAX_CODE_ATTEMPTS
    );
    if (!token) {
      throw new Error('Could not generate a unique activation code');
    }

    return token.token;
  }
}
