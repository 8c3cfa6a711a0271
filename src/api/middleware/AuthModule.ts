// API Middleware: Authentication Module
// JWT filter binding the caller's identity, plus the guard for protected routes

import type { Request, Response, NextFunction } from 'express';
import type { User } from '@/domain/user/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import type { TokenService } from '@/application/auth/TokenService.js';
import { UnauthenticatedError } from '@/utils/errors.js';
import { authLogger, errorMessage } from '@/utils/logger.js';

const PUBLIC_PATH_PREFIX = '/auth/';

/**
 * Extract the Bearer token from the Authorization header
 */
export function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7);
  return token || null;
}

/**
 * Identity bound by the JWT filter; throws when the request is anonymous
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
}

export class AuthModule {
  constructor(
    private readonly tokenService: TokenService,
    private readonly users: IUserRepository
  ) {}

  /**
   * Resolve the user a token belongs to, or null when the token does not hold up
   */
  async authenticateToken(token: string): Promise<User | null> {
    const email = await this.tokenService.extractUsername(token);
    if (!email) return null;

    const user = await this.users.findByEmail(email);
    if (!user) return null;

    return (await this.tokenService.isTokenValid(token, user)) ? user : null;
  }

  // ==================== Middleware ====================

  /**
   * Runs on every request. A bad or missing token leaves the request
   * anonymous; protected routes reject it through requireAuth.
   */
  jwtFilter = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    if (req.path.startsWith(PUBLIC_PATH_PREFIX) || req.user) {
      next();
      return;
    }

    const token = extractBearerToken(req);
    if (!token) {
      next();
      return;
    }

    try {
      const user = await this.authenticateToken(token);
      if (user) {
        req.user = user;
      }
    } catch (error) {
      authLogger.warn('Token check failed', { path: req.path, error: errorMessage(error) });
    }
    next();
  };

  requireAuth = (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthenticatedError());
      return;
    }
    next();
  };
}

/**
 * Factory function to create AuthModule
 */
export function createAuthModule(tokenService: TokenService, users: IUserRepository): AuthModule {
  return new AuthModule(tokenService, users);
}
