// API layer: Authentication routes
// Registration, account activation and login; public, outside the JWT filter

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { createRateLimitMiddleware, RateLimitPresets } from '@/api/middleware/rateLimiter.js';
import {
  AuthenticationRequestSchema,
  parseOrThrow,
  RegistrationRequestSchema,
} from '@/api/validation.js';
import type { AuthService } from '@/application/auth/AuthService.js';

const ActivationQuerySchema = z.object({
  token: z.string({ required_error: 'Token is mandatory' }).trim().min(1, 'Token is mandatory'),
});

export interface AuthRouterOptions {
  rateLimitEnabled?: boolean;
}

export function createAuthRouter(authService: AuthService, options: AuthRouterOptions = {}): Router {
  const router = Router();
  const limited = options.rateLimitEnabled ?? true;

  /**
   * POST /auth/register
   * Creates a disabled account and mails the activation code
   */
  router.post(
    '/register',
    createRateLimitMiddleware(RateLimitPresets.register, limited),
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseOrThrow(RegistrationRequestSchema, req.body);
      await authService.register(request);
      res.status(202).end();
    })
  );

  /**
   * POST /auth/authenticate
   */
  router.post(
    '/authenticate',
    createRateLimitMiddleware(RateLimitPresets.authenticate, limited),
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseOrThrow(AuthenticationRequestSchema, req.body);
      res.json(await authService.authenticate(request));
    })
  );

  /**
   * GET /auth/activate-account?token=123456
   */
  router.get(
    '/activate-account',
    createRateLimitMiddleware(RateLimitPresets.activate, limited),
    asyncHandler(async (req: Request, res: Response) => {
      const { token } = parseOrThrow(ActivationQuerySchema, req.query);
      await authService.activateAccount(token);
      res.status(200).end();
    })
  );

  return router;
}
