// API layer: User routes

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { currentUser } from '@/api/middleware/AuthModule.js';
import { ChangePasswordRequestSchema, parseOrThrow } from '@/api/validation.js';
import type { AuthService } from '@/application/auth/AuthService.js';
import { toPublicUser } from '@/domain/user/types.js';

export function createUserRouter(authService: AuthService): Router {
  const router = Router();

  router.get('/me', (req: Request, res: Response) => {
    res.json(toPublicUser(currentUser(req)));
  });

  /**
   * PATCH /users/me/password
   */
  router.patch(
    '/me/password',
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseOrThrow(ChangePasswordRequestSchema, req.body);
      await authService.changePassword(currentUser(req), request);
      res.status(204).end();
    })
  );

  return router;
}
