// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createAuthRouter } from './routes/auth.js';
import { createBookRouter } from './routes/books.js';
import { createUserRouter } from './routes/users.js';
import type { Services } from '@/services.js';

export interface AppConfig {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string;
  rateLimitEnabled: boolean;
}

export function createApp(services: Services, config: Partial<AppConfig> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:4200'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    rateLimitEnabled = true,
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet({
    contentSecurityPolicy: false, // API-only server
  }));

  app.use(cors({
    origin: corsOrigins,
    allowedHeaders: ['Origin', 'Content-Type', 'Accept', 'Authorization'],
    methods: ['GET', 'POST', 'DELETE', 'PUT', 'PATCH'],
  }));

  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan(logFormat));
  }

  app.use(express.json({ limit: '1mb' }));

  // Health check (before auth)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Binds req.user from a valid Bearer token; /auth/ paths are skipped
  app.use(services.authModule.jwtFilter);

  app.use('/auth', createAuthRouter(services.authService, { rateLimitEnabled }));

  app.use('/books', services.authModule.requireAuth);
  app.use('/books', createBookRouter(services.bookService, services.lendingService));

  app.use('/users', services.authModule.requireAuth);
  app.use('/users', createUserRouter(services.authService));

  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
