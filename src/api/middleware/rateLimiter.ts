// API Middleware: Rate Limiter
// Sliding window rate limiting for the public authentication endpoints

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { authLogger } from '@/utils/logger.js';

export interface RateLimitConfig {
  name: string;
  windowMs: number;              // Time window in milliseconds
  maxAttempts: number;           // Max requests per window
  keyGenerator: (req: Request) => string;
  skipSuccessfulRequests?: boolean;  // Don't count 2xx responses
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
  windowStart: number;
}

const rateLimitStore = new Map<string, RateLimitEntry>();

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

let cleanupTimer: NodeJS.Timeout | null = null;

/**
 * Drop expired entries; runs hourly once a limiter exists
 */
export function cleanupRateLimitStore(now: number = Date.now()): number {
  let cleaned = 0;
  for (const [key, entry] of rateLimitStore.entries()) {
    if (entry.resetAt < now) {
      rateLimitStore.delete(key);
      cleaned++;
    }
  }

  if (cleaned > 0) {
    authLogger.debug('Cleaned up expired rate limit entries', { count: cleaned });
  }
  return cleaned;
}

function startAutomaticCleanup(): void {
  if (cleanupTimer) return;

  cleanupTimer = setInterval(() => {
    cleanupRateLimitStore();
  }, CLEANUP_INTERVAL_MS);

  // Does not keep the process alive
  cleanupTimer.unref();
}

export function stopAutomaticCleanup(): void {
  if (cleanupTimer) {
    clearInterval(cleanupTimer);
    cleanupTimer = null;
  }
}

export function resetRateLimitStore(): void {
  rateLimitStore.clear();
}

/**
 * Create rate limiting middleware. A disabled limiter passes every request through.
 */
export function createRateLimitMiddleware(config: RateLimitConfig, enabled = true): RequestHandler {
  if (!enabled) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  startAutomaticCleanup();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = `${config.name}:${config.keyGenerator(req)}`;
    const now = Date.now();

    let entry = rateLimitStore.get(key);

    if (!entry || now > entry.resetAt) {
      entry = {
        count: 1,
        resetAt: now + config.windowMs,
        windowStart: now,
      };
      rateLimitStore.set(key, entry);
    } else {
      // Sliding window: decay count based on time elapsed
      const windowElapsed = now - entry.windowStart;
      const decay = Math.floor((windowElapsed / config.windowMs) * entry.count);
      entry.count = Math.max(1, entry.count - decay);
      entry.windowStart = now - (windowElapsed % config.windowMs);
      entry.count++;
    }

    const remaining = Math.max(0, config.maxAttempts - entry.count);
    res.setHeader('X-RateLimit-Limit', config.maxAttempts);
    res.setHeader('X-RateLimit-Remaining', remaining);
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000));

    if (entry.count > config.maxAttempts) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      authLogger.warn('Rate limit exceeded', { limiter: config.name, ip: req.ip });
      res.setHeader('Retry-After', retryAfter);
      res.status(429).json({ error: 'Too many requests. Please try again later.' });
      return;
    }

    if (config.skipSuccessfulRequests) {
      const counted = entry;
      res.on('finish', () => {
        if (res.statusCode >= 200 && res.statusCode < 300) {
          counted.count = Math.max(0, counted.count - 1);
        }
      });
    }

    next();
  };
}

function bodyEmail(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string') {
    return body.email.toLowerCase();
  }
  return 'unknown';
}

/**
 * Predefined rate limit configurations
 */
export const RateLimitPresets = {
  register: {
    name: 'register',
    windowMs: 60 * 60 * 1000,  // 1 hour
    maxAttempts: 5,
    keyGenerator: (req: Request) => req.ip || 'unknown',
    skipSuccessfulRequests: true,
  },

  authenticate: {
    name: 'authenticate',
    windowMs: 15 * 60 * 1000,  // 15 minutes
    maxAttempts: 5,
    keyGenerator: (req: Request) => `${req.ip || 'unknown'}:${bodyEmail(req)}`,
    skipSuccessfulRequests: true,
  },

  activate: {
    name: 'activate',
    windowMs: 15 * 60 * 1000,  // 15 minutes
    maxAttempts: 10,
    keyGenerator: (req: Request) => req.ip || 'unknown',
  },
} satisfies Record<string, RateLimitConfig>;
