// Application: Token Service
// Handles JWT access token generation and validation

import { webcrypto } from 'crypto';
import { z } from 'zod';
import type { User } from '@/domain/user/types.js';
import type { SecurityConfig } from '@/utils/config.js';
import { MIN_JWT_KEY_BYTES } from '@/utils/config.js';
import { authLogger, errorMessage } from '@/utils/logger.js';

const TokenHeaderSchema = z.object({
  alg: z.literal('HS256'),
  typ: z.string().optional(),
});

const TokenClaimsSchema = z
  .object({
    sub: z.string().min(1),
    iat: z.number(),
    exp: z.number(),
    authorities: z.array(z.string()).default([]),
    fullName: z.string().optional(),
  })
  .passthrough();

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export type ExtraClaims = Record<string, string | number | boolean>;

export interface TokenServiceConfig {
  secretKey: string;           // base64-encoded HMAC key (required)
  expirationMs: number;        // Token TTL (default: 24 hours)
}

/**
 * TokenService - JWT (HS256) issuance and verification
 *
 * Uses the Web Crypto API for HMAC signing. The signing key is the
 * base64-decoded secret, so every instance built from the same secret
 * accepts the others' tokens.
 */
export class TokenService {
  private readonly config: TokenServiceConfig;
  private readonly keyBytes: Buffer;
  private keyPromise: Promise<webcrypto.CryptoKey> | null = null;

  constructor(config: TokenServiceConfig) {
    if (!config.secretKey) {
      throw new Error('JWT secret key is required');
    }
    this.config = config;
    this.keyBytes = Buffer.from(config.secretKey, 'base64');
    if (this.keyBytes.length < MIN_JWT_KEY_BYTES) {
      throw new Error(`JWT secret key must decode to at least ${MIN_JWT_KEY_BYTES} bytes`);
    }
  }

  /**
   * Issue a signed token whose subject is the user's email
   */
  async generateToken(
    user: Pick<User, 'email' | 'roles'>,
    extraClaims: ExtraClaims = {}
  ): Promise<string> {
    const nowMs = Date.now();

    const header = { alg: 'HS256', typ: 'JWT' };
    const payload = {
      ...extraClaims,
      sub: user.email,
      iat: Math.floor(nowMs / 1000),
      exp: Math.floor((nowMs + this.config.expirationMs) / 1000),
      authorities: [...user.roles],
    };

    const data = `${this.encodeSegment(header)}.${this.encodeSegment(payload)}`;
    const signature = await webcrypto.subtle.sign('HMAC', await this.signingKey(), Buffer.from(data));

    return `${data}.${Buffer.from(signature).toString('base64url')}`;
  }

  /**
   * Verify signature and expiry; returns the claims or null
   */
  async verify(token: string): Promise<TokenClaims | null> {
    const claims = await this.decodeVerified(token);
    if (!claims) return null;

    if (this.isExpired(claims)) {
      authLogger.debug('Token verification failed: expired', {
        subject: claims.sub,
        expiredAt: new Date(claims.exp * 1000).toISOString(),
      });
      return null;
    }

    return claims;
  }

  /**
   * Subject (email) of a correctly signed token, expired or not
   */
  async extractUsername(token: string): Promise<string | null> {
    const claims = await this.decodeVerified(token);
    return claims?.sub ?? null;
  }

  /**
   * valid = subject matches the user AND the token has not expired
   */
  async isTokenValid(token: string, user: Pick<User, 'email'>): Promise<boolean> {
    const claims = await this.decodeVerified(token);
    if (!claims) return false;
    return claims.sub === user.email && !this.isExpired(claims);
  }

  get expirationMs(): number {
    return this.config.expirationMs;
  }

  // ==================== Private Helper Methods ====================

  private isExpired(claims: TokenClaims): boolean {
    return claims.exp * 1000 <= Date.now();
  }

  private async decodeVerified(token: string): Promise<TokenClaims | null> {
    try {
      const parts = token.split('.');
      if (parts.length !== 3) {
        authLogger.debug('Token verification failed: invalid format');
        return null;
      }

      const [encodedHeader, encodedPayload, encodedSignature] = parts;

      const header = TokenHeaderSchema.safeParse(this.decodeSegment(encodedHeader));
      if (!header.success) {
        authLogger.warn('Token verification failed: unsupported header');
        return null;
      }

      const valid = await webcrypto.subtle.verify(
        'HMAC',
        await this.signingKey(),
        Buffer.from(encodedSignature, 'base64url'),
        Buffer.from(`${encodedHeader}.${encodedPayload}`)
      );
      if (!valid) {
        authLogger.warn('Token verification failed: invalid signature');
        return null;
      }

      const claims = TokenClaimsSchema.safeParse(this.decodeSegment(encodedPayload));
      if (!claims.success) {
        authLogger.warn('Token verification failed: malformed claims');
        return null;
      }

      return claims.data;
    } catch (error) {
      authLogger.warn('Token verification error', { error: errorMessage(error) });
      return null;
    }
  }

  private signingKey(): Promise<webcrypto.CryptoKey> {
    this.keyPromise ??= webcrypto.subtle.importKey(
      'raw',
      this.keyBytes,
      { name: 'HMAC', hash: 'SHA-256' },
      false,
      ['sign', 'verify']
    );
    return this.keyPromise;
  }

  private encodeSegment(value: object): string {
    return Buffer.from(JSON.stringify(value)).toString('base64url');
  }

  private decodeSegment(segment: string): unknown {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  }
}

/**
 * Create TokenService from security configuration
 */
export function createTokenService(config: SecurityConfig): TokenService {
  return new TokenService({
    secretKey: config.jwtSecretKey,
    expirationMs: config.jwtExpirationMs,
  });
}
