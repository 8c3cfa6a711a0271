// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
  rateLimitEnabled: boolean;
}

export interface DatabaseSettings {
  path: string;
}

export interface SecurityConfig {
  jwtSecretKey: string;          // base64-encoded HMAC key
  jwtExpirationMs: number;
  bcryptRounds: number;
}

/**
 * What registration does when the activation email cannot be sent.
 * - best-effort: the email is dispatched in the background, failures are logged
 * - strict: the send is awaited and a failure removes the new user again
 */
export type ActivationEmailPolicy = 'best-effort' | 'strict';

export interface MailConfig {
  host: string;
  port: number;
  user?: string;
  password?: string;
  from: string;
  activationUrl: string;
  activationEmailPolicy: ActivationEmailPolicy;
}

export interface StorageConfig {
  uploadsDir: string;
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseSettings;
  security: SecurityConfig;
  mail: MailConfig;
  storage: StorageConfig;
}

const NODE_ENVS: ReadonlyArray<ServerConfig['nodeEnv']> = ['development', 'production', 'test'];

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  return NODE_ENVS.find((env) => env === value) ?? 'development';
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '8088', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    corsOrigins: parseList(env.CORS_ORIGINS, ['http://localhost:4200']),
    rateLimitEnabled: env.RATE_LIMIT_ENABLED !== 'false',
  };
}

export function buildDatabaseSettings(env: NodeJS.ProcessEnv = process.env): DatabaseSettings {
  return {
    path: env.DB_PATH || './data/book-network.json',
  };
}

export function buildSecurityConfig(env: NodeJS.ProcessEnv = process.env): SecurityConfig {
  return {
    jwtSecretKey: env.JWT_SECRET_KEY || '',
    jwtExpirationMs: parseInt(env.JWT_EXPIRATION_MS || '86400000', 10), // 24 hours
    bcryptRounds: parseInt(env.BCRYPT_ROUNDS || '10', 10),
  };
}

export function buildMailConfig(env: NodeJS.ProcessEnv = process.env): MailConfig {
  return {
    host: env.SMTP_HOST || 'localhost',
    port: parseInt(env.SMTP_PORT || '1025', 10),
    user: env.SMTP_USER || undefined,
    password: env.SMTP_PASSWORD || undefined,
    from: env.MAIL_FROM || 'no-reply@book-network.local',
    activationUrl: env.ACTIVATION_URL || 'http://localhost:4200/activate-account',
    activationEmailPolicy: env.ACTIVATION_EMAIL_POLICY === 'strict' ? 'strict' : 'best-effort',
  };
}

export function buildStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    uploadsDir: env.UPLOADS_DIR || './uploads',
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    database: buildDatabaseSettings(env),
    security: buildSecurityConfig(env),
    mail: buildMailConfig(env),
    storage: buildStorageConfig(env),
  };
}

// Validation
export const MIN_JWT_KEY_BYTES = 32;

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.security.jwtSecretKey) {
    errors.push('JWT secret key is required (JWT_SECRET_KEY)');
  } else if (Buffer.from(config.security.jwtSecretKey, 'base64').length < MIN_JWT_KEY_BYTES) {
    errors.push(`JWT_SECRET_KEY must decode to at least ${MIN_JWT_KEY_BYTES} bytes`);
  }

  if (!Number.isFinite(config.security.jwtExpirationMs) || config.security.jwtExpirationMs <= 0) {
    errors.push('JWT_EXPIRATION_MS must be a positive number');
  }

  if (config.security.bcryptRounds < 4 || config.security.bcryptRounds > 31) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 31');
  }

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (config.mail.port < 1 || config.mail.port > 65535) {
    errors.push('Invalid SMTP port number');
  }

  return errors;
}
