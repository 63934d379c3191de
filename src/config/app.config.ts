import { Logger, LogLevel } from '@nestjs/common';
import * as crypto from 'crypto';
import * as path from 'path';

export const APP_CONFIG = 'APP_CONFIG';

export const FEEDBACK_CATEGORIES = ['complaint', 'idea', 'recommendation', 'other'] as const;
export type FeedbackCategory = (typeof FEEDBACK_CATEGORIES)[number];

export const DEFAULT_ALLOWED_TAGS = [
  'Salary',
  'Store',
  'Product',
  'Conflict',
  'Legal',
  'Management',
  'Schedule',
  'Safety',
  'Training',
  'Equipment',
  'Customer',
  'Policy',
  'Communication',
  'Hygiene',
  'Other',
] as const;

export const FALLBACK_TAG = 'Other';

export interface AppConfig {
  readonly env: string;
  readonly isProduction: boolean;
  readonly logLevels: readonly LogLevel[];
  readonly http: {
    readonly port: number;
    readonly corsOrigins: readonly string[];
    readonly trustProxy: boolean;
  };
  readonly auth: {
    readonly secretKey: string;
    readonly tokenTtlMinutes: number;
    readonly cookieName: string;
    readonly bcryptRounds: number;
  };
  readonly rateLimit: {
    readonly maxSubmissions: number;
    readonly windowMs: number;
    /** Salt mixed into submitter fingerprints; derived from the secret key. */
    readonly fingerprintSalt: string;
  };
  readonly submission: {
    readonly maxMessageLength: number;
    readonly codePrefix: string;
    readonly categories: readonly FeedbackCategory[];
  };
  readonly uploads: {
    readonly dir: string;
    readonly maxFileSize: number;
    readonly allowedExtensions: readonly string[];
  };
  readonly enrichment: {
    readonly groqApiKey: string | null;
    readonly model: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly concurrency: number;
    readonly summaryMaxLength: number;
    readonly maxTags: number;
    readonly allowedTags: readonly string[];
  };
  readonly seed: {
    readonly adminEmail: string | null;
    readonly adminPassword: string | null;
    readonly adminName: string;
  };
}

/** Reads one raw environment value; undefined when the key is not set. */
export type EnvReader = (key: string) => string | undefined;

const LOG_LEVELS_BY_THRESHOLD: Record<string, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  log: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  verbose: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

const logger = new Logger('AppConfig');

function readString(read: EnvReader, key: string, fallback: string): string {
  const value = read(key)?.trim();
  return value ? value : fallback;
}

function readOptional(read: EnvReader, key: string): string | null {
  const value = read(key)?.trim();
  return value ? value : null;
}

function readInt(read: EnvReader, key: string, fallback: number, min = 1): number {
  const raw = read(key)?.trim();
  if (!raw) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${key} must be an integer (got "${raw}")`);
  }

  const value = parseInt(raw, 10);
  if (value < min) {
    throw new Error(`${key} must be at least ${min} (got ${value})`);
  }

  return value;
}

function readList(read: EnvReader, key: string, fallback: readonly string[]): string[] {
  const raw = read(key);
  if (!raw) {
    return [...fallback];
  }

  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function resolveLogLevels(level: string | undefined, isProduction: boolean): LogLevel[] {
  const threshold = (level ?? (isProduction ? 'info' : 'debug')).toLowerCase();
  const levels = LOG_LEVELS_BY_THRESHOLD[threshold];

  if (!levels) {
    throw new Error(`LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS_BY_THRESHOLD).join(', ')}`);
  }

  return levels;
}

function resolveSecretKey(read: EnvReader, isProduction: boolean): string {
  const secret = read('SECRET_KEY')?.trim();

  if (!secret) {
    if (isProduction) {
      throw new Error('SECRET_KEY must be set in production');
    }
    logger.warn('Using auto-generated SECRET_KEY. Set SECRET_KEY in .env for production!');
    return crypto.randomBytes(32).toString('hex');
  }

  if (secret.length < 32) {
    throw new Error(`SECRET_KEY must be at least 32 characters long (current: ${secret.length})`);
  }

  return secret;
}

/**
 * Builds the immutable application configuration. Called once at startup;
 * every component receives the result through the APP_CONFIG token.
 */
export function buildAppConfig(read: EnvReader): AppConfig {
  const env = readString(read, 'NODE_ENV', 'development');
  const isProduction = env === 'production';
  const secretKey = resolveSecretKey(read, isProduction);

  const config: AppConfig = {
    env,
    isProduction,
    logLevels: resolveLogLevels(read('LOG_LEVEL'), isProduction),
    http: {
      port: readInt(read, 'PORT', 3000),
      corsOrigins: readList(read, 'CORS_ORIGINS', ['*']),
      trustProxy: readString(read, 'TRUST_PROXY', 'false') === 'true',
    },
    auth: {
      secretKey,
      tokenTtlMinutes: readInt(read, 'ACCESS_TOKEN_EXPIRE_MINUTES', 480),
      cookieName: 'access_token',
      bcryptRounds: readInt(read, 'BCRYPT_ROUNDS', 10, 4),
    },
    rateLimit: {
      maxSubmissions: readInt(read, 'RATE_LIMIT_MAX', 10),
      windowMs: readInt(read, 'RATE_LIMIT_WINDOW_HOURS', 24) * 60 * 60 * 1000,
      fingerprintSalt: secretKey.slice(0, 16),
    },
    submission: {
      maxMessageLength: readInt(read, 'MAX_MESSAGE_LENGTH', 1000),
      codePrefix: readString(read, 'SUBMISSION_CODE_PREFIX', 'FB'),
      categories: FEEDBACK_CATEGORIES,
    },
    uploads: {
      dir: path.resolve(readString(read, 'UPLOAD_DIR', path.join('data', 'uploads'))),
      maxFileSize: readInt(read, 'MAX_FILE_SIZE', 5 * 1024 * 1024),
      allowedExtensions: readList(read, 'ALLOWED_EXTENSIONS', ['jpg', 'jpeg', 'png']).map((ext) =>
        ext.toLowerCase(),
      ),
    },
    enrichment: {
      groqApiKey: readOptional(read, 'GROQ_API_KEY'),
      model: readString(read, 'GROQ_MODEL', 'llama-3.3-70b-versatile'),
      timeoutMs: readInt(read, 'AI_TIMEOUT_MS', 30000),
      maxRetries: readInt(read, 'AI_MAX_RETRIES', 2, 0),
      concurrency: readInt(read, 'ENRICHMENT_CONCURRENCY', 4),
      summaryMaxLength: 150,
      maxTags: 3,
      allowedTags: DEFAULT_ALLOWED_TAGS,
    },
    seed: {
      adminEmail: readOptional(read, 'SEED_ADMIN_EMAIL'),
      adminPassword: readOptional(read, 'SEED_ADMIN_PASSWORD'),
      adminName: readString(read, 'SEED_ADMIN_NAME', 'System Admin'),
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
