import { parseExpiresIn } from '@coinpurse/domain';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type ApiLogLevel = (typeof LOG_LEVELS)[number];

export interface ApiAuthConfig {
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  passwordHashRounds: number;
}

export interface ApiRuntimeConfig {
  host: string;
  port: number;
  logLevel: ApiLogLevel;
  corsAllowedOrigins: string[];
  auth: ApiAuthConfig;
  pageSize: number;
  /** Falls back to the database package default when unset. */
  dbPath?: string;
}

const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_PORT = 8787;
const DEFAULT_LOG_LEVEL: ApiLogLevel = 'info';
const DEFAULT_CORS_ALLOWED_ORIGINS = '*';
const DEFAULT_ACCESS_TOKEN_TTL = '5m';
const DEFAULT_REFRESH_TOKEN_TTL = '1d';
const DEFAULT_PAGE_SIZE = 20;
const DEFAULT_BCRYPT_ROUNDS = 12;
const MIN_JWT_SECRET_LENGTH = 16;

const parseInteger = (
  rawValue: string | undefined,
  fieldName: string,
  fallback: number,
  min: number,
  max: number,
): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`${fieldName} must be an integer between ${min} and ${max}`);
  }

  return parsed;
};

const parseString = (rawValue: string | undefined, fallback: string): string => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }

  return rawValue.trim();
};

const isLogLevel = (value: string): value is ApiLogLevel =>
  LOG_LEVELS.some((level) => level === value);

const parseLogLevel = (rawValue: string | undefined): ApiLogLevel => {
  const value = parseString(rawValue, DEFAULT_LOG_LEVEL);
  if (isLogLevel(value)) {
    return value;
  }

  throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
};

const parseCorsAllowedOrigins = (rawValue: string | undefined): string[] => {
  const value = parseString(rawValue, DEFAULT_CORS_ALLOWED_ORIGINS);
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return origins.length === 0 ? [DEFAULT_CORS_ALLOWED_ORIGINS] : origins;
};

const parseJwtSecret = (rawValue: string | undefined): string => {
  const value = rawValue?.trim() ?? '';
  if (value.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(`JWT_SECRET must be set to at least ${MIN_JWT_SECRET_LENGTH} characters`);
  }

  return value;
};

const parseDuration = (rawValue: string | undefined, fieldName: string, fallback: string) => {
  const seconds = parseExpiresIn(parseString(rawValue, fallback));
  if (seconds === null) {
    throw new Error(`${fieldName} must be a duration such as 300, 45s, 5m, 12h or 1d`);
  }

  return seconds;
};

export const loadApiRuntimeConfig = (
  env: Record<string, string | undefined> = process.env,
): ApiRuntimeConfig => {
  const dbPath = env.DB_PATH?.trim();

  return {
    host: parseString(env.HOST, DEFAULT_HOST),
    port: parseInteger(env.PORT, 'PORT', DEFAULT_PORT, 1, 65_535),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    corsAllowedOrigins: parseCorsAllowedOrigins(env.CORS_ALLOWED_ORIGINS),
    auth: {
      jwtSecret: parseJwtSecret(env.JWT_SECRET),
      accessTokenTtlSeconds: parseDuration(
        env.ACCESS_TOKEN_TTL,
        'ACCESS_TOKEN_TTL',
        DEFAULT_ACCESS_TOKEN_TTL,
      ),
      refreshTokenTtlSeconds: parseDuration(
        env.REFRESH_TOKEN_TTL,
        'REFRESH_TOKEN_TTL',
        DEFAULT_REFRESH_TOKEN_TTL,
      ),
      passwordHashRounds: parseInteger(
        env.BCRYPT_ROUNDS,
        'BCRYPT_ROUNDS',
        DEFAULT_BCRYPT_ROUNDS,
        4,
        15,
      ),
    },
    pageSize: parseInteger(env.PAGE_SIZE, 'PAGE_SIZE', DEFAULT_PAGE_SIZE, 1, 100),
    ...(dbPath ? { dbPath } : {}),
  };
};

export const resolveCorsOrigin = (allowedOrigins: readonly string[]): true | string[] =>
  allowedOrigins.includes('*') ? true : [...allowedOrigins];
