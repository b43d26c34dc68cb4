/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, SESSION_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const parseIntEnv = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 * Ledger transactions need a replica set, hence the replicaSet parameter locally.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/cashpoint'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/cashpoint-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/cashpoint?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || (isProduction ? 'redis' : 'localhost');

export const REDIS_PORT = parseIntEnv(process.env.REDIS_PORT, isTest ? 6380 : 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

// =============================================================================
// SESSION CONFIGURATION
// =============================================================================

/**
 * Sessions live for ttlMs after creation or renewal. A validation that finds
 * less than renewThresholdMs remaining renews the session.
 */
export const SESSION_CONFIG = {
  ttlMs: parseIntEnv(process.env.SESSION_TTL_MS, 10 * 60 * 1000),
  renewThresholdMs: parseIntEnv(process.env.SESSION_RENEW_THRESHOLD_MS, 60 * 1000),
  // 0 disables the periodic sweep of expired sessions
  sweepIntervalMs: parseIntEnv(process.env.SESSION_SWEEP_INTERVAL_MS, isTest ? 0 : 60 * 1000),
};

// =============================================================================
// LEDGER / CREDENTIAL CONFIGURATION
// =============================================================================

export const LEDGER_CONFIG = {
  allowOverdraft: process.env.LEDGER_ALLOW_OVERDRAFT === 'true',
  defaultHistoryLimit: 20,
  maxHistoryLimit: 100,
};

/**
 * Secret mixed into PIN digests. MUST be set in production.
 */
export const CREDENTIAL_CONFIG = {
  pepper: process.env.CREDENTIAL_PEPPER || 'dev-pepper-do-not-use-in-production',
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting (load testing only).
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  global: {
    windowMs: parseIntEnv(process.env.RATE_LIMIT_WINDOW_MS, 900000), // 15 minutes
    maxRequests: isProduction
      ? parseIntEnv(process.env.RATE_LIMIT_MAX_REQUESTS, 100)
      : isTest
      ? 10000
      : parseIntEnv(process.env.RATE_LIMIT_MAX_REQUESTS, 1000),
  },

  // Login attempts per IP; PINs are short, keep this strict
  auth: {
    windowMs: parseIntEnv(process.env.AUTH_RATE_LIMIT_WINDOW_MS, 900000),
    maxRequests: isProduction
      ? parseIntEnv(process.env.AUTH_RATE_LIMIT_MAX, 5)
      : isTest
      ? 10000
      : parseIntEnv(process.env.AUTH_RATE_LIMIT_MAX, 100),
  },

  transaction: {
    windowMs: parseIntEnv(process.env.TX_RATE_LIMIT_WINDOW_MS, 60000), // 1 minute
    maxRequests: isProduction
      ? parseIntEnv(process.env.TX_RATE_LIMIT_MAX, 10)
      : isTest
      ? 10000
      : parseIntEnv(process.env.TX_RATE_LIMIT_MAX, 100),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseIntEnv(process.env.PORT, 8080),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:8080', 'http://127.0.0.1:8080'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'cashpoint-api',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['MONGODB_URI', 'REDIS_HOST', 'CREDENTIAL_PEPPER'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (CREDENTIAL_CONFIG.pepper.length < 32) {
    throw new Error('CREDENTIAL_PEPPER must be at least 32 characters in production');
  }

  if (SESSION_CONFIG.renewThresholdMs >= SESSION_CONFIG.ttlMs) {
    throw new Error('SESSION_RENEW_THRESHOLD_MS must be lower than SESSION_TTL_MS');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
});
