/**
 * Rate Limiting Middleware
 *
 * Rate limiting for API endpoints backed by a Redis store so that limits
 * hold across instances.
 *
 * Environment-based configuration:
 * - Production: Strict limits, login attempts especially (PINs are short)
 * - Development: Relaxed limits
 * - Test: Memory store with very lenient limits
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { Store } from 'express-rate-limit';
import RedisStore from 'rate-limit-redis';

import { config } from '../config';
import { RATE_LIMIT_CONFIG } from '../config/environments';
import { getRedisClient } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';
import { AuthRequest } from '../auth/auth.types';

type RedisData = boolean | number | string;
type RedisReply = RedisData | RedisData[];

const isRedisData = (value: unknown): value is RedisData =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';

/**
 * ioredis replies are untyped; the store only ever sees scalars or flat arrays
 */
const toRedisReply = (value: unknown): RedisReply => {
  if (isRedisData(value)) return value;
  if (Array.isArray(value)) return value.filter(isRedisData);
  throw new Error(`Unexpected Redis reply: ${String(value)}`);
};

/**
 * Create a Redis store for rate limiting
 * Falls back to memory store in test environment
 */
const createStore = (prefix: string): Store | undefined => {
  if (config.isTest) {
    return undefined;
  }

  try {
    const client = getRedisClient();
    return new RedisStore({
      sendCommand: async (command: string, ...args: string[]) =>
        toRedisReply(await client.call(command, ...args)),
      prefix,
    });
  } catch (err) {
    logger.warn({ err }, 'Failed to create Redis store for rate limiting, using memory store');
    return undefined;
  }
};

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const rateLimitBody = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

/**
 * Global rate limiter
 * Applied to all routes except health checks and metrics
 */
export const globalLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:global:'),
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    limit: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: rateLimitBody(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Login limiter, keyed by client IP
 */
export const authLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:auth:'),
    windowMs: RATE_LIMIT_CONFIG.auth.windowMs,
    limit: RATE_LIMIT_CONFIG.auth.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: rateLimitBody(
      ErrorCode.TOO_MANY_LOGIN_ATTEMPTS,
      'Too many login attempts, please try again later'
    ),
    keyGenerator: (req) => req.ip || 'unknown',
    validate: false,
  })
);

/**
 * Transaction limiter, keyed by the authenticated account
 * Must run after the session middleware
 */
export const transactionLimiter: RequestHandler = createLimiter(
  rateLimit({
    store: createStore('rl:tx:'),
    windowMs: RATE_LIMIT_CONFIG.transaction.windowMs,
    limit: RATE_LIMIT_CONFIG.transaction.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: rateLimitBody(
      ErrorCode.TOO_MANY_TRANSACTIONS,
      'Too many transactions, please try again later'
    ),
    keyGenerator: (req: AuthRequest) =>
      req.auth ? `account:${req.auth.accountId}` : req.ip || 'unknown',
    validate: false,
  })
);
