/**
 * Rate Limiter Unit Tests
 *
 * Tests store selection, Redis reply handling and the disabled switch.
 */

import { NextFunction, Request, Response } from 'express';

interface CapturedLimiterOptions {
  store?: unknown;
  skip: (req: { path: string }) => boolean;
  keyGenerator: (req: { ip?: string; auth?: { accountId: number } }) => string;
}

const mockLimiterHandler = jest.fn();
const mockRateLimit = jest.fn((_options: CapturedLimiterOptions) => mockLimiterHandler);

jest.mock('express-rate-limit', () => ({
  __esModule: true,
  default: mockRateLimit,
}));

const mockRedisStore = jest.fn().mockImplementation((options: unknown) => ({ options }));

jest.mock('rate-limit-redis', () => ({
  __esModule: true,
  default: mockRedisStore,
}));

let mockIsTest = false;
let mockDisabled = false;

jest.mock('../../../src/config', () => ({
  config: {
    get isTest() {
      return mockIsTest;
    },
  },
}));

jest.mock('../../../src/config/environments', () => ({
  RATE_LIMIT_CONFIG: {
    get disabled() {
      return mockDisabled;
    },
    global: { windowMs: 900000, maxRequests: 100 },
    auth: { windowMs: 900000, maxRequests: 5 },
    transaction: { windowMs: 60000, maxRequests: 10 },
  },
}));

const mockCall = jest.fn();
const mockGetRedisClient = jest.fn(() => ({ call: mockCall }));

jest.mock('../../../src/config/redis', () => ({
  getRedisClient: mockGetRedisClient,
}));

const mockLogger = { warn: jest.fn() };

jest.mock('../../../src/observability', () => ({
  logger: mockLogger,
}));

type SendCommand = (command: string, ...args: string[]) => Promise<unknown>;

const sendCommandOf = (storeIndex: number): SendCommand =>
  mockRedisStore.mock.calls[storeIndex][0].sendCommand;

const limiterOptions = (limiterIndex: number) => mockRateLimit.mock.calls[limiterIndex][0];

describe('Rate limiter', () => {
  let limiters: typeof import('../../../src/middlewares/rateLimiter');

  const load = async (): Promise<void> => {
    limiters = await import('../../../src/middlewares/rateLimiter');
  };

  beforeEach(() => {
    jest.clearAllMocks();
    jest.resetModules();
    mockIsTest = false;
    mockDisabled = false;
    mockGetRedisClient.mockImplementation(() => ({ call: mockCall }));
  });

  describe('Redis store', () => {
    it('should give each limiter its own key prefix', async () => {
      await load();

      expect(mockRedisStore.mock.calls.map(([options]) => options.prefix)).toEqual([
        'rl:global:',
        'rl:auth:',
        'rl:tx:',
      ]);
      expect(limiterOptions(0).store).toBe(mockRedisStore.mock.results[0].value);
    });

    it('should forward commands and pass scalar replies through', async () => {
      mockCall.mockResolvedValue('OK');
      await load();

      await expect(sendCommandOf(0)('SET', 'rl:global:127.0.0.1', '1')).resolves.toBe('OK');
      expect(mockCall).toHaveBeenCalledWith('SET', 'rl:global:127.0.0.1', '1');
    });

    it('should drop non-scalar members from array replies', async () => {
      mockCall.mockResolvedValue([3, null, 'PX', true, { nested: 1 }]);
      await load();

      await expect(sendCommandOf(1)('EVALSHA', 'sha', '1')).resolves.toEqual([3, 'PX', true]);
    });

    it('should reject replies that are neither scalar nor array', async () => {
      mockCall.mockResolvedValue(null);
      await load();

      await expect(sendCommandOf(2)('GET', 'rl:tx:account:1001')).rejects.toThrow(
        'Unexpected Redis reply: null'
      );
    });

    it('should fall back to the memory store when the client cannot be built', async () => {
      const err = new Error('Redis unavailable');
      mockGetRedisClient.mockImplementation(() => {
        throw err;
      });

      await load();

      expect(mockRedisStore).not.toHaveBeenCalled();
      expect(limiterOptions(0).store).toBeUndefined();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { err },
        'Failed to create Redis store for rate limiting, using memory store'
      );
    });

    it('should use the memory store in tests', async () => {
      mockIsTest = true;

      await load();

      expect(mockGetRedisClient).not.toHaveBeenCalled();
      expect(limiterOptions(1).store).toBeUndefined();
    });
  });

  describe('limiter options', () => {
    it('should exempt health checks and metrics from the global limit', async () => {
      await load();
      const { skip } = limiterOptions(0);

      expect(skip({ path: '/health/ready' })).toBe(true);
      expect(skip({ path: '/metrics' })).toBe(true);
      expect(skip({ path: '/accounts/me/balance' })).toBe(false);
    });

    it('should key transactions by account and fall back to the client IP', async () => {
      await load();
      const { keyGenerator } = limiterOptions(2);

      expect(keyGenerator({ auth: { accountId: 1001 }, ip: '10.0.0.1' })).toBe('account:1001');
      expect(keyGenerator({ ip: '10.0.0.1' })).toBe('10.0.0.1');
    });
  });

  describe('RATE_LIMIT_DISABLED', () => {
    it('should replace every limiter with a pass-through', async () => {
      mockDisabled = true;
      await load();
      const next: NextFunction = jest.fn();

      limiters.globalLimiter({} as Request, {} as Response, next);
      limiters.transactionLimiter({} as Request, {} as Response, next);

      expect(next).toHaveBeenCalledTimes(2);
      expect(mockLimiterHandler).not.toHaveBeenCalled();
      expect(mockLogger.warn).toHaveBeenCalledWith('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    });

    it('should use the configured limiters when enabled', async () => {
      await load();

      expect(limiters.authLimiter).toBe(mockLimiterHandler);
    });
  });
});
