/**
 * Server Bootstrap Unit Tests
 *
 * Tests that service construction happens inside the startup guard.
 */

const mockLogger = {
  info: jest.fn(),
  error: jest.fn(),
  fatal: jest.fn(),
};

jest.mock('../../src/observability', () => ({
  initTracing: jest.fn(),
  shutdownTracing: jest.fn().mockResolvedValue(undefined),
  logger: mockLogger,
}));

const mockServer = { close: jest.fn() };
const mockListen = jest.fn((_port: number, onListening: () => void) => {
  onListening();
  return mockServer;
});
const mockCreateApp = jest.fn(() => ({ listen: mockListen }));

jest.mock('../../src/app', () => ({
  createApp: mockCreateApp,
}));

jest.mock('../../src/config', () => ({
  config: {
    port: 4100,
    session: { ttlMs: 600000, renewThresholdMs: 60000, sweepIntervalMs: 30000 },
    ledger: { allowOverdraft: false, defaultHistoryLimit: 20, maxHistoryLimit: 100 },
    credentials: { pepper: '' },
    rateLimit: { disabled: true },
  },
  getEnvironmentInfo: jest.fn(() => ({ nodeEnv: 'test' })),
}));

const mockConnectDatabase = jest.fn().mockResolvedValue(undefined);

jest.mock('../../src/config/database', () => ({
  connectDatabase: mockConnectDatabase,
  disconnectDatabase: jest.fn().mockResolvedValue(undefined),
}));

jest.mock('../../src/config/redis', () => ({
  connectRedis: jest.fn().mockResolvedValue(undefined),
  disconnectRedis: jest.fn().mockResolvedValue(undefined),
}));

const mockSessionManager = { startSweeper: jest.fn(), stopSweeper: jest.fn() };

jest.mock('../../src/auth', () => ({
  InMemorySessionStore: jest.fn(),
  SessionManager: jest.fn(() => mockSessionManager),
}));

jest.mock('../../src/services/ledger', () => ({
  LedgerService: jest.fn(),
  MongoLedgerStore: jest.fn(),
}));

const mockCreatePinDigester = jest.fn();

jest.mock('../../src/utils/credentials', () => ({
  createPinDigester: mockCreatePinDigester,
}));

const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('Server bootstrap', () => {
  let exitSpy: jest.SpyInstance;
  let onSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.resetModules();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    onSpy = jest.spyOn(process, 'on').mockImplementation(() => process);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    onSpy.mockRestore();
  });

  it('should log a fatal error and exit when a service cannot be built', async () => {
    mockCreatePinDigester.mockImplementation(() => {
      throw new Error('A credential pepper is required');
    });

    await import('../../src/server');
    await flushPromises();

    expect(mockLogger.fatal).toHaveBeenCalledWith(
      { err: expect.objectContaining({ message: 'A credential pepper is required' }) },
      'Failed to start server'
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mockConnectDatabase).not.toHaveBeenCalled();
    expect(mockCreateApp).not.toHaveBeenCalled();
  });

  it('should connect, start the sweeper and listen when startup succeeds', async () => {
    mockCreatePinDigester.mockImplementation(() => (pin: string) => pin);

    await import('../../src/server');
    await flushPromises();

    expect(mockCreateApp).toHaveBeenCalledTimes(1);
    expect(mockConnectDatabase).toHaveBeenCalledTimes(1);
    expect(mockSessionManager.startSweeper).toHaveBeenCalledWith(30000);
    expect(mockListen).toHaveBeenCalledWith(4100, expect.any(Function));
    expect(mockLogger.fatal).not.toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });
});
