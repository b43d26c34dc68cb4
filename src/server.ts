import { initTracing, shutdownTracing, logger } from './observability';

// Tracing must patch modules before express and mongoose load
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { InMemorySessionStore, SessionManager } from './auth';
import { LedgerService, MongoLedgerStore } from './services/ledger';
import { createPinDigester } from './utils/credentials';

const startServer = async (): Promise<void> => {
  try {
    const sessionManager = new SessionManager({
      store: new InMemorySessionStore(),
      ttlMs: config.session.ttlMs,
      renewThresholdMs: config.session.renewThresholdMs,
    });

    const ledgerService = new LedgerService({
      store: new MongoLedgerStore(),
      digestCredential: createPinDigester(config.credentials.pepper),
      allowOverdraft: config.ledger.allowOverdraft,
      defaultHistoryLimit: config.ledger.defaultHistoryLimit,
      maxHistoryLimit: config.ledger.maxHistoryLimit,
    });

    const app = createApp({ ledgerService, sessionManager });

    // Connect to database
    await connectDatabase();

    // Rate limiter store
    if (!config.rateLimit.disabled) {
      await connectRedis();
    }

    sessionManager.startSweeper(config.session.sweepIntervalMs);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info(
        { ...getEnvironmentInfo(), port: config.port, allowOverdraft: config.ledger.allowOverdraft },
        `Server running on port ${config.port}`
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');
      sessionManager.stopSweeper();

      server.close(() => {
        logger.info('HTTP server closed');

        Promise.all([disconnectDatabase(), disconnectRedis()])
          .then(() => shutdownTracing())
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
