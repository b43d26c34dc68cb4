import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { createAuthRoutes } from './auth';
import { SessionManager } from './auth/session.manager';
import { errorHandler, notFoundHandler, globalLimiter } from './middlewares';
import {
  correlationMiddleware,
  logger,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';
import { createHealthRoutes } from './routes/health';
import { createLedgerRoutes } from './services/ledger';
import { LedgerService } from './services/ledger/ledger.service';

export interface AppDependencies {
  ledgerService: LedgerService;
  sessionManager: SessionManager;
}

export const createApp = (deps: AppDependencies): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(cors({ origin: config.api.corsOrigins, exposedHeaders: ['SessionID', 'X-Session-Expires-At'] }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', createHealthRoutes(deps));
  app.use('/auth', createAuthRoutes(deps));
  app.use('/accounts', createLedgerRoutes(deps));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  app.get('/', (_req, res) => {
    res.json({
      name: 'Cashpoint API',
      version: '1.0.0',
      description: 'PIN-authenticated sessions over an atomic balance ledger',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
