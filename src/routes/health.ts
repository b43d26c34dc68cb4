import { Router, Request, Response, NextFunction } from 'express';

import { SessionManager } from '../auth/session.manager';
import { LedgerService } from '../services/ledger/ledger.service';

export interface HealthRouteDeps {
  ledgerService: LedgerService;
  sessionManager: SessionManager;
}

export const createHealthRoutes = ({ ledgerService, sessionManager }: HealthRouteDeps): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    ledgerService
      .isHealthy()
      .then((storeHealthy) => {
        res.status(storeHealthy ? 200 : 503).json({
          status: storeHealthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
          services: {
            ledgerStore: {
              connected: storeHealthy,
            },
            sessions: {
              active: sessionManager.activeSessionCount(),
            },
          },
        });
      })
      .catch(next);
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response, next: NextFunction) => {
    ledgerService
      .isHealthy()
      .then((isReady) => {
        res.status(isReady ? 200 : 503).json({
          status: isReady ? 'ready' : 'not ready',
          timestamp: new Date().toISOString(),
        });
      })
      .catch(next);
  });

  return router;
};
