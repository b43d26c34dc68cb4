/**
 * Account API Routes
 *
 * Balance, deposit, withdrawal and history for the session's account.
 */

import { Router, Request, Response, NextFunction } from 'express';

import { createAuthMiddleware } from '../../auth/auth.middleware';
import { SessionManager } from '../../auth/session.manager';
import { transactionLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { historyQueryValidation, transactionValidation } from './ledger.validation';

export interface LedgerRouteDeps {
  ledgerService: LedgerService;
  sessionManager: SessionManager;
}

export const createLedgerRoutes = ({ ledgerService, sessionManager }: LedgerRouteDeps): Router => {
  const router = Router();
  const ledgerController = new LedgerController(ledgerService);

  // All account routes require a valid session
  router.use(createAuthMiddleware(sessionManager));

  // GET /accounts/me/balance
  router.get('/me/balance', (req: Request, res: Response, next: NextFunction) => ledgerController.getBalance(req, res, next));

  // GET /accounts/me/transactions - newest first
  router.get('/me/transactions', historyQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.getHistory(req, res, next));

  // POST /accounts/me/deposit
  router.post('/me/deposit', transactionLimiter, transactionValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.deposit(req, res, next));

  // POST /accounts/me/withdraw
  router.post('/me/withdraw', transactionLimiter, transactionValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.withdraw(req, res, next));

  return router;
};
