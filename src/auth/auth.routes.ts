import { Router, Request, Response, NextFunction } from 'express';

import { authLimiter } from '../middlewares/rateLimiter';
import { validateRequest } from '../middlewares/validateRequest';
import { LedgerService } from '../services/ledger/ledger.service';
import { AuthController } from './auth.controller';
import { loginValidation } from './auth.validation';
import { SessionManager } from './session.manager';

export interface AuthRouteDeps {
  ledgerService: LedgerService;
  sessionManager: SessionManager;
}

export const createAuthRoutes = ({ ledgerService, sessionManager }: AuthRouteDeps): Router => {
  const router = Router();
  const authController = new AuthController(ledgerService, sessionManager);

  router.post('/login', authLimiter, loginValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => authController.login(req, res, next));

  return router;
};
