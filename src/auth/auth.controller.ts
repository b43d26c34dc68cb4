import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { authAttemptsTotal, createServiceLogger } from '../observability';
import { SuccessResponse } from '../types/errors';
import { LedgerService } from '../services/ledger/ledger.service';
import { LoginDTO, LoginResponse, SESSION_ID_HEADER } from './auth.types';
import { SessionManager } from './session.manager';

const log = createServiceLogger('auth');

export class AuthController {
  constructor(
    private readonly ledger: LedgerService,
    private readonly sessions: SessionManager
  ) {}

  /**
   * POST /auth/login
   * Resolve the PIN to an account, then open a session for it
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto: LoginDTO = { pin: String(req.body.pin) };

      const resolved = await this.ledger.resolveAccount(dto.pin);
      if (!resolved.success) {
        authAttemptsTotal.inc({ outcome: 'failure' });
        if (resolved.reason === 'STORAGE_FAILURE') {
          throw ApiError.database('Unable to verify credentials');
        }
        log.warn({ ip: req.ip }, 'Login rejected');
        throw ApiError.invalidCredentials();
      }

      const session = this.sessions.createSession(resolved.accountId);
      authAttemptsTotal.inc({ outcome: 'success' });

      const data: LoginResponse = {
        sessionId: session.id,
        accountId: session.accountId,
        expiresAt: session.expiresAt.toISOString(),
      };

      const body: SuccessResponse<LoginResponse> = { success: true, data };

      res.setHeader(SESSION_ID_HEADER, session.id);
      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  }
}
