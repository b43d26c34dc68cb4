/**
 * Ledger Controller
 *
 * HTTP adapter for balance reads, deposits, withdrawals and history.
 * Every handler runs behind the session middleware.
 */

import { Response, NextFunction } from 'express';

import { AuthRequest, AuthenticatedRequest } from '../../auth/auth.types';
import { Session } from '../../auth/session.types';
import { ApiError } from '../../middlewares/errorHandler';
import { LedgerService } from './ledger.service';
import { LedgerFailure, TransactionKind } from './ledger.types';

/**
 * Reaching a ledger handler without a session means the router was wired
 * without the session middleware: a programming error, not a client one.
 */
const isAuthenticated = (req: AuthRequest): req is AuthenticatedRequest => req.auth !== undefined;

const requireSession = (req: AuthRequest): Session => {
  if (!isAuthenticated(req)) {
    throw ApiError.internal('Session must be resolved before reaching the ledger');
  }
  return req.auth;
};

const toApiError = (failure: LedgerFailure): ApiError => {
  switch (failure.reason) {
    case 'ACCOUNT_NOT_FOUND':
      return ApiError.accountNotFound(failure.error);
    case 'INSUFFICIENT_FUNDS':
      return ApiError.insufficientFunds(failure.error);
    case 'INVALID_AMOUNT':
      return ApiError.invalidAmount(failure.error);
    case 'STORAGE_FAILURE':
      return ApiError.database('Transaction failed');
  }
};

export class LedgerController {
  constructor(private readonly ledger: LedgerService) {}

  /**
   * GET /accounts/me/balance
   */
  async getBalance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const session = requireSession(req);
      const result = await this.ledger.getBalance(session.accountId);
      if (!result.success) {
        throw toApiError(result);
      }

      res.status(200).json({
        success: true,
        data: {
          accountId: result.accountId,
          balance: result.balance,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /accounts/me/deposit
   */
  async deposit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    return this.transact('DEPOSIT', req, res, next);
  }

  /**
   * POST /accounts/me/withdraw
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    return this.transact('WITHDRAWAL', req, res, next);
  }

  /**
   * GET /accounts/me/transactions
   */
  async getHistory(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const session = requireSession(req);
      const limit = req.query.limit === undefined ? undefined : Number(req.query.limit);

      const result = await this.ledger.getHistory(session.accountId, limit);
      if (!result.success) {
        throw toApiError(result);
      }

      res.status(200).json({
        success: true,
        data: {
          accountId: result.accountId,
          entries: result.entries,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  private async transact(
    kind: TransactionKind,
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const session = requireSession(req);
      const amount = Number(req.body.amount);

      const result = await this.ledger.applyTransaction(session.accountId, kind, amount);
      if (!result.success) {
        throw toApiError(result);
      }

      res.status(200).json({
        success: true,
        data: {
          entry: result.entry,
          newBalance: result.newBalance,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
