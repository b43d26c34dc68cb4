import { Response, NextFunction, RequestHandler } from 'express';
import { validate as isUuid } from 'uuid';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';
import { AuthRequest, SESSION_EXPIRES_HEADER } from './auth.types';
import { SessionManager } from './session.manager';

/**
 * Resolve the bearer session token into req.auth, or reject the request.
 * Validation may renew the session; the new expiry goes out in a header.
 */
export const createAuthMiddleware = (sessions: SessionManager): RequestHandler => {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        throw ApiError.unauthorized('No authorization header provided');
      }

      if (!authHeader.startsWith('Bearer ')) {
        throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <session id>');
      }

      const token = authHeader.substring(7).trim();

      if (!isUuid(token)) {
        throw ApiError.invalidToken();
      }

      const result = sessions.validate(token);

      switch (result.status) {
        case 'not_found':
          throw ApiError.sessionNotFound();
        case 'expired':
          throw ApiError.sessionExpired();
        case 'valid':
          if (result.renewed) {
            res.setHeader(SESSION_EXPIRES_HEADER, result.session.expiresAt.toISOString());
          }
          req.auth = result.session;
          addLogContext({ accountId: result.session.accountId });
          next();
      }
    } catch (error) {
      next(error);
    }
  };
};
