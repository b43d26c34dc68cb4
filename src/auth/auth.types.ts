import { Request } from 'express';

import { Session } from './session.types';

export interface AuthRequest extends Request {
  auth?: Session;
}

/**
 * A request that has been through the session middleware
 */
export interface AuthenticatedRequest extends Request {
  auth: Session;
}

export interface LoginDTO {
  pin: string;
}

export interface LoginResponse {
  sessionId: string;
  accountId: number;
  expiresAt: string;
}

export const SESSION_ID_HEADER = 'SessionID';
export const SESSION_EXPIRES_HEADER = 'X-Session-Expires-At';
