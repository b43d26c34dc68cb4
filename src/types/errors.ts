/**
 * Error Codes for the Cashpoint API
 *
 * Categorized by error type:
 * - 1xxx: Authentication and session errors
 * - 2xxx: Validation errors
 * - 3xxx: Ledger errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  INVALID_CREDENTIALS = 1004,
  SESSION_NOT_FOUND = 1005,
  SESSION_EXPIRED = 1006,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,

  // Ledger errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  ACCOUNT_NOT_FOUND = 3002,
  RESOURCE_NOT_FOUND = 3010,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_LOGIN_ATTEMPTS = 4002,
  TOO_MANY_TRANSACTIONS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.INVALID_CREDENTIALS]: 401,
  [ErrorCode.SESSION_NOT_FOUND]: 401,
  [ErrorCode.SESSION_EXPIRED]: 401,

  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,

  [ErrorCode.INSUFFICIENT_FUNDS]: 400,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_LOGIN_ATTEMPTS]: 429,
  [ErrorCode.TOO_MANY_TRANSACTIONS]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}
