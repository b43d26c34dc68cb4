/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

export { errorHandler, notFoundHandler, ApiError, AppError } from './errorHandler';

export { validateRequest } from './validateRequest';

export { globalLimiter, authLimiter, transactionLimiter } from './rateLimiter';
