export { SessionManager, DEFAULT_SESSION_TTL_MS, DEFAULT_RENEW_THRESHOLD_MS } from './session.manager';
export { InMemorySessionStore } from './session.store';
export * from './session.types';
export { createAuthMiddleware } from './auth.middleware';
export { AuthController } from './auth.controller';
export * from './auth.types';
export { createAuthRoutes, AuthRouteDeps } from './auth.routes';
