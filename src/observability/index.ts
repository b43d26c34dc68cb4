export { logger, createServiceLogger } from './logger';

export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  addLogContext,
} from './log-context';

export { correlationMiddleware } from './correlation';

export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  authAttemptsTotal,
  sessionValidationsTotal,
  activeSessions,
  trackActiveSessions,
  ledgerTransactionsTotal,
  transactionAmount,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

export { metricsMiddleware } from './metrics.middleware';

export { initTracing, shutdownTracing, getTracer, withSpan, traceLedgerOperation } from './tracing';
