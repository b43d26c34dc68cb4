import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'cashpoint' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Session Metrics
// ============================================

/**
 * Login attempts counter
 */
export const authAttemptsTotal = new Counter({
  name: 'auth_attempts_total',
  help: 'Authentication attempts by outcome',
  labelNames: ['outcome'] as const, // success, failure
  registers: [registry],
});

/**
 * Session validations by result (valid, renewed, not_found, expired)
 */
export const sessionValidationsTotal = new Counter({
  name: 'session_validations_total',
  help: 'Session validations by result',
  labelNames: ['result'] as const,
  registers: [registry],
});

let countActiveSessions: (() => number) | null = null;

/**
 * Point the active sessions gauge at the live count; read on every scrape
 */
export const trackActiveSessions = (count: () => number): void => {
  countActiveSessions = count;
};

export const activeSessions = new Gauge({
  name: 'active_sessions',
  help: 'Sessions that have not yet expired',
  registers: [registry],
  collect() {
    if (countActiveSessions) {
      this.set(countActiveSessions());
    }
  },
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger transactions by kind and status (committed or failure reason)
 */
export const ledgerTransactionsTotal = new Counter({
  name: 'ledger_transactions_total',
  help: 'Ledger transactions by kind and status',
  labelNames: ['kind', 'status'] as const,
  registers: [registry],
});

export const transactionAmount = new Histogram({
  name: 'transaction_amount',
  help: 'Committed transaction amounts',
  labelNames: ['kind'] as const,
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000, 100000],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
