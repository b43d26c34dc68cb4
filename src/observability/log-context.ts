import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped logging context
 */
export interface LogContext {
  correlationId: string;
  accountId?: number;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

/**
 * Merge extra fields into the current request's context, if any
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};
