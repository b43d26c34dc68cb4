import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  SESSION_CONFIG,
  LEDGER_CONFIG,
  CREDENTIAL_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  port: API_CONFIG.port,

  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  session: SESSION_CONFIG,

  ledger: LEDGER_CONFIG,

  credentials: CREDENTIAL_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,

  logging: LOG_CONFIG,

  otel: OTEL_CONFIG,

  security: SECURITY_CONFIG,
};
