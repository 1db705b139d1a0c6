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
  LEDGER_CONFIG,
  JWT_CONFIG,
  BCRYPT_ROUNDS,
  CARD_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
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

  ledger: LEDGER_CONFIG,

  jwt: JWT_CONFIG,

  bcrypt: {
    rounds: BCRYPT_ROUNDS,
  },

  card: CARD_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,

  logging: LOG_CONFIG,

  otel: OTEL_CONFIG,
};
