/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// PERSISTENCE
// =============================================================================

export type LedgerStoreKind = 'mongo' | 'memory';

const parseStoreKind = (value: string | undefined): LedgerStoreKind => {
  if (value === 'mongo' || value === 'memory') {
    return value;
  }
  return isTest ? 'memory' : 'mongo';
};

/**
 * MongoDB URI by environment.
 * Multi-document transactions need a replica set, hence the replicaSet default.
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/ledger-bank-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/ledger-bank?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

/**
 * Ledger engine settings
 */
export const LEDGER_CONFIG = {
  store: parseStoreKind(process.env.LEDGER_STORE),
  // Upper bound on waiting for an account lock before the unit of work aborts
  lockTimeoutMs: parseInt(process.env.LEDGER_LOCK_TIMEOUT_MS || '5000', 10),
  defaultCurrency: (process.env.LEDGER_DEFAULT_CURRENCY || 'USD').toUpperCase(),
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

export const JWT_CONFIG = {
  secret: process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production',
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '30m'),
};

/**
 * Bcrypt rounds - higher in production for security, lower in test for speed
 */
export const BCRYPT_ROUNDS = isProduction
  ? parseInt(process.env.BCRYPT_ROUNDS || '12', 10)
  : isTest
  ? 4
  : parseInt(process.env.BCRYPT_ROUNDS || '10', 10);

// =============================================================================
// CARD CONFIGURATION
// =============================================================================

export const CARD_CONFIG = {
  encryptionKey: process.env.CARD_ENCRYPTION_KEY || 'dev-card-key-do-not-use-in-production',
  validityYears: parseInt(process.env.CARD_VALIDITY_YEARS || '3', 10),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment.
 * Set RATE_LIMIT_DISABLED=true to turn every limiter into a pass-through.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '300', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  auth: {
    windowMs: parseInt(process.env.AUTH_RATE_LIMIT_WINDOW_MS || '900000', 10),
    maxRequests: isProduction
      ? parseInt(process.env.AUTH_RATE_LIMIT_MAX || '5', 10)
      : isTest
      ? 10000
      : parseInt(process.env.AUTH_RATE_LIMIT_MAX || '100', 10),
  },

  // Money-moving endpoints (transactions, transfers)
  ledger: {
    windowMs: parseInt(process.env.LEDGER_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '30', 10)
      : isTest
      ? 10000
      : parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '300', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:5173'],
};

// =============================================================================
// LOGGING / OBSERVABILITY
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'ledger-bank-api',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'CARD_ENCRYPTION_KEY', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }

  if (LEDGER_CONFIG.store === 'memory') {
    throw new Error('LEDGER_STORE=memory is not durable and cannot run in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  ledgerStore: LEDGER_CONFIG.store,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
});
