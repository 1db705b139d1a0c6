import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'ledger-bank' });

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
// Ledger Metrics
// ============================================

/**
 * Single-leg credits and debits by outcome
 */
export const ledgerTransactionsTotal = new Counter({
  name: 'ledger_transactions_total',
  help: 'Authorized credit/debit transactions by type and status',
  labelNames: ['type', 'status'] as const,
  registers: [registry],
});

export const ledgerTransfersTotal = new Counter({
  name: 'ledger_transfers_total',
  help: 'Two-leg transfers by outcome',
  labelNames: ['outcome'] as const, // approved, declined
  registers: [registry],
});

/**
 * Amounts in minor units (cents)
 */
export const ledgerAmount = new Histogram({
  name: 'ledger_amount_cents',
  help: 'Amounts moved through the ledger in minor units',
  labelNames: ['operation'] as const,
  buckets: [100, 1000, 5000, 10000, 50000, 100000, 500000, 1000000],
  registers: [registry],
});

export const ledgerLockWait = new Histogram({
  name: 'ledger_lock_wait_seconds',
  help: 'Time spent waiting for exclusive account locks',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [registry],
});

export const ledgerLockTimeoutsTotal = new Counter({
  name: 'ledger_lock_timeouts_total',
  help: 'Units of work aborted because an account lock was not acquired in time',
  registers: [registry],
});

// ============================================
// Authentication Metrics
// ============================================

export const authAttemptsTotal = new Counter({
  name: 'auth_attempts_total',
  help: 'Authentication attempts by outcome',
  labelNames: ['outcome'] as const, // success, failure
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
