export { logger, createServiceLogger } from './logger';

export type { LogContext } from './log-context';
export {
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';

export { correlationMiddleware } from './correlation';

export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerTransactionsTotal,
  ledgerTransfersTotal,
  ledgerAmount,
  ledgerLockWait,
  ledgerLockTimeoutsTotal,
  authAttemptsTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

export { metricsMiddleware, normalizePath } from './metrics.middleware';

export { initTracing, shutdownTracing, getTracer, traceLedgerOperation } from './tracing';
