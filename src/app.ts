import express, { Application, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { createAuthRoutes, requireMember, requireRole } from './auth';
import { config } from './config';
import { Container, ContainerOptions, createContainer } from './container';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { globalLimiter } from './middlewares/rateLimiter';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  createServiceLogger,
} from './observability';
import { createHealthRoutes } from './routes/health';
import { createAccountRoutes } from './services/account';
import { createAccountHolderRoutes } from './services/account-holder';
import { createAdminRoutes } from './services/admin';
import { createCardRoutes } from './services/card';
import { createStatementRoutes } from './services/statement';
import { createTransactionRoutes } from './services/transaction';
import { createTransferRoutes } from './services/transfer';
import { createStores, Stores } from './stores';
import { UserType } from './types/identity';

const log = createServiceLogger('app');

export interface CreateAppOptions extends ContainerOptions {
  stores?: Stores;
}

export interface LedgerApp {
  app: Application;
  container: Container;
}

/**
 * Build the Express app and the services behind it. Without explicit stores
 * the configured backend is used.
 */
export const buildApp = (options: CreateAppOptions = {}): LedgerApp => {
  const stores = options.stores ?? createStores(config.ledger);
  const container = createContainer(stores, options);
  const { controllers, authenticate } = container;

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(config.api.corsOrigins.length > 0 ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', createHealthRoutes(stores));
  app.use('/auth', createAuthRoutes(controllers.auth, authenticate));

  const member: RequestHandler[] = [authenticate, requireMember];
  app.use('/account-holders', ...member, createAccountHolderRoutes(controllers.accountHolder));
  app.use('/accounts/:accountId/transactions', ...member, createTransactionRoutes(controllers.transaction));
  app.use('/accounts/:accountId/statements', ...member, createStatementRoutes(controllers.statement));
  app.use('/accounts/:accountId/card', ...member, createCardRoutes(controllers.card));
  app.use('/accounts', ...member, createAccountRoutes(controllers.account));
  app.use('/transfers', ...member, createTransferRoutes(controllers.transfer));
  app.use('/admin', authenticate, requireRole(UserType.ADMIN), createAdminRoutes(controllers.admin));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      log.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Ledger Bank API',
      version: '1.0.0',
      description: 'Account ledger with atomic transfers and monthly statements',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, container };
};
