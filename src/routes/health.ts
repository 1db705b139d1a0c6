import { Router, Request, Response } from 'express';

import { Stores } from '../stores';

export const createHealthRoutes = (stores: Stores): Router => {
  const router = Router();

  const storeStatus = () => ({
    ledger: { ready: stores.ledger.isReady() },
    identity: { ready: stores.identity.isReady() },
  });

  router.get('/', (_req: Request, res: Response) => {
    const services = storeStatus();
    const isHealthy = services.ledger.ready && services.identity.ready;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const services = storeStatus();
    const isReady = services.ledger.ready && services.identity.ready;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
