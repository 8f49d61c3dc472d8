import { Router, Request, Response } from 'express';

import { HealthStatus } from '../container';

export const createHealthRoutes = (readStatus: () => HealthStatus): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const status = readStatus();
    const isHealthy = status.store.connected && status.eventBus.connected;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: status,
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  // Movements need the store; the event bus is best-effort
  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = readStatus().store.connected;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
