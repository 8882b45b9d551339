import { Router, Request, Response, NextFunction } from 'express';
import { BrokerMetrics } from '../../services/metrics/BrokerMetrics';

export function createMetricsRouter(metrics: BrokerMetrics): Router {
  const router = Router();

  // GET /metrics (Prometheus endpoint)
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await metrics.update();
      res.set('Content-Type', metrics.contentType);
      res.send(await metrics.getMetrics());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
