import { Router, Request, Response } from 'express';
import { logger } from '../../utils/logger';

export interface HealthCheck {
  name: string;
  /** Resolves when the dependency answers; rejects otherwise. */
  check: () => Promise<void>;
}

interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: Record<string, { status: 'healthy' | 'unhealthy'; latency?: number }>;
}

export function createHealthRouter(checks: HealthCheck[]): Router {
  const router = Router();

  // GET /health
  router.get('/', async (_req: Request, res: Response) => {
    const health: HealthCheckResult = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {},
    };

    for (const { name, check } of checks) {
      const start = Date.now();
      try {
        await check();
        health.services[name] = { status: 'healthy', latency: Date.now() - start };
      } catch (error) {
        health.services[name] = { status: 'unhealthy' };
        health.status = 'unhealthy';
        logger.error(`${name} health check failed`, { error });
      }
    }

    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  });

  // GET /health/ready (readiness probe)
  router.get('/ready', async (_req: Request, res: Response) => {
    try {
      await Promise.all(checks.map(({ check }) => check()));
      res.status(200).json({ status: 'ready' });
    } catch (error) {
      logger.error('Readiness check failed', { error });
      res.status(503).json({ status: 'not ready' });
    }
  });

  // GET /health/live (liveness probe)
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', uptime: process.uptime() });
  });

  return router;
}
