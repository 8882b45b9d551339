import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import http from 'http';
import { config } from '../config/config';
import { BrokerServices } from '../services';
import { logger } from '../utils/logger';
import { errorHandler } from '../utils/errors';
import { createAuthMiddleware } from './middleware/auth';
import { apiRateLimiter } from './middleware/rateLimit';

import { createAuthRouter } from './routes/auth';
import { createCreditsRouter } from './routes/credits';
import { HealthCheck, createHealthRouter } from './routes/health';
import { createMetricsRouter } from './routes/metrics';
import { createNodesRouter } from './routes/nodes';
import { createTransparencyRouter } from './routes/transparency';
import { createVpnRouter } from './routes/vpn';

const ID_SEGMENT = /\/([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}|gw-[0-9a-f]{16})(?=\/|$)/gi;

/** Keeps metric label cardinality bounded. */
export function normalizeEndpoint(path: string): string {
  return path.replace(ID_SEGMENT, '/:id');
}

export interface ApiGatewayOptions {
  healthChecks?: HealthCheck[];
  port?: number;
  host?: string;
}

export class ApiGateway {
  private app: Express;
  private server: http.Server;

  constructor(
    private readonly services: BrokerServices,
    private readonly options: ApiGatewayOptions = {}
  ) {
    this.app = express();
    this.server = http.createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    const origin = config.cors.origin === '*' ? true : config.cors.origin;
    this.app.use(cors({ origin, credentials: true }));
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(this.accessLog);
    this.app.use(apiRateLimiter);
  }

  private readonly accessLog = (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    res.on('finish', () => {
      // Routers strip their mount point from req.path
      const path = req.baseUrl + req.path;
      logger.info('HTTP request', {
        method: req.method,
        path,
        status: res.statusCode,
        duration: Date.now() - startedAt,
      });
      this.services.metrics.recordApiRequest(req.method, normalizeEndpoint(path), res.statusCode);
    });
    next();
  };

  private setupRoutes(): void {
    const { auth, supervisor, directory, heartbeat, ledger, transparency, metrics, tokens } = this.services;
    const middleware = createAuthMiddleware(tokens);

    this.app.use('/health', createHealthRouter(this.options.healthChecks ?? []));
    this.app.use('/metrics', createMetricsRouter(metrics));

    this.app.use('/auth', createAuthRouter(auth));
    this.app.use('/vpn', createVpnRouter(supervisor, middleware));
    this.app.use('/nodes', createNodesRouter({ directory, heartbeat, supervisor }, middleware));
    this.app.use('/credits', createCreditsRouter(ledger, middleware));
    this.app.use('/transparency', createTransparencyRouter(transparency, middleware));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
    });
    this.app.use(errorHandler);
  }

  getApp(): Express {
    return this.app;
  }

  /** Restores persisted sessions, starts background tasks, then listens. */
  async start(): Promise<void> {
    const port = this.options.port ?? config.server.port;
    const host = this.options.host ?? config.server.host;

    await this.services.supervisor.restore();
    this.toggleBackgroundTasks(true);

    try {
      await new Promise<void>((resolve, reject) => {
        this.server.once('error', reject);
        this.server.listen(port, host, () => {
          this.server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      this.toggleBackgroundTasks(false);
      logger.error('Cannot bind API listener', { host, port, error });
      throw error;
    }
    logger.info('Broker API listening', { host, port });
  }

  async stop(): Promise<void> {
    this.toggleBackgroundTasks(false);
    if (!this.server.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Broker API closed');
  }

  private toggleBackgroundTasks(on: boolean): void {
    const { supervisor, heartbeat, gateways, metrics } = this.services;
    if (on) {
      supervisor.startSweepTask();
      heartbeat.startReconcileTask();
      gateways.startSyncTask();
      metrics.startUpdateTask();
    } else {
      supervisor.stopSweepTask();
      heartbeat.stopReconcileTask();
      gateways.stopSyncTask();
      metrics.stopUpdateTask();
    }
  }
}
