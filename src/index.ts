import { logger } from './utils/logger';
import { config } from './config/config';
import { db } from './database/postgres';
import { redis } from './database/redis';
import { runMigrations } from './database/migrations/run-migrations';
import { createPgStores } from './database/stores';
import { createServices } from './services';
import { ApiGateway, ApiGatewayOptions } from './api/gateway';

const healthChecks: ApiGatewayOptions['healthChecks'] = [
  { name: 'database', check: async () => { await db.query('SELECT 1'); } },
  { name: 'redis', check: async () => { await redis.ping(); } },
];

let gateway: ApiGateway | undefined;
let stopping = false;

async function main(): Promise<void> {
  logger.info('Relay broker booting', {
    env: config.server.nodeEnv,
    listen: `${config.server.host}:${config.server.port}`,
  });

  await db.connect();
  await redis.connect();
  await runMigrations();

  const services = createServices(createPgStores(db, redis), config, {
    collectDefaultMetrics: true,
  });
  gateway = new ApiGateway(services, { healthChecks });
  await gateway.start();
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (stopping) {
    return;
  }
  stopping = true;
  logger.info('Shutting down', { signal });

  let exitCode = 0;
  try {
    await gateway?.stop();
    await redis.disconnect();
    await db.disconnect();
  } catch (error) {
    logger.error('Shutdown did not finish cleanly', { error });
    exitCode = 1;
  }
  process.exit(exitCode);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => void shutdown(signal));
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason });
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error });
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Relay broker failed to start', { error });
  process.exit(1);
});
