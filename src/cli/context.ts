import { config } from '../config/config';
import { db } from '../database/postgres';
import { redis } from '../database/redis';
import { createPgStores } from '../database/stores';
import { BrokerServices, createServices } from '../services';

/** Opens the database and cache, runs `task` against the services, then closes both. */
export async function withServices<T>(task: (services: BrokerServices) => Promise<T>): Promise<T> {
  await db.connect();
  await redis.connect();
  try {
    return await task(createServices(createPgStores(db, redis), config));
  } finally {
    await redis.disconnect();
    await db.disconnect();
  }
}
