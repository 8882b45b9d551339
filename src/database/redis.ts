import { createClient } from 'redis';
import { config } from '../config/config';
import { logger } from '../utils/logger';

type RedisClient = ReturnType<typeof createClient>;

class RedisDatabase {
  private client: RedisClient | null = null;

  async connect(): Promise<void> {
    const { host, port, password } = config.redis;
    const client = createClient({
      socket: { host, port },
      ...(password ? { password } : {}),
    });
    client.on('error', (err) => logger.error('Redis error', { error: err }));
    client.on('reconnecting', () => logger.warn('Redis reconnecting', { host, port }));

    try {
      await client.connect();
    } catch (error) {
      logger.error('Cannot reach Redis', { host, port, error });
      throw error;
    }
    this.client = client;
    logger.info('Redis ready', { host, port });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.quit();
      logger.info('Redis connection closed');
    }
  }

  private connected(): RedisClient {
    if (this.client === null) {
      throw new Error('Redis is not connected');
    }
    return this.client;
  }

  async get<T>(key: string, revive: (value: unknown) => T): Promise<T | null> {
    const value = await this.connected().get(key);
    if (value === null) {
      return null;
    }
    try {
      return revive(JSON.parse(value));
    } catch (error) {
      logger.warn('Dropping unreadable cache entry', { key, error });
      await this.del(key);
      return null;
    }
  }

  async set(key: string, value: unknown, expirationSeconds?: number): Promise<void> {
    const stringValue = JSON.stringify(value);
    if (expirationSeconds) {
      await this.connected().setEx(key, expirationSeconds, stringValue);
    } else {
      await this.connected().set(key, stringValue);
    }
  }

  async del(key: string): Promise<void> {
    await this.connected().del(key);
  }

  async ping(): Promise<string> {
    return this.connected().ping();
  }
}

export type Cache = Pick<RedisDatabase, 'get' | 'set' | 'del'>;

export const redis = new RedisDatabase();
