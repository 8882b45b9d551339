import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { config } from '../config/config';
import { logger } from '../utils/logger';

const SLOW_QUERY_MS = 250;

/** What transaction bodies may do with their connection. */
export type TransactionClient = Pick<PoolClient, 'query'>;

class BrokerDatabase {
  private readonly pool: Pool;

  constructor() {
    const { host, port, database, user, password } = config.database;
    this.pool = new Pool({
      host,
      port,
      database,
      user,
      // Empty means trust auth
      password: password || undefined,
      max: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });

    this.pool.on('error', (err) => {
      logger.error('Idle pg client failed', { error: err });
    });
  }

  /** Probes the server so startup fails fast on bad credentials. */
  async connect(): Promise<void> {
    let version: string | undefined;
    try {
      const rows = await this.query<{ server_version: string }>('SHOW server_version');
      version = rows[0]?.server_version;
    } catch (error) {
      logger.error('Cannot reach PostgreSQL', { host: config.database.host, error });
      throw error;
    }
    logger.info('PostgreSQL ready', { version, pool: this.pool.totalCount });
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    logger.info('PostgreSQL pool closed');
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const startedAt = Date.now();
    let result: QueryResult<T>;
    try {
      result = await this.pool.query<T>(text, params);
    } catch (error) {
      logger.error('Query failed', { text, error });
      throw error;
    }
    const elapsed = Date.now() - startedAt;
    if (elapsed > SLOW_QUERY_MS) {
      logger.warn('Slow query', { text, elapsed });
    } else {
      logger.debug('Query', { text, elapsed, rows: result.rowCount });
    }
    return result.rows;
  }

  async transaction<T>(work: (client: TransactionClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const value = await work(client);
      await client.query('COMMIT');
      return value;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Rollback failed', { error: rollbackError });
      });
      throw error;
    } finally {
      client.release();
    }
  }
}

export type Database = Pick<BrokerDatabase, 'query' | 'transaction'>;

export const db = new BrokerDatabase();
