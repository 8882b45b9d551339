import { readdirSync, readFileSync } from 'fs';
import { join, sep } from 'path';
import { db } from '../postgres';
import { logger } from '../../utils/logger';

// tsc does not copy .sql files; compiled code reads them from src
const migrationsDir = __dirname.includes(`${sep}dist${sep}`)
  ? __dirname.replace(`${sep}dist${sep}`, `${sep}src${sep}`)
  : __dirname;

/** Numbered `NNN_name.sql` files, in the order they apply. */
function pendingFiles(applied: ReadonlySet<string>): string[] {
  return readdirSync(migrationsDir)
    .filter((file) => /^\d{3}_.+\.sql$/.test(file))
    .sort()
    .filter((file) => !applied.has(file.slice(0, -'.sql'.length)));
}

export async function runMigrations(): Promise<number> {
  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version VARCHAR(255) PRIMARY KEY,
       applied_at TIMESTAMP NOT NULL DEFAULT NOW()
     )`
  );

  const rows = await db.query<{ version: string }>('SELECT version FROM schema_migrations');
  const pending = pendingFiles(new Set(rows.map((row) => row.version)));
  if (pending.length === 0) {
    logger.info('Schema up to date');
    return 0;
  }

  for (const file of pending) {
    const version = file.slice(0, -'.sql'.length);
    const statements = readFileSync(join(migrationsDir, file), 'utf-8');
    try {
      await db.transaction(async (client) => {
        await client.query(statements);
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
      });
    } catch (error) {
      logger.error('Migration failed', { version, error });
      throw error;
    }
    logger.info('Migration applied', { version });
  }
  return pending.length;
}
