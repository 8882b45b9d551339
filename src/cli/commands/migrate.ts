import { db } from '../../database/postgres';
import { runMigrations } from '../../database/migrations/run-migrations';

export async function migrateCommand(): Promise<void> {
  await db.connect();
  try {
    const applied = await runMigrations();
    console.log(applied === 0 ? 'Schema up to date' : `Applied ${applied} migration(s)`);
  } finally {
    await db.disconnect();
  }
}
