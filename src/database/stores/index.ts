import { Database } from '../postgres';
import { Cache } from '../redis';
import { PgLedgerStore } from './PgLedgerStore';
import { PgNodeStore } from './PgNodeStore';
import { PgSessionStore } from './PgSessionStore';
import { PgUserStore } from './PgUserStore';
import { Stores } from './types';

export * from './types';
export { applyPostings } from './PgLedgerStore';

export function createPgStores(db: Database, cache: Cache): Stores {
  return {
    users: new PgUserStore(db),
    nodes: new PgNodeStore(db, cache),
    sessions: new PgSessionStore(db, cache),
    ledger: new PgLedgerStore(db),
  };
}
