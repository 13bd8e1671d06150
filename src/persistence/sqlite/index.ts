export { openDatabase } from './database';
export { SqliteEventStore } from './SqliteEventStore';
export { SqliteLedgerStore } from './SqliteLedgerStore';

import type Database from 'better-sqlite3';
import { openDatabase } from './database';
import { SqliteEventStore } from './SqliteEventStore';
import { SqliteLedgerStore } from './SqliteLedgerStore';

export interface SqliteStores {
  db: Database.Database;
  event: SqliteEventStore;
  ledger: SqliteLedgerStore;
}

export function createSqliteStores(dbPath?: string): SqliteStores {
  const db = openDatabase(dbPath);
  return {
    db,
    event: new SqliteEventStore(db),
    ledger: new SqliteLedgerStore(db),
  };
}
