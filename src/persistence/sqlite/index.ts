export { openDatabase } from './database';
export { SqliteDistributorStore } from './SqliteDistributorStore';

import type Database from 'better-sqlite3';
import { openDatabase } from './database';
import { SqliteDistributorStore } from './SqliteDistributorStore';

export interface SqliteStores {
  db: Database.Database;
  distributor: SqliteDistributorStore;
}

export function createSqliteStores(dbPath?: string): SqliteStores {
  const db = openDatabase(dbPath);
  return {
    db,
    distributor: new SqliteDistributorStore(db),
  };
}
