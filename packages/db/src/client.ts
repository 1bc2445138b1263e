import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
export { eq, and } from 'drizzle-orm';

import * as schema from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

export type DbHandle = {
  db: Db;
  close: () => void;
};

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS flags (
    namespace TEXT NOT NULL,
    key TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    status TEXT NOT NULL,
    PRIMARY KEY (namespace, key)
  )
`;

export function openDb(filename: string): DbHandle {
  const inMemory = filename === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const sqlite = new Database(filename);
  if (!inMemory) sqlite.pragma('journal_mode = WAL');
  sqlite.exec(SCHEMA_SQL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
