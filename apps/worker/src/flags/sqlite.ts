import { and, eq, flags, openDb, type Db } from '@url-pinger/db';

import { toErrorMessage } from '../middleware/errors';
import { FlagStoreError, type FlagLookup, type FlagStore } from './store';

export class SqliteFlagStore implements FlagStore {
  constructor(
    private readonly db: Db,
    private readonly namespace: string,
  ) {}

  private match(key: string) {
    return and(eq(flags.namespace, this.namespace), eq(flags.key, key));
  }

  async exists(key: string): Promise<FlagLookup> {
    try {
      const row = this.db.select().from(flags).where(this.match(key)).get();
      if (!row) return { kind: 'absent' };
      return { kind: 'exists', flag: { key: row.key, timestamp: row.timestamp, status: row.status } };
    } catch (err) {
      return { kind: 'error', error: new FlagStoreError('exists', key, toErrorMessage(err)).message };
    }
  }

  async create(key: string, timestamp: number): Promise<void> {
    try {
      this.db
        .insert(flags)
        .values({ namespace: this.namespace, key, timestamp, status: 'down' })
        .onConflictDoNothing()
        .run();
    } catch (err) {
      throw new FlagStoreError('create', key, toErrorMessage(err));
    }
  }

  async delete(key: string): Promise<void> {
    try {
      this.db.delete(flags).where(this.match(key)).run();
    } catch (err) {
      throw new FlagStoreError('delete', key, toErrorMessage(err));
    }
  }
}

export function openSqliteFlagStore(
  dbPath: string,
  namespace: string,
): { store: FlagStore; close: () => void } {
  const { db, close } = openDb(dbPath);
  return { store: new SqliteFlagStore(db, namespace), close };
}
