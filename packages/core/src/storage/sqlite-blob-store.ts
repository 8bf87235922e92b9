import { eq } from 'drizzle-orm';
import type { TrackerDb } from '../db.js';
import { kvStore } from '../schema/kv-store.js';
import type { BlobReadResult, PersistResult } from '../types/results.js';
import type { BlobStore } from './blob-store.js';
import { describeError } from '../utils/try.js';

/** Blob store backed by the kv_store table */
export class SqliteBlobStore implements BlobStore {
  private db: TrackerDb;

  constructor(db: TrackerDb) {
    this.db = db;
  }

  read(key: string): BlobReadResult {
    try {
      const row = this.db.select({ value: kvStore.value }).from(kvStore).where(eq(kvStore.key, key)).get();
      return row ? { type: 'success', value: row.value } : { type: 'not-found' };
    } catch (err) {
      return { type: 'error', message: describeError(err) };
    }
  }

  write(key: string, value: string): PersistResult {
    const updatedAt = new Date().toISOString();
    try {
      this.db.insert(kvStore)
        .values({ key, value, updatedAt })
        .onConflictDoUpdate({ target: kvStore.key, set: { value, updatedAt } })
        .run();
      return { type: 'success' };
    } catch (err) {
      return { type: 'error', message: describeError(err) };
    }
  }
}
