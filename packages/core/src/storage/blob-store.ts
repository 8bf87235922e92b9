import type { BlobReadResult, PersistResult } from '../types/results.js';

/**
 * Key-value blob persistence. Writes replace the whole value.
 * Implementations report failures as results and never throw.
 */
export interface BlobStore {
  read(key: string): BlobReadResult;
  write(key: string, value: string): PersistResult;
}
