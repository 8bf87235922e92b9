import type { BlobReadResult, PersistResult } from '../types/results.js';
import type { BlobStore } from './blob-store.js';

/** In-process blob store. Counts writes so callers can check persistence traffic. */
export class MemoryBlobStore implements BlobStore {
  private values = new Map<string, string>();
  writeCount = 0;

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
    }
  }

  read(key: string): BlobReadResult {
    const value = this.values.get(key);
    return value === undefined ? { type: 'not-found' } : { type: 'success', value };
  }

  write(key: string, value: string): PersistResult {
    this.writeCount++;
    this.values.set(key, value);
    return { type: 'success' };
  }

  /** Raw stored value, bypassing result wrapping */
  peek(key: string): string | undefined {
    return this.values.get(key);
  }
}
