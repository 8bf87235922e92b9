import fs from 'node:fs';
import path from 'node:path';
import type { BlobReadResult, PersistResult } from '../types/results.js';
import type { BlobStore } from './blob-store.js';
import { describeError } from '../utils/try.js';

const KEY_RE = /^[A-Za-z0-9._-]+$/;

/**
 * Blob store keeping one `<key>.json` file per key in a directory.
 * Writes go to a temp file first and are renamed over the target.
 */
export class FileBlobStore implements BlobStore {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  filePath(key: string): string {
    if (!KEY_RE.test(key)) throw new Error(`Invalid storage key: ${key}`);
    return path.join(this.dir, `${key}.json`);
  }

  read(key: string): BlobReadResult {
    try {
      const filePath = this.filePath(key);
      if (!fs.existsSync(filePath)) return { type: 'not-found' };
      return { type: 'success', value: fs.readFileSync(filePath, 'utf8') };
    } catch (err) {
      return { type: 'error', message: describeError(err) };
    }
  }

  write(key: string, value: string): PersistResult {
    try {
      const filePath = this.filePath(key);
      fs.mkdirSync(this.dir, { recursive: true });
      const tmpPath = `${filePath}.${process.pid}.tmp`;
      fs.writeFileSync(tmpPath, value, 'utf8');
      fs.renameSync(tmpPath, filePath);
      return { type: 'success' };
    } catch (err) {
      return { type: 'error', message: describeError(err) };
    }
  }
}
