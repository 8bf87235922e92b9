import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readdirSync, readFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createTestDb, type DbHandle } from '../../src/db.js';
import { kvStore } from '../../src/schema/kv-store.js';
import { SqliteBlobStore } from '../../src/storage/sqlite-blob-store.js';
import { FileBlobStore } from '../../src/storage/file-blob-store.js';
import { MemoryBlobStore } from '../../src/storage/memory-blob-store.js';

describe('SqliteBlobStore', () => {
  let handle: DbHandle;
  let blobs: SqliteBlobStore;

  beforeEach(() => {
    handle = createTestDb();
    blobs = new SqliteBlobStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it('reports a missing key', () => {
    expect(blobs.read('task-list')).toEqual({ type: 'not-found' });
  });

  it('reads back what it wrote', () => {
    expect(blobs.write('task-list', '[1,2]')).toEqual({ type: 'success' });
    expect(blobs.read('task-list')).toEqual({ type: 'success', value: '[1,2]' });
  });

  it('replaces the value in a single row', () => {
    blobs.write('task-list', 'first');
    blobs.write('task-list', 'second');

    const rows = handle.db.select().from(kvStore).all();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.value).toBe('second');
  });

  it('keeps keys apart', () => {
    blobs.write('a', 'one');
    blobs.write('b', 'two');
    expect(blobs.read('a')).toEqual({ type: 'success', value: 'one' });
    expect(blobs.read('b')).toEqual({ type: 'success', value: 'two' });
  });

  it('reports errors on a closed database', () => {
    handle.close();
    expect(blobs.write('task-list', '[]').type).toBe('error');
    expect(blobs.read('task-list').type).toBe('error');
  });
});

describe('FileBlobStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'taskbell-blob-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reports a missing key', () => {
    const blobs = new FileBlobStore(tmpDir);
    expect(blobs.read('task-list')).toEqual({ type: 'not-found' });
  });

  it('writes one json file per key, creating the directory', () => {
    const dir = join(tmpDir, 'nested', 'data');
    const blobs = new FileBlobStore(dir);

    expect(blobs.write('task-list', '[]')).toEqual({ type: 'success' });

    expect(readdirSync(dir)).toEqual(['task-list.json']);
    expect(readFileSync(join(dir, 'task-list.json'), 'utf8')).toBe('[]');
    expect(blobs.read('task-list')).toEqual({ type: 'success', value: '[]' });
  });

  it('overwrites the previous value', () => {
    const blobs = new FileBlobStore(tmpDir);
    blobs.write('task-list', 'first');
    blobs.write('task-list', 'second');
    expect(blobs.read('task-list')).toEqual({ type: 'success', value: 'second' });
  });

  it('rejects keys that would leave the directory', () => {
    const blobs = new FileBlobStore(tmpDir);
    expect(blobs.write('../escape', 'x')).toEqual({ type: 'error', message: 'Invalid storage key: ../escape' });
    expect(blobs.read('../escape')).toEqual({ type: 'error', message: 'Invalid storage key: ../escape' });
  });

  it('reports an unreadable file as an error', () => {
    mkdirSync(join(tmpDir, 'task-list.json'));
    const blobs = new FileBlobStore(tmpDir);
    expect(blobs.read('task-list').type).toBe('error');
  });
});

describe('MemoryBlobStore', () => {
  it('starts from initial values', () => {
    const blobs = new MemoryBlobStore({ 'task-list': '[]' });
    expect(blobs.read('task-list')).toEqual({ type: 'success', value: '[]' });
    expect(blobs.read('other')).toEqual({ type: 'not-found' });
  });

  it('counts writes', () => {
    const blobs = new MemoryBlobStore();
    blobs.write('k', 'a');
    blobs.write('k', 'b');
    expect(blobs.writeCount).toBe(2);
    expect(blobs.peek('k')).toBe('b');
  });
});
