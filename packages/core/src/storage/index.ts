export type { BlobStore } from './blob-store.js';
export { SqliteBlobStore } from './sqlite-blob-store.js';
export { FileBlobStore } from './file-blob-store.js';
export { MemoryBlobStore } from './memory-blob-store.js';
