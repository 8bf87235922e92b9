export { kvStore } from './kv-store.js';
