export { TaskStore, DEFAULT_STORAGE_KEY } from './task-store.js';
export type { TaskStoreOptions, TaskListener, PersistenceStatus } from './task-store.js';
export { serializeTasks, deserializeTasks, toRecord, fromRecord } from './task-codec.js';
export type { TaskRecord } from './task-codec.js';
export { generateId, createTask, withToggled, sortByStartDate } from './task-helpers.js';
export type { TaskFlag } from './task-helpers.js';
