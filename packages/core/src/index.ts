// Types
export * from './types/index.js';

// Database
export { createDb, createTestDb, getDefaultDataDir, getDefaultDbPath, getDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TrackerDb, DbHandle } from './db.js';
export { kvStore } from './schema/index.js';

// Storage
export * from './storage/index.js';

// Store
export * from './store/index.js';

// Reminders
export * from './reminders/index.js';

// Settings
export {
  getSettings, saveSettings, defaultSettings, resolveDataDir, SETTINGS_FILE,
} from './config/settings.js';
export type { TrackerSettings, StorageBackend } from './config/settings.js';

// Logging
export {
  createLogger, setLogLevel, getLogLevel, getLogHistory, clearLogs, onLog,
} from './logging/logger.js';
export type { Logger, LogEntry, LogLevel } from './logging/logger.js';

// Tracker
export { openTracker } from './tracker.js';
export type { Tracker, OpenTrackerOptions } from './tracker.js';
