import fs from 'node:fs';
import path from 'node:path';
import { DB_FILE_NAME, getDefaultDataDir } from '../db.js';
import { DEFAULT_STORAGE_KEY } from '../store/task-store.js';
import type { Locale } from '../types/labels.js';
import { isLocale } from '../types/labels.js';
import type { PersistResult } from '../types/results.js';
import { createLogger } from '../logging/logger.js';
import { isRecord } from '../utils/guards.js';
import { describeError } from '../utils/try.js';

const log = createLogger('SETTINGS');

export type StorageBackend = 'sqlite' | 'file' | 'memory';

export interface TrackerSettings {
  storage: StorageBackend;
  /** Holds settings.json, the database and file-backed blobs */
  dataDir: string;
  dbPath: string;
  storageKey: string;
  remindersEnabled: boolean;
  locale: Locale;
}

export const SETTINGS_FILE = 'settings.json';

function isStorageBackend(value: unknown): value is StorageBackend {
  return value === 'sqlite' || value === 'file' || value === 'memory';
}

/** TASKBELL_DATA_DIR, else the platform default */
export function resolveDataDir(): string {
  return process.env['TASKBELL_DATA_DIR'] || getDefaultDataDir();
}

export function defaultSettings(dataDir: string = resolveDataDir()): TrackerSettings {
  return {
    storage: 'sqlite',
    dataDir,
    dbPath: path.join(dataDir, DB_FILE_NAME),
    storageKey: DEFAULT_STORAGE_KEY,
    remindersEnabled: true,
    locale: 'en',
  };
}

function readSettingsFile(filePath: string): Record<string, unknown> | null {
  try {
    if (!fs.existsSync(filePath)) return null;
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (isRecord(data)) return data;
    log.warn(`${filePath} is not an object, using defaults`);
  } catch (err) {
    log.warn(`could not read ${filePath}, using defaults:`, err);
  }
  return null;
}

/**
 * Load settings from `<dataDir>/settings.json`. Fields with the wrong type fall
 * back to their defaults one by one. TASKBELL_DB_PATH and TASKBELL_STORAGE
 * override the file.
 */
export function getSettings(dataDir: string = resolveDataDir()): TrackerSettings {
  const defaults = defaultSettings(dataDir);
  const data: Record<string, unknown> = readSettingsFile(path.join(dataDir, SETTINGS_FILE)) ?? {};

  const { storage, dbPath, storageKey, remindersEnabled, locale } = data;

  const settings: TrackerSettings = {
    storage: isStorageBackend(storage) ? storage : defaults.storage,
    dataDir,
    dbPath: typeof dbPath === 'string' && dbPath ? dbPath : defaults.dbPath,
    storageKey: typeof storageKey === 'string' && storageKey ? storageKey : defaults.storageKey,
    remindersEnabled: typeof remindersEnabled === 'boolean' ? remindersEnabled : defaults.remindersEnabled,
    locale: isLocale(locale) ? locale : defaults.locale,
  };

  const envDbPath = process.env['TASKBELL_DB_PATH'];
  if (envDbPath) settings.dbPath = envDbPath;
  const envStorage = process.env['TASKBELL_STORAGE'];
  if (isStorageBackend(envStorage)) settings.storage = envStorage;

  return settings;
}

/** Write settings to `<dataDir>/settings.json`; dataDir itself is not stored */
export function saveSettings(settings: TrackerSettings): PersistResult {
  try {
    fs.mkdirSync(settings.dataDir, { recursive: true });
    const { dataDir: _dataDir, ...stored } = settings;
    fs.writeFileSync(
      path.join(settings.dataDir, SETTINGS_FILE),
      JSON.stringify(stored, null, 2),
    );
    return { type: 'success' };
  } catch (err) {
    const message = describeError(err);
    log.warn('could not save settings:', message);
    return { type: 'error', message };
  }
}
