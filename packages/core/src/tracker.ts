/**
 * Builds a ready-to-use task store from settings: storage medium, reminder
 * scheduler and store, with reminders re-armed for tasks still ahead.
 */

import { createDb } from './db.js';
import type { DbHandle } from './db.js';
import type { TrackerSettings } from './config/settings.js';
import { getSettings } from './config/settings.js';
import type { BlobStore } from './storage/blob-store.js';
import { SqliteBlobStore } from './storage/sqlite-blob-store.js';
import { FileBlobStore } from './storage/file-blob-store.js';
import { MemoryBlobStore } from './storage/memory-blob-store.js';
import { TaskStore } from './store/task-store.js';
import { LocalReminderScheduler } from './reminders/local-scheduler.js';
import type { ReminderDelivery } from './reminders/types.js';
import { reminderFor } from './reminders/trigger.js';
import { createLogger } from './logging/logger.js';
import $try from './utils/try.js';

const log = createLogger('TRACKER');

export interface Tracker {
  readonly store: TaskStore;
  readonly scheduler: LocalReminderScheduler;
  readonly settings: TrackerSettings;
  /** Stop pending reminders and close the database */
  close(): void;
}

export interface OpenTrackerOptions {
  /** Field overrides on top of the loaded settings */
  settings?: Partial<TrackerSettings>;
  deliver?: ReminderDelivery;
}

function openStorage(settings: TrackerSettings): { storage: BlobStore; handle: DbHandle | null } {
  switch (settings.storage) {
    case 'sqlite': {
      const handle = createDb(settings.dbPath);
      return { storage: new SqliteBlobStore(handle.db), handle };
    }
    case 'file':
      return { storage: new FileBlobStore(settings.dataDir), handle: null };
    case 'memory':
      return { storage: new MemoryBlobStore(), handle: null };
  }
}

export function openTracker(opts: OpenTrackerOptions = {}): Tracker {
  const base = getSettings(opts.settings?.dataDir);
  const settings: TrackerSettings = { ...base, ...opts.settings };
  log.debug(`opening (storage: ${settings.storage}, reminders: ${settings.remindersEnabled})`);

  const { storage, handle } = openStorage(settings);
  const scheduler = new LocalReminderScheduler({
    deliver: opts.deliver,
    enabled: settings.remindersEnabled,
  });
  const store = new TaskStore({ storage, scheduler, storageKey: settings.storageKey });

  // Local timers do not survive a restart; past triggers are skipped by the scheduler
  for (const task of store.tasks) {
    void $try(() => scheduler.schedule(reminderFor(task))).then(([err]) => {
      if (err) {
        log.warn(`could not re-arm reminder for ${task.id}: ${err.message}`);
      }
    });
  }

  return {
    store,
    scheduler,
    settings,
    close: () => {
      scheduler.dispose();
      handle?.close();
      log.debug('closed');
    },
  };
}
