/**
 * The authoritative task collection.
 *
 * Every mutation builds a new frozen array and swaps it in, so a snapshot handed
 * out by `tasks` never changes underneath its reader. Every read hands out
 * copies carrying their own Date objects; the stored tasks never leave the store. Each mutation writes the
 * whole collection through the BlobStore before returning; `create` then asks the
 * ReminderScheduler for one reminder without waiting on it.
 *
 * No public operation throws on I/O: persistence failures are logged and kept in
 * `getPersistenceStatus()`, scheduling failures are logged. `create` throws only
 * for caller bugs (an invalid Date, or an injected id generator repeating itself).
 */

import type { NewTask, Task, TaskId } from '../types/task.js';
import type { LoadOutcome, PersistResult, ToggleResult } from '../types/results.js';
import { isSuccess } from '../types/results.js';
import type { BlobStore } from '../storage/blob-store.js';
import type { ReminderScheduler } from '../reminders/types.js';
import { reminderFor } from '../reminders/trigger.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import $try, { describeError } from '../utils/try.js';
import { createTask, detachTask, generateId, sortByStartDate, withToggled } from './task-helpers.js';
import type { TaskFlag } from './task-helpers.js';
import { deserializeTasks, serializeTasks } from './task-codec.js';

export const DEFAULT_STORAGE_KEY = 'task-list';

export type TaskListener = (tasks: readonly Task[]) => void;

export interface TaskStoreOptions {
  storage: BlobStore;
  scheduler: ReminderScheduler;
  storageKey?: string;
  generateId?: () => TaskId;
  logger?: Logger;
}

export interface PersistenceStatus {
  load: LoadOutcome;
  /** null until the first mutation */
  lastSave: PersistResult | null;
}

export class TaskStore {
  private items: readonly Task[] = Object.freeze([]);
  private listeners = new Set<TaskListener>();
  private storage: BlobStore;
  private scheduler: ReminderScheduler;
  private storageKey: string;
  private nextId: () => TaskId;
  private log: Logger;
  private loadOutcome: LoadOutcome;
  private lastSave: PersistResult | null = null;

  constructor(opts: TaskStoreOptions) {
    this.storage = opts.storage;
    this.scheduler = opts.scheduler;
    this.storageKey = opts.storageKey ?? DEFAULT_STORAGE_KEY;
    this.nextId = opts.generateId ?? generateId;
    this.log = opts.logger ?? createLogger('TASK-STORE');
    this.loadOutcome = this.load();
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** Current collection, ascending by startDate */
  get tasks(): readonly Task[] {
    return Object.freeze(this.items.map(detachTask));
  }

  get size(): number {
    return this.items.length;
  }

  getTask(id: TaskId): Task | null {
    const task = this.findStored(id);
    return task ? detachTask(task) : null;
  }

  getPersistenceStatus(): PersistenceStatus {
    return { load: this.loadOutcome, lastSave: this.lastSave };
  }

  /** Called with the new snapshot after every mutation. Returns an unsubscribe function. */
  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * @throws RangeError when startDate or endDate is an Invalid Date
   * @throws Error when an injected id generator returns an id already in use
   */
  create(input: NewTask): Task {
    assertValidDate('startDate', input.startDate);
    assertValidDate('endDate', input.endDate);

    const id = this.nextId();
    if (this.findStored(id)) {
      throw new Error(`Task id already in use: ${id}`);
    }

    const task = createTask(input, id);
    this.commit(sortByStartDate([...this.items, task]));
    this.log.debug(`created ${task.id}`);
    this.scheduleReminder(task);
    return detachTask(task);
  }

  toggleCompletion(id: TaskId): ToggleResult {
    return this.toggle(id, 'isCompleted');
  }

  toggleFavorite(id: TaskId): ToggleResult {
    return this.toggle(id, 'isFavorite');
  }

  private toggle(id: TaskId, flag: TaskFlag): ToggleResult {
    const current = this.findStored(id);
    if (!current) {
      this.log.debug(`toggle ${flag}: ${id} not found`);
      return { type: 'not-found', taskId: id };
    }

    const updated = withToggled(current, flag);
    this.commit(this.items.map((t) => (t === current ? updated : t)));
    return { type: 'success', task: detachTask(updated) };
  }

  private commit(next: Task[]): void {
    this.items = Object.freeze(next);
    this.save();
    this.notify();
  }

  private findStored(id: TaskId): Task | undefined {
    return this.items.find((t) => t.id === id);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  private load(): LoadOutcome {
    let outcome: LoadOutcome;
    try {
      outcome = this.readSnapshot();
    } catch (err) {
      outcome = { type: 'read-error', message: describeError(err) };
    }

    switch (outcome.type) {
      case 'loaded':
        this.log.debug(`loaded ${outcome.count} tasks`);
        break;
      case 'empty':
        this.log.debug('no saved tasks, starting empty');
        break;
      case 'corrupt':
        this.log.warn(`saved tasks unreadable, starting empty: ${outcome.message}`);
        break;
      case 'read-error':
        this.log.warn(`could not read saved tasks, starting empty: ${outcome.message}`);
        break;
    }
    return outcome;
  }

  private readSnapshot(): LoadOutcome {
    const read = this.storage.read(this.storageKey);
    if (read.type === 'not-found') return { type: 'empty' };
    if (read.type === 'error') return { type: 'read-error', message: read.message };

    const decoded = deserializeTasks(read.value);
    if (decoded.type === 'error') return { type: 'corrupt', message: decoded.message };

    // A hand-edited snapshot may be out of order
    this.items = Object.freeze(sortByStartDate(decoded.tasks));
    return { type: 'loaded', count: decoded.tasks.length };
  }

  private save(): PersistResult {
    let result: PersistResult;
    try {
      result = this.storage.write(this.storageKey, serializeTasks(this.items));
    } catch (err) {
      result = { type: 'error', message: describeError(err) };
    }

    this.lastSave = result;
    if (!isSuccess(result)) {
      this.log.warn(`save failed: ${result.message}`);
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Side channels
  // ---------------------------------------------------------------------------

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.tasks);
      } catch (err) {
        this.log.error('listener error:', describeError(err));
      }
    }
  }

  private scheduleReminder(task: Task): void {
    void $try(() => this.scheduler.schedule(reminderFor(task))).then(([err]) => {
      if (err) {
        this.log.warn(`reminder for ${task.id} not scheduled: ${err.message}`);
      }
    });
  }
}

function assertValidDate(field: 'startDate' | 'endDate', value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new RangeError(`${field} is an invalid date`);
  }
}
