import type { TaskId } from '../types/task.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import $try from '../utils/try.js';
import type { ReminderDelivery, ReminderRequest, ReminderScheduler } from './types.js';
import { formatTrigger, triggerToDate } from './trigger.js';

/** setTimeout clamps longer delays to 1ms; longer waits are re-armed in steps */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

interface PendingReminder {
  request: ReminderRequest;
  fireAt: number;
  timer: ReturnType<typeof setTimeout>;
}

export interface LocalReminderSchedulerOptions {
  /** Receives each reminder when it comes due. Defaults to writing it to the log. */
  deliver?: ReminderDelivery;
  /** When false, requests are accepted and dropped */
  enabled?: boolean;
  now?: () => number;
  logger?: Logger;
}

/** In-process reminder scheduler: one timer per reminder id */
export class LocalReminderScheduler implements ReminderScheduler {
  private pendingById = new Map<TaskId, PendingReminder>();
  private deliver: ReminderDelivery;
  private enabled: boolean;
  private now: () => number;
  private log: Logger;

  constructor(opts: LocalReminderSchedulerOptions = {}) {
    this.log = opts.logger ?? createLogger('REMINDERS');
    this.deliver = opts.deliver ?? ((reminder) => {
      this.log.info(`reminder: ${reminder.title}${reminder.body ? ` (${reminder.body})` : ''}`);
    });
    this.enabled = opts.enabled ?? true;
    this.now = opts.now ?? (() => Date.now());
  }

  async schedule(request: ReminderRequest): Promise<void> {
    if (!this.enabled) {
      this.log.debug(`reminders disabled, dropping ${request.id}`);
      return;
    }

    const fireAt = triggerToDate(request.fireAt).getTime();
    if (isNaN(fireAt)) {
      throw new Error(`Invalid trigger for reminder ${request.id}`);
    }

    // Replace, never duplicate
    this.cancel(request.id);

    if (fireAt <= this.now()) {
      this.log.debug(`trigger ${formatTrigger(request.fireAt)} already passed, ${request.id} not armed`);
      return;
    }

    this.arm(request, fireAt);
    this.log.debug(`scheduled ${request.id} for ${formatTrigger(request.fireAt)}`);
  }

  /** Cancel a pending reminder. Returns false if none was pending. */
  cancel(id: TaskId): boolean {
    const entry = this.pendingById.get(id);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.pendingById.delete(id);
    return true;
  }

  /** Pending reminders, soonest first */
  pending(): ReminderRequest[] {
    return [...this.pendingById.values()]
      .sort((a, b) => a.fireAt - b.fireAt)
      .map((entry) => entry.request);
  }

  /** Clear every timer */
  dispose(): void {
    for (const entry of this.pendingById.values()) {
      clearTimeout(entry.timer);
    }
    this.pendingById.clear();
  }

  private arm(request: ReminderRequest, fireAt: number): void {
    const delay = Math.min(Math.max(fireAt - this.now(), 0), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      if (fireAt > this.now()) {
        this.arm(request, fireAt);
        return;
      }
      this.pendingById.delete(request.id);
      void this.fire(request);
    }, delay);
    this.pendingById.set(request.id, { request, fireAt, timer });
  }

  private async fire(request: ReminderRequest): Promise<void> {
    this.log.debug(`firing ${request.id}`);
    const [err] = await $try(() => this.deliver(request));
    if (err) {
      this.log.error(`delivery failed for ${request.id}:`, err.message);
    }
  }
}
