import type { TaskId } from '../types/task.js';

/** Local-calendar fire time at minute precision. `month` is 1-12. */
export interface CalendarTrigger {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
}

/** A one-shot, non-repeating reminder. Keyed by id: scheduling the same id again replaces it. */
export interface ReminderRequest {
  readonly id: TaskId;
  readonly title: string;
  readonly body: string;
  readonly fireAt: CalendarTrigger;
}

export interface ReminderScheduler {
  /** Resolves once the reminder is accepted; rejects if the scheduler refuses it */
  schedule(request: ReminderRequest): Promise<void>;
}

export type ReminderDelivery = (reminder: ReminderRequest) => void | Promise<void>;
