export type {
  CalendarTrigger, ReminderRequest, ReminderScheduler, ReminderDelivery,
} from './types.js';
export { triggerFromDate, triggerToDate, formatTrigger, reminderFor } from './trigger.js';
export { LocalReminderScheduler, MAX_TIMER_DELAY_MS } from './local-scheduler.js';
export type { LocalReminderSchedulerOptions } from './local-scheduler.js';
