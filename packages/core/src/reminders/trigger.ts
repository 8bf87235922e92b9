import type { Task } from '../types/task.js';
import type { CalendarTrigger, ReminderRequest } from './types.js';

/** Truncate a Date to the minute in the local calendar */
export function triggerFromDate(date: Date): CalendarTrigger {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
  };
}

export function triggerToDate(trigger: CalendarTrigger): Date {
  return new Date(trigger.year, trigger.month - 1, trigger.day, trigger.hour, trigger.minute, 0, 0);
}

/** yyyy-MM-dd HH:mm */
export function formatTrigger(trigger: CalendarTrigger): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${trigger.year}-${pad(trigger.month)}-${pad(trigger.day)} ${pad(trigger.hour)}:${pad(trigger.minute)}`;
}

/** The reminder request for a task: its title, its details as the body, fired at its start minute */
export function reminderFor(task: Task): ReminderRequest {
  return {
    id: task.id,
    title: task.title,
    body: task.details,
    fireAt: triggerFromDate(task.startDate),
  };
}
