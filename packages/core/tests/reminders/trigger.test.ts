import { describe, it, expect } from 'vitest';
import { formatTrigger, reminderFor, triggerFromDate, triggerToDate } from '../../src/reminders/trigger.js';
import { Priority } from '../../src/types/priority.js';
import { Category } from '../../src/types/category.js';

describe('triggerFromDate', () => {
  it('keeps year through minute in the local calendar and drops the rest', () => {
    expect(triggerFromDate(new Date(2026, 11, 31, 23, 59, 59, 999))).toEqual({
      year: 2026, month: 12, day: 31, hour: 23, minute: 59,
    });
  });

  it('uses 1-based months', () => {
    expect(triggerFromDate(new Date(2026, 0, 1, 0, 0)).month).toBe(1);
  });
});

describe('triggerToDate', () => {
  it('returns the start of the trigger minute', () => {
    const date = new Date(2026, 4, 20, 14, 45, 30, 250);
    expect(triggerToDate(triggerFromDate(date))).toEqual(new Date(2026, 4, 20, 14, 45, 0, 0));
  });
});

describe('formatTrigger', () => {
  it('pads every field', () => {
    expect(formatTrigger({ year: 2026, month: 3, day: 4, hour: 7, minute: 5 })).toBe('2026-03-04 07:05');
  });
});

describe('reminderFor', () => {
  it('uses the task id, title, details and start minute', () => {
    const reminder = reminderFor({
      id: 'task-1',
      title: 'Dentist',
      details: 'Bring the card',
      startDate: new Date(2026, 5, 1, 8, 30, 12),
      endDate: new Date(2026, 5, 1, 9, 0),
      isCompleted: true,
      isFavorite: false,
      priority: Priority.High,
      category: Category.Home,
    });

    expect(reminder).toEqual({
      id: 'task-1',
      title: 'Dentist',
      body: 'Bring the card',
      fireAt: { year: 2026, month: 6, day: 1, hour: 8, minute: 30 },
    });
  });
});
