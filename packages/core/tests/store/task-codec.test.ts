import { describe, it, expect } from 'vitest';
import { deserializeTasks, serializeTasks } from '../../src/store/task-codec.js';
import type { Task } from '../../src/types/task.js';
import { Priority } from '../../src/types/priority.js';
import { Category } from '../../src/types/category.js';

const report: Task = {
  id: 'a',
  title: 'Write report',
  details: 'Q3 numbers',
  startDate: new Date('2026-03-01T09:00:00.000Z'),
  endDate: new Date('2026-03-01T10:30:00.000Z'),
  isCompleted: false,
  isFavorite: true,
  priority: Priority.High,
  category: Category.Work,
};

const groceries: Task = {
  id: 'b',
  title: 'Groceries',
  details: '',
  startDate: new Date('2026-03-02T17:00:00.000Z'),
  endDate: new Date('2026-03-02T16:00:00.000Z'),
  isCompleted: true,
  isFavorite: false,
  priority: Priority.Low,
  category: Category.Home,
};

const course: Task = {
  id: 'c',
  title: 'Ders: İngilizce',
  details: 'Chapter 4, "irregular verbs"',
  startDate: new Date('2026-03-03T08:15:00.000Z'),
  endDate: new Date('2026-03-03T09:15:00.000Z'),
  isCompleted: true,
  isFavorite: true,
  priority: Priority.Medium,
  category: Category.Learning,
};

const movie: Task = {
  id: 'd',
  title: 'Movie night',
  details: 'line one\nline two',
  startDate: new Date('2026-03-03T08:15:00.000Z'),
  endDate: new Date('2026-03-03T11:00:00.000Z'),
  isCompleted: false,
  isFavorite: false,
  priority: Priority.Low,
  category: Category.Entertainment,
};

function decode(json: string): Task[] {
  const result = deserializeTasks(json);
  if (result.type !== 'success') throw new Error(result.message);
  return result.tasks;
}

function decodeError(json: string): string {
  const result = deserializeTasks(json);
  if (result.type !== 'error') throw new Error('expected a decode error');
  return result.message;
}

function recordWith(overrides: Record<string, unknown>): Record<string, unknown> {
  return { ...JSON.parse(serializeTasks([report]))[0], ...overrides };
}

describe('serializeTasks', () => {
  it('writes identifiers and ISO dates', () => {
    expect(serializeTasks([report])).toBe(
      '[{"id":"a","title":"Write report","details":"Q3 numbers",'
      + '"startDate":"2026-03-01T09:00:00.000Z","endDate":"2026-03-01T10:30:00.000Z",'
      + '"isCompleted":false,"isFavorite":true,"priority":"High","category":"Work"}]',
    );
  });

  it('writes an empty collection as an empty array', () => {
    expect(serializeTasks([])).toBe('[]');
  });

  it('throws on an invalid date', () => {
    expect(() => serializeTasks([{ ...report, startDate: new Date('nope') }])).toThrow(RangeError);
  });
});

describe('round trip', () => {
  it('restores an empty collection', () => {
    expect(decode(serializeTasks([]))).toEqual([]);
  });

  it('restores a single task', () => {
    expect(decode(serializeTasks([report]))).toEqual([report]);
  });

  it('restores mixed priorities, categories and flags in order', () => {
    const tasks = [report, groceries, course, movie];
    expect(decode(serializeTasks(tasks))).toEqual(tasks);
  });

  it('returns frozen tasks', () => {
    const [task] = decode(serializeTasks([report]));
    expect(Object.isFrozen(task)).toBe(true);
  });
});

describe('deserializeTasks errors', () => {
  it('rejects invalid JSON', () => {
    expect(decodeError('{not json')).toMatch(/^invalid JSON: /);
  });

  it('rejects a non-array', () => {
    expect(decodeError('{"tasks":[]}')).toBe('expected an array of tasks');
  });

  it('rejects a non-object element', () => {
    expect(decodeError('[null]')).toBe('task 0: not an object');
  });

  it('rejects a missing id', () => {
    expect(decodeError(JSON.stringify([recordWith({ id: '' })]))).toBe('task 0: missing id');
  });

  it('rejects an unknown priority', () => {
    expect(decodeError(JSON.stringify([recordWith({ priority: 'Urgent' })]))).toBe('task 0: unknown priority "Urgent"');
  });

  it('rejects an unknown category', () => {
    expect(decodeError(JSON.stringify([recordWith({ category: 'İş' })]))).toBe('task 0: unknown category "İş"');
  });

  it('rejects a non-boolean flag', () => {
    expect(decodeError(JSON.stringify([recordWith({ isFavorite: 'yes' })]))).toBe('task 0: isFavorite must be a boolean');
  });

  it('rejects a record missing a flag', () => {
    const { isCompleted: _isCompleted, ...rest } = recordWith({});
    expect(decodeError(JSON.stringify([rest]))).toBe('task 0: isCompleted must be a boolean');
  });

  it('rejects an unparseable date', () => {
    const json = JSON.stringify([recordWith({}), recordWith({ id: 'z', startDate: 'tomorrow' })]);
    expect(decodeError(json)).toBe('task 1: invalid startDate');
  });

  it('rejects duplicate ids', () => {
    const json = JSON.stringify([recordWith({}), recordWith({})]);
    expect(decodeError(json)).toBe('task 1: duplicate id a');
  });
});
