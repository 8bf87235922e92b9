/**
 * Snapshot format for the persisted task list: a JSON array of task records.
 * Dates are ISO-8601 strings; priority and category are their identifiers.
 * Decoding is all-or-nothing: one bad record rejects the whole snapshot.
 */

import type { Task } from '../types/task.js';
import type { DecodeResult } from '../types/results.js';
import type { Priority } from '../types/priority.js';
import type { Category } from '../types/category.js';
import { describeError } from '../utils/try.js';
import { isPriority } from '../types/priority.js';
import { isCategory } from '../types/category.js';
import { isRecord } from '../utils/guards.js';

export interface TaskRecord {
  id: string;
  title: string;
  details: string;
  startDate: string;
  endDate: string;
  isCompleted: boolean;
  isFavorite: boolean;
  priority: Priority;
  category: Category;
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    details: task.details,
    startDate: task.startDate.toISOString(),
    endDate: task.endDate.toISOString(),
    isCompleted: task.isCompleted,
    isFavorite: task.isFavorite,
    priority: task.priority,
    category: task.category,
  };
}

/** Throws RangeError if a task carries an invalid Date */
export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord));
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const d = new Date(value);
  return isNaN(d.getTime()) ? null : d;
}

/** Validate one decoded record; returns the task or a reason it was rejected */
export function fromRecord(value: unknown): Task | string {
  if (!isRecord(value)) return 'not an object';

  const { id, title, details, isCompleted, isFavorite, priority, category } = value;
  if (typeof id !== 'string' || id.length === 0) return 'missing id';
  if (typeof title !== 'string') return 'title must be a string';
  if (typeof details !== 'string') return 'details must be a string';
  if (typeof isCompleted !== 'boolean') return 'isCompleted must be a boolean';
  if (typeof isFavorite !== 'boolean') return 'isFavorite must be a boolean';
  if (!isPriority(priority)) return `unknown priority ${JSON.stringify(priority)}`;
  if (!isCategory(category)) return `unknown category ${JSON.stringify(category)}`;

  const startDate = parseDate(value['startDate']);
  if (!startDate) return 'invalid startDate';
  const endDate = parseDate(value['endDate']);
  if (!endDate) return 'invalid endDate';

  return Object.freeze({
    id, title, details, startDate, endDate, isCompleted, isFavorite, priority, category,
  });
}

export function deserializeTasks(json: string): DecodeResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    return { type: 'error', message: `invalid JSON: ${describeError(err)}` };
  }

  if (!Array.isArray(data)) {
    return { type: 'error', message: 'expected an array of tasks' };
  }

  const tasks: Task[] = [];
  const seen = new Set<string>();
  for (const [i, item] of data.entries()) {
    const parsed = fromRecord(item);
    if (typeof parsed === 'string') {
      return { type: 'error', message: `task ${i}: ${parsed}` };
    }
    if (seen.has(parsed.id)) {
      return { type: 'error', message: `task ${i}: duplicate id ${parsed.id}` };
    }
    seen.add(parsed.id);
    tasks.push(parsed);
  }

  return { type: 'success', tasks };
}
