import type { Priority } from './priority.js';
import type { Category } from './category.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly details: string;
  readonly startDate: Date;
  /** Not checked against startDate */
  readonly endDate: Date;
  readonly isCompleted: boolean;
  readonly isFavorite: boolean;
  readonly priority: Priority;
  readonly category: Category;
}

/** Caller-supplied fields for a new task; id and flags are assigned by the store */
export interface NewTask {
  readonly title: string;
  readonly details: string;
  readonly startDate: Date;
  readonly endDate: Date;
  readonly priority: Priority;
  readonly category: Category;
}
