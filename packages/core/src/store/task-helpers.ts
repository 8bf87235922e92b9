import { randomUUID } from 'node:crypto';
import type { NewTask, Task, TaskId } from '../types/task.js';

/** Generate a random UUID task ID */
export function generateId(): TaskId {
  return randomUUID();
}

/** Create a new Task from caller-supplied fields; both flags start cleared */
export function createTask(input: NewTask, id: TaskId): Task {
  return Object.freeze({
    id,
    title: input.title,
    details: input.details,
    // Copied so later changes to the caller's Date objects do not reach the store
    startDate: new Date(input.startDate.getTime()),
    endDate: new Date(input.endDate.getTime()),
    isCompleted: false,
    isFavorite: false,
    priority: input.priority,
    category: input.category,
  });
}

export type TaskFlag = 'isCompleted' | 'isFavorite';

/** Frozen copy with its own Date objects, for handing stored tasks to readers */
export function detachTask(task: Task): Task {
  return Object.freeze({
    ...task,
    startDate: new Date(task.startDate.getTime()),
    endDate: new Date(task.endDate.getTime()),
  });
}

/** Return a copy of the task with one flag flipped */
export function withToggled(task: Task, flag: TaskFlag): Task {
  return Object.freeze(
    flag === 'isCompleted'
      ? { ...task, isCompleted: !task.isCompleted }
      : { ...task, isFavorite: !task.isFavorite },
  );
}

/** Stable sort ascending by startDate; equal start dates keep their relative order */
export function sortByStartDate(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => a.startDate.getTime() - b.startDate.getTime());
}
