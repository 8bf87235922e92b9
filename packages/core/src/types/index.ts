export { Priority, PRIORITIES, DEFAULT_PRIORITY, isPriority } from './priority.js';
export { Category, CATEGORIES, DEFAULT_CATEGORY, isCategory } from './category.js';
export {
  PriorityLabel, CategoryLabel, LOCALES, isLocale, priorityLabel, categoryLabel,
} from './labels.js';
export type { Locale } from './labels.js';
export type { TaskId, Task, NewTask } from './task.js';
export type {
  ToggleResult, BlobReadResult, PersistResult, DecodeResult, LoadOutcome,
} from './results.js';
export { isSuccess } from './results.js';
