import type { Task, TaskId } from './task.js';

/** Outcome of a toggle; an unknown id is reported, not thrown */
export type ToggleResult =
  | { readonly type: 'success'; readonly task: Task }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

export type BlobReadResult =
  | { readonly type: 'success'; readonly value: string }
  | { readonly type: 'not-found' }
  | { readonly type: 'error'; readonly message: string };

export type PersistResult =
  | { readonly type: 'success' }
  | { readonly type: 'error'; readonly message: string };

export type DecodeResult =
  | { readonly type: 'success'; readonly tasks: Task[] }
  | { readonly type: 'error'; readonly message: string };

/** How the store's collection was populated at startup */
export type LoadOutcome =
  | { readonly type: 'loaded'; readonly count: number }
  | { readonly type: 'empty' }
  | { readonly type: 'corrupt'; readonly message: string }
  | { readonly type: 'read-error'; readonly message: string };

export function isSuccess<R extends { readonly type: string }>(
  r: R,
): r is Extract<R, { readonly type: 'success' }> {
  return r.type === 'success';
}

