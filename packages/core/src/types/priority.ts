export const Priority = {
  High: 'High',
  Medium: 'Medium',
  Low: 'Low',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Picker order, highest first */
export const PRIORITIES: readonly Priority[] = [Priority.High, Priority.Medium, Priority.Low];

export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITIES as readonly string[]).includes(value);
}
