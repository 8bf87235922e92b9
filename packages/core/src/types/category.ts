export const Category = {
  Work: 'Work',
  Home: 'Home',
  Learning: 'Learning',
  Entertainment: 'Entertainment',
} as const;

export type Category = (typeof Category)[keyof typeof Category];

export const CATEGORIES: readonly Category[] = [
  Category.Work,
  Category.Home,
  Category.Learning,
  Category.Entertainment,
];

export const DEFAULT_CATEGORY: Category = Category.Work;

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}
