/**
 * Display labels for priorities and categories.
 * Only the identifiers are persisted; labels are resolved where tasks are shown.
 */

import { Priority } from './priority.js';
import { Category } from './category.js';

export type Locale = 'en' | 'tr';

export const LOCALES: readonly Locale[] = ['en', 'tr'];

export const PriorityLabel: Record<Locale, Record<Priority, string>> = {
  en: {
    [Priority.High]: 'High',
    [Priority.Medium]: 'Medium',
    [Priority.Low]: 'Low',
  },
  tr: {
    [Priority.High]: 'Yüksek',
    [Priority.Medium]: 'Orta',
    [Priority.Low]: 'Düşük',
  },
};

export const CategoryLabel: Record<Locale, Record<Category, string>> = {
  en: {
    [Category.Work]: 'Work',
    [Category.Home]: 'Home',
    [Category.Learning]: 'Learning',
    [Category.Entertainment]: 'Entertainment',
  },
  tr: {
    [Category.Work]: 'İş',
    [Category.Home]: 'Ev',
    [Category.Learning]: 'Öğrenme',
    [Category.Entertainment]: 'Eğlence',
  },
};

export function isLocale(value: unknown): value is Locale {
  return typeof value === 'string' && (LOCALES as readonly string[]).includes(value);
}

export function priorityLabel(priority: Priority, locale: Locale = 'en'): string {
  return PriorityLabel[locale][priority];
}

export function categoryLabel(category: Category, locale: Locale = 'en'): string {
  return CategoryLabel[locale][category];
}
