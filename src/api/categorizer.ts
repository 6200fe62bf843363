/**
 * Suggested expense categories.
 * The list only feeds pickers; any free-text label is accepted.
 */
import { OTHER_CATEGORY } from '../domain/types';

export const CATEGORIES = [
  'Rent',
  'Tuition',
  'Utilities',
  'Groceries',
  'Food',
  'Transport',
  'Shopping',
  'Entertainment',
  'Health',
  'Insurance',
  'Internet',
  'Subscriptions',
  'Gifts',
  'Travel',
  OTHER_CATEGORY,
] as const;

export function getAllCategories(): string[] {
  return [...CATEGORIES];
}

/** Trimmed label, falling back to Other when blank */
export function resolveCategory(label: string): string {
  return label.trim() || OTHER_CATEGORY;
}
