/**
 * Field validation shared by the entry form, file load and CSV import.
 *
 * `validateExpense` checks only the date and amount; category and note pass
 * through as given. `tidyExpense` is the form and import clean-up on top.
 */
import type { ExpenseInput } from './types';
import { resolveCategory } from '../api/categorizer';

export type RejectReason = 'missing-date' | 'invalid-date' | 'missing-amount' | 'invalid-amount';

export type ValidationResult =
  | { ok: true; value: ExpenseInput }
  | { ok: false; reason: RejectReason };

/** Raw field values as they arrive from a form or a CSV row */
export interface RawExpenseFields {
  date?: string | null;
  category?: string | null;
  amount?: string | number | null;
  note?: string | null;
}

export interface ParsedDate {
  year: number;
  month: number;
  day: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parse a strict YYYY-MM-DD string; null unless it names a real calendar day */
export function parseDate(value: string): ParsedDate | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return { year, month, day };
}

/** Parse an amount field; blank, NaN and infinities are rejected */
export function parseAmount(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : null;
}

export function validateExpense(fields: RawExpenseFields): ValidationResult {
  const date = fields.date?.trim() ?? '';
  if (!date) return { ok: false, reason: 'missing-date' };
  if (!parseDate(date)) return { ok: false, reason: 'invalid-date' };

  const rawAmount = fields.amount ?? '';
  if (typeof rawAmount === 'string' && rawAmount.trim() === '') {
    return { ok: false, reason: 'missing-amount' };
  }
  const amount = parseAmount(rawAmount);
  if (amount === null) return { ok: false, reason: 'invalid-amount' };

  return {
    ok: true,
    value: {
      date,
      category: fields.category ?? '',
      amount,
      note: fields.note ?? '',
    },
  };
}

/** Blank category becomes Other; category and note are trimmed */
export function tidyExpense(input: ExpenseInput): ExpenseInput {
  return { ...input, category: resolveCategory(input.category), note: input.note.trim() };
}

/** User-facing text for a rejection */
export function describeRejection(reason: RejectReason): string {
  switch (reason) {
    case 'missing-date':
    case 'invalid-date':
      return 'Date must be YYYY-MM-DD';
    case 'missing-amount':
    case 'invalid-amount':
      return 'Enter a valid amount';
  }
}

/** 1234.5 -> "1,234.50" */
export function formatCurrency(value: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}
