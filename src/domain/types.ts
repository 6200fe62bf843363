/**
 * Domain types for the expense tracker.
 * Pure data — no DB, no IO.
 */

/** A single logged expense */
export interface ExpenseRecord {
  id: string;
  date: string;                // YYYY-MM-DD
  category: string;
  amount: number;              // may be negative (refunds)
  note: string;
}

/** Record fields without the in-memory id */
export type ExpenseInput = Omit<ExpenseRecord, 'id'>;

/** Optional year/month predicate for filtered views */
export interface MonthFilter {
  year?: number;
  month?: number;              // 1–12
}

/** YYYY-MM string */
export type Month = string;

export interface DailyTotal {
  date: string;
  total: number;
}

export interface MonthlyTotal {
  month: Month;
  total: number;
}

export interface CategoryBucket {
  category: string;
  total: number;
}

export interface TrendChart {
  status: 'ok';
  daily: DailyTotal[];
  trend: number[];             // one fitted value per daily point
}

export interface MonthlyChart {
  status: 'ok';
  months: MonthlyTotal[];
}

export interface CategoryChart {
  status: 'ok';
  buckets: CategoryBucket[];
}

/** A chart with nothing to draw */
export interface EmptyChart {
  status: 'empty';
}

export interface Charts {
  trend: TrendChart | EmptyChart;
  monthly: MonthlyChart | EmptyChart;
  category: CategoryChart | EmptyChart;
}

/** Categories kept by name in the pie before the rest fold into Other */
export const TOP_CATEGORY_COUNT = 6;

export const OTHER_CATEGORY = 'Other';
