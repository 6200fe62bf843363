/**
 * Pure domain computations.
 * No DB, no IO — only data in, data out.
 */
import {
  OTHER_CATEGORY,
  TOP_CATEGORY_COUNT,
  type CategoryBucket,
  type Charts,
  type DailyTotal,
  type ExpenseRecord,
  type MonthFilter,
  type MonthlyTotal,
} from './types';
import { parseDate } from './validation';

/**
 * Records matching the filter. Each provided component filters on its own;
 * an empty filter keeps everything.
 */
export function forMonth<T extends { date: string }>(records: T[], filter: MonthFilter = {}): T[] {
  const { year, month } = filter;
  if (year === undefined && month === undefined) return [...records];

  return records.filter((r) => {
    const parsed = parseDate(r.date);
    if (!parsed) return false;
    if (year !== undefined && parsed.year !== year) return false;
    if (month !== undefined && parsed.month !== month) return false;
    return true;
  });
}

/** Per-day sums, ascending by date */
export function dailyTotals(records: ExpenseRecord[]): DailyTotal[] {
  const map = new Map<string, number>();
  for (const r of records) {
    map.set(r.date, (map.get(r.date) || 0) + r.amount);
  }
  return Array.from(map.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, total]) => ({ date, total }));
}

/**
 * Least-squares line over (position, total). Positions are ordinals among
 * the distinct days, so calendar gaps carry no weight.
 * Fewer than two points: the raw totals come back unchanged.
 */
export function trendLine(daily: DailyTotal[]): number[] {
  const ys = daily.map((d) => d.total);
  const n = ys.length;
  if (n < 2) return ys;

  const meanX = (n - 1) / 2;
  const meanY = ys.reduce((sum, y) => sum + y, 0) / n;

  let sxy = 0;
  let sxx = 0;
  ys.forEach((y, x) => {
    sxy += (x - meanX) * (y - meanY);
    sxx += (x - meanX) * (x - meanX);
  });

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  return ys.map((_, x) => slope * x + intercept);
}

/** Regroup daily totals by YYYY-MM, ascending */
export function monthlyTotals(daily: DailyTotal[]): MonthlyTotal[] {
  const map = new Map<string, number>();
  for (const d of daily) {
    const key = d.date.slice(0, 7);
    map.set(key, (map.get(key) || 0) + d.total);
  }
  return Array.from(map.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([month, total]) => ({ month, total }));
}

/**
 * Category sums, largest first. Equal sums keep the order in which the
 * categories first appeared. Past the top six, the remainder folds into a
 * trailing Other bucket, or into a recorded Other that made the top six.
 */
export function categoryTotals(records: ExpenseRecord[]): CategoryBucket[] {
  const map = new Map<string, number>();
  for (const r of records) {
    map.set(r.category, (map.get(r.category) || 0) + r.amount);
  }
  const sorted = Array.from(map.entries())
    .map(([category, total]) => ({ category, total }))
    .sort((a, b) => b.total - a.total);

  if (sorted.length <= TOP_CATEGORY_COUNT) return sorted;

  const top = sorted.slice(0, TOP_CATEGORY_COUNT);
  const rest = sorted.slice(TOP_CATEGORY_COUNT).reduce((sum, b) => sum + b.total, 0);

  const existing = top.find((b) => b.category === OTHER_CATEGORY);
  if (existing) {
    existing.total += rest;
    return top.sort((a, b) => b.total - a.total);
  }
  return [...top, { category: OTHER_CATEGORY, total: rest }];
}

/** Everything the three chart tabs draw */
export function buildCharts(records: ExpenseRecord[]): Charts {
  if (records.length === 0) {
    return {
      trend: { status: 'empty' },
      monthly: { status: 'empty' },
      category: { status: 'empty' },
    };
  }

  const daily = dailyTotals(records);
  return {
    trend: { status: 'ok', daily, trend: trendLine(daily) },
    monthly: { status: 'ok', months: monthlyTotals(daily) },
    category: { status: 'ok', buckets: categoryTotals(records) },
  };
}

/** Sum of all amounts */
export function totalSpent(records: ExpenseRecord[]): number {
  return records.reduce((sum, r) => sum + r.amount, 0);
}

/** Get current date as YYYY-MM-DD in local time */
export function today(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
