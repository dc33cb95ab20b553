// ── Trend Analysis ──────────────────────────────────────────────────
// Buckets transactions by calendar month and computes month-over-month
// growth, the overall direction, and a short seasonal label.

import { groupRecords, summarize } from "./aggregation.js";
import type { TransactionRecord } from "./records.js";

export interface MonthlyTrend {
  month: string; // "YYYY-MM"
  revenue: number;
  transactionCount: number;
  /** Percent change vs. the prior month; null for the first month or a zero prior month */
  growthRate: number | null;
}

export type TrendDirection =
  | "increasing"
  | "decreasing"
  | "stable"
  | "insufficient_data";

/** Growth within ±STABLE_BAND percent counts as stable. */
export const STABLE_BAND = 2;
/** Growth beyond ±STRONG_MOVE percent is labelled strong rather than slight. */
const STRONG_MOVE = 10;

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
] as const;

/**
 * One trend point per calendar month present in the records, oldest first.
 */
export function monthlyTrends(
  records: readonly TransactionRecord[],
): MonthlyTrend[] {
  const months = groupRecords(records, (r) => r.purchaseDate.slice(0, 7));
  const keys = [...months.keys()].sort();

  const trends: MonthlyTrend[] = [];
  let previous: number | null = null;

  for (const month of keys) {
    const summary = summarize(months.get(month) ?? []);
    trends.push({
      month,
      revenue: summary.totalRevenue,
      transactionCount: summary.transactionCount,
      growthRate: previous === null ? null : growthRate(summary.totalRevenue, previous),
    });
    previous = summary.totalRevenue;
  }

  return trends;
}

/**
 * Percent change from `previous` to `current`, rounded to 1 decimal.
 * Returns null when `previous` is 0.
 */
export function growthRate(current: number, previous: number): number | null {
  if (previous === 0) return null;
  return round1(((current - previous) / previous) * 100);
}

/** Growth between the two most recent months. */
export function overallGrowthRate(trends: readonly MonthlyTrend[]): number | null {
  const last = trends[trends.length - 1];
  const prior = trends[trends.length - 2];
  if (!last || !prior) return null;
  return growthRate(last.revenue, prior.revenue);
}

export function classifyTrend(rate: number | null): TrendDirection {
  if (rate === null) return "insufficient_data";
  if (Math.abs(rate) <= STABLE_BAND) return "stable";
  return rate > 0 ? "increasing" : "decreasing";
}

/** Month with the highest revenue; the earliest wins a tie. */
export function bestPerformingMonth(trends: readonly MonthlyTrend[]): string | null {
  let best: MonthlyTrend | null = null;
  for (const trend of trends) {
    if (best === null || trend.revenue > best.revenue) best = trend;
  }
  return best?.month ?? null;
}

/**
 * Describe the latest month-over-month movement, e.g. "slight_decline_in_march".
 */
export function seasonalPattern(trends: readonly MonthlyTrend[]): string {
  const last = trends[trends.length - 1];
  const rate = overallGrowthRate(trends);
  if (!last || rate === null) return "insufficient_data";

  const monthName = MONTH_NAMES[Number(last.month.slice(5, 7)) - 1] ?? last.month;
  const magnitude = Math.abs(rate);

  if (magnitude <= STABLE_BAND) return `stable_in_${monthName}`;
  const strength = magnitude > STRONG_MOVE ? "strong" : "slight";
  const movement = rate > 0 ? "increase" : "decline";
  return `${strength}_${movement}_in_${monthName}`;
}

/**
 * Keep the records from the `days` calendar days ending at the most
 * recent purchase date (inclusive). The window is anchored to the data,
 * not to today's date.
 */
export function filterRecentDays(
  records: readonly TransactionRecord[],
  days: number,
): { records: TransactionRecord[]; start: string; end: string } | null {
  let end: string | null = null;
  for (const record of records) {
    if (end === null || record.purchaseDate > end) end = record.purchaseDate;
  }
  if (end === null) return null;

  const start = addDays(end, -(days - 1));
  return {
    records: records.filter((r) => r.purchaseDate >= start),
    start,
    end,
  };
}

// ── Helpers ─────────────────────────────────────────────────────────

function addDays(dateStr: string, days: number): string {
  const d = new Date(`${dateStr}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}
