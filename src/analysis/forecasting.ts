// ── Revenue Forecasting ─────────────────────────────────────────────
// A deliberately simple heuristic: the mean of the most recent months
// grown by a flat rate, with a confidence label taken from how much the
// recent growth rates move around.

import { classifyTrend, overallGrowthRate, type MonthlyTrend } from "./trends.js";

export type ConfidenceLevel = "high" | "medium" | "low";

export interface ForecastResult {
  predictedNextPeriodRevenue: number;
  confidenceLevel: ConfidenceLevel;
  keyDrivers: string[];
}

export interface ForecastOptions {
  /** Number of trailing months averaged for the prediction (default: 3) */
  window?: number;
  /** Growth applied to the trailing mean (default: 0.05) */
  growthAssumption?: number;
  /** Highest growth-rate volatility, in percentage points, still rated "high" (default: 10) */
  highConfidenceVolatility?: number;
  /** Volatility above this is rated "low" (default: 25) */
  lowConfidenceVolatility?: number;
  /** Number of leading categories named as drivers (default: 2) */
  categoryDrivers?: number;
}

/**
 * Predict next month's revenue from chronologically ordered monthly trends.
 *
 * @param topCategories  Category names, highest revenue first
 */
export function forecastRevenue(
  trends: readonly MonthlyTrend[],
  topCategories: readonly string[] = [],
  options: ForecastOptions = {},
): ForecastResult {
  const window = options.window ?? 3;
  const growth = options.growthAssumption ?? 0.05;

  const recent = trends.slice(-window);
  const meanRevenue =
    recent.length > 0
      ? recent.reduce((sum, t) => sum + t.revenue, 0) / recent.length
      : 0;

  return {
    predictedNextPeriodRevenue: round(meanRevenue * (1 + growth)),
    confidenceLevel: rateConfidence(trends, recent, options),
    keyDrivers: [
      ...topCategories
        .slice(0, options.categoryDrivers ?? 2)
        .map((category) => `${slugify(category)}_sales`),
      retentionSignal(trends),
    ],
  };
}

// ── Helpers ─────────────────────────────────────────────────────────

function rateConfidence(
  trends: readonly MonthlyTrend[],
  recent: readonly MonthlyTrend[],
  options: ForecastOptions,
): ConfidenceLevel {
  if (trends.length < 2) return "low";

  const rates = recent
    .map((t) => t.growthRate)
    .filter((rate): rate is number => rate !== null);
  if (rates.length === 0) return "low";

  const volatility = standardDeviation(rates);
  if (volatility > (options.lowConfidenceVolatility ?? 25)) return "low";
  if (
    trends.length >= 3 &&
    rates.length >= 2 &&
    volatility <= (options.highConfidenceVolatility ?? 10)
  ) {
    return "high";
  }
  return "medium";
}

function retentionSignal(trends: readonly MonthlyTrend[]): string {
  return classifyTrend(overallGrowthRate(trends)) === "decreasing"
    ? "customer_retention_risk"
    : "customer_retention";
}

/** Population standard deviation. */
function standardDeviation(values: readonly number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / n;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / n;
  return Math.sqrt(variance);
}

function slugify(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
