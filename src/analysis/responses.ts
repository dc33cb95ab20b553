// ── Response Assembly ───────────────────────────────────────────────
// Rounds and renames engine output into the payload shapes served to
// API and MCP clients. Every number reaching a client passes through
// here; nothing in this module computes a metric of its own.

import {
  aggregateAgeGroups,
  aggregateCategories,
  aggregateProducts,
  summarize,
  type AgeGroupMetric,
  type CategoryMetric,
  type ProductMetric,
} from "./aggregation.js";
import {
  InvalidParameterError,
  NO_DATA_DETAIL,
  fail,
  succeed,
  type Outcome,
} from "./errors.js";
import { forecastRevenue, type ConfidenceLevel } from "./forecasting.js";
import { rankByRevenue } from "./ranking.js";
import type { TransactionSet } from "./records.js";
import { segmentCustomers, type CustomerSegment } from "./segments.js";
import {
  bestPerformingMonth,
  classifyTrend,
  filterRecentDays,
  monthlyTrends,
  overallGrowthRate,
  seasonalPattern,
  type MonthlyTrend,
  type TrendDirection,
} from "./trends.js";

// ── Payload shapes ──────────────────────────────────────────────────

export interface ProductPayload {
  product_name: string;
  price: number;
  total_count: number;
  average_rating: number | null;
  total_revenue: number;
  category: string;
}

export interface CategoryPayload {
  category: string;
  total_revenue: number;
  avg_revenue_per_transaction: number;
  transaction_count: number;
  avg_rating: number | null;
  total_units_sold: number;
  revenue_percentage: number;
}

export interface AgeGroupPayload {
  age_range: string;
  customer_count: number;
  avg_spending: number;
  total_revenue: number;
  avg_rating: number | null;
  transaction_count: number;
  revenue_percentage: number;
}

export interface MonthlyTrendPayload {
  month: string;
  revenue: number;
  transaction_count: number;
  growth_rate: number | null;
}

export interface TopProductPayload {
  product_name: string;
  total_revenue: number;
  revenue_contribution: number;
  rank: number;
}

export interface CategoryShare {
  category: string;
  revenue: number;
  percentage: number;
}

export interface SegmentPayload {
  segment: string;
  customer_count: number;
  avg_order_value: number;
  total_revenue: number;
  criteria: string;
}

export interface ProductsResponse {
  products: ProductPayload[];
  total_products: number;
  summary: { total_revenue: number; total_units_sold: number };
}

export interface DashboardResponse {
  period: { start_date: string; end_date: string; days: number };
  summary: {
    total_revenue: number;
    total_transactions: number;
    total_units_sold: number;
    avg_order_value: number;
    avg_rating: number | null;
    unique_products: number;
  };
  monthly_trends: MonthlyTrendPayload[];
  growth_metrics: { overall_growth_rate: number | null; revenue_trend: TrendDirection };
  top_products: TopProductPayload[];
  category_breakdown: CategoryShare[];
}

export interface CategoriesResponse {
  categories: CategoryPayload[];
  total_categories: number;
}

export interface DemographicsResponse {
  age_groups: AgeGroupPayload[];
  total_customers: number;
}

export interface RevenueInsightsResponse {
  monthly_trends: MonthlyTrendPayload[];
  top_products: TopProductPayload[];
  category_distribution: CategoryShare[];
  customer_segments: SegmentPayload[];
  growth_metrics: {
    overall_growth_rate: number | null;
    revenue_trend: TrendDirection;
    best_performing_month: string | null;
    seasonal_pattern: string;
  };
  forecasting: {
    predicted_next_month_revenue: number;
    confidence_level: ConfidenceLevel;
    key_drivers: string[];
  };
}

export interface ErrorEnvelope {
  detail: string;
  status_code: number;
  timestamp: string;
}

// ── Parameters ──────────────────────────────────────────────────────

export const DASHBOARD_DAYS = { min: 1, max: 180, default: 30 } as const;

export interface DashboardOptions {
  /** Trailing window in days, 1-180 (default: 30) */
  days?: number;
  /** Number of top products listed (default: 5) */
  topProducts?: number;
}

export interface RevenueInsightsOptions {
  /** Number of top products listed (default: 2) */
  topProducts?: number;
}

// ── Composition ─────────────────────────────────────────────────────

export function buildProductsResponse(set: TransactionSet): ProductsResponse {
  const products = aggregateProducts(set.records);
  const summary = summarize(set.records);

  return {
    products: products.map(formatProduct),
    total_products: products.length,
    summary: {
      total_revenue: money(summary.totalRevenue),
      total_units_sold: summary.totalUnits,
    },
  };
}

/** Categories in revenue order. An empty set yields an empty list. */
export function buildCategoriesResponse(set: TransactionSet): CategoriesResponse {
  const ranked = rankByRevenue(
    aggregateCategories(set.records).map((metric) => ({
      name: metric.category,
      totalRevenue: metric.totalRevenue,
      metric,
    })),
  );

  return {
    categories: ranked.map((r) => formatCategory(r.entity.metric)),
    total_categories: ranked.length,
  };
}

export function buildDemographicsResponse(set: TransactionSet): DemographicsResponse {
  const groups = aggregateAgeGroups(set.records);

  return {
    age_groups: groups.map(formatAgeGroup),
    total_customers: groups.reduce((sum, g) => sum + g.customerCount, 0),
  };
}

export function buildDashboardResponse(
  set: TransactionSet,
  options: DashboardOptions = {},
): Outcome<DashboardResponse> {
  const days = options.days ?? DASHBOARD_DAYS.default;
  if (!Number.isInteger(days) || days < DASHBOARD_DAYS.min || days > DASHBOARD_DAYS.max) {
    return fail(
      "invalid_parameter",
      `days must be an integer between ${DASHBOARD_DAYS.min} and ${DASHBOARD_DAYS.max}, received ${days}`,
    );
  }

  const window = filterRecentDays(set.records, days);
  if (!window) return fail("no_data", NO_DATA_DETAIL);

  return guardParameters(() => {
    const summary = summarize(window.records);
    const products = aggregateProducts(window.records);
    const trends = monthlyTrends(window.records);
    const overall = overallGrowthRate(trends);

    return {
      period: { start_date: window.start, end_date: window.end, days },
      summary: {
        total_revenue: money(summary.totalRevenue),
        total_transactions: summary.transactionCount,
        total_units_sold: summary.totalUnits,
        avg_order_value: money(summary.averageOrderValue),
        avg_rating: optionalRating(summary.averageRating),
        unique_products: products.length,
      },
      monthly_trends: trends.map(formatTrend),
      growth_metrics: {
        overall_growth_rate: overall,
        revenue_trend: classifyTrend(overall),
      },
      top_products: topProducts(products, options.topProducts ?? 5),
      category_breakdown: categoryShares(aggregateCategories(window.records)),
    };
  });
}

export function buildRevenueInsightsResponse(
  set: TransactionSet,
  options: RevenueInsightsOptions = {},
): Outcome<RevenueInsightsResponse> {
  if (set.records.length === 0) return fail("no_data", NO_DATA_DETAIL);

  return guardParameters(() => {
    const trends = monthlyTrends(set.records);
    const categories = aggregateCategories(set.records);
    const categoryOrder = rankByRevenue(
      categories.map((c) => ({ name: c.category, totalRevenue: c.totalRevenue })),
    ).map((r) => r.name);
    const overall = overallGrowthRate(trends);
    const forecast = forecastRevenue(trends, categoryOrder);

    return {
      monthly_trends: trends.map(formatTrend),
      top_products: topProducts(aggregateProducts(set.records), options.topProducts ?? 2),
      category_distribution: categoryShares(categories),
      customer_segments: segmentCustomers(set.records).map(formatSegment),
      growth_metrics: {
        overall_growth_rate: overall,
        revenue_trend: classifyTrend(overall),
        best_performing_month: bestPerformingMonth(trends),
        seasonal_pattern: seasonalPattern(trends),
      },
      forecasting: {
        predicted_next_month_revenue: money(forecast.predictedNextPeriodRevenue),
        confidence_level: forecast.confidenceLevel,
        key_drivers: forecast.keyDrivers,
      },
    };
  });
}

/** Error body returned for any failed request. */
export function errorEnvelope(
  detail: string,
  statusCode: number,
  now: Date = new Date(),
): ErrorEnvelope {
  return {
    detail,
    status_code: statusCode,
    timestamp: `${now.toISOString().slice(0, 19)}Z`,
  };
}

// ── Formatting ──────────────────────────────────────────────────────

export function money(n: number): number {
  return Math.round(n * 100) / 100;
}

export function percent(n: number): number {
  return Math.round(n * 10) / 10;
}

function optionalRating(rating: number | null): number | null {
  return rating === null ? null : money(rating);
}

function formatProduct(p: ProductMetric): ProductPayload {
  return {
    product_name: p.productName,
    price: money(p.price),
    total_count: p.totalCount,
    average_rating: optionalRating(p.averageRating),
    total_revenue: money(p.totalRevenue),
    category: p.category,
  };
}

function formatCategory(c: CategoryMetric): CategoryPayload {
  return {
    category: c.category,
    total_revenue: money(c.totalRevenue),
    avg_revenue_per_transaction: money(c.avgRevenuePerTransaction),
    transaction_count: c.transactionCount,
    avg_rating: optionalRating(c.avgRating),
    total_units_sold: c.totalUnitsSold,
    revenue_percentage: percent(c.revenuePercentage),
  };
}

function formatAgeGroup(g: AgeGroupMetric): AgeGroupPayload {
  return {
    age_range: g.ageRange,
    customer_count: g.customerCount,
    avg_spending: money(g.avgSpending),
    total_revenue: money(g.totalRevenue),
    avg_rating: optionalRating(g.avgRating),
    transaction_count: g.transactionCount,
    revenue_percentage: percent(g.revenuePercentage),
  };
}

function formatTrend(t: MonthlyTrend): MonthlyTrendPayload {
  return {
    month: t.month,
    revenue: money(t.revenue),
    transaction_count: t.transactionCount,
    growth_rate: t.growthRate === null ? null : percent(t.growthRate),
  };
}

function formatSegment(s: CustomerSegment): SegmentPayload {
  return {
    segment: s.segment,
    customer_count: s.customerCount,
    avg_order_value: money(s.avgOrderValue),
    total_revenue: money(s.totalRevenue),
    criteria: s.criteria,
  };
}

function topProducts(products: readonly ProductMetric[], limit: number): TopProductPayload[] {
  return rankByRevenue(
    products.map((p) => ({ name: p.productName, totalRevenue: p.totalRevenue })),
    { limit },
  ).map((r) => ({
    product_name: r.name,
    total_revenue: money(r.totalRevenue),
    revenue_contribution: percent(r.contributionPercentage),
    rank: r.rank,
  }));
}

function categoryShares(categories: readonly CategoryMetric[]): CategoryShare[] {
  const ranked = rankByRevenue(
    categories.map((c) => ({ name: c.category, totalRevenue: c.totalRevenue, metric: c })),
  );
  return ranked.map((r) => ({
    category: r.name,
    revenue: money(r.totalRevenue),
    percentage: percent(r.entity.metric.revenuePercentage),
  }));
}

// Ranking limits come from callers; a bad one becomes a failure outcome.
function guardParameters<T>(build: () => T): Outcome<T> {
  try {
    return succeed(build());
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      return fail("invalid_parameter", error.message);
    }
    throw error;
  }
}
