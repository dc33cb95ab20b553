// ── Analytics Engine ────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions only: no HTTP, MCP or file-system dependencies.

export {
  createTransactionSet,
  ageBucketOf,
  dateRange,
  AGE_BUCKETS,
  type AgeBucket,
  type RejectedRecord,
  type TransactionRecord,
  type TransactionSet,
} from "./records.js";

export {
  aggregateAgeGroups,
  aggregateCategories,
  aggregateProducts,
  groupRecords,
  summarize,
  type AgeGroupMetric,
  type CategoryMetric,
  type GroupSummary,
  type ProductMetric,
} from "./aggregation.js";

export {
  monthlyTrends,
  growthRate,
  overallGrowthRate,
  classifyTrend,
  bestPerformingMonth,
  seasonalPattern,
  filterRecentDays,
  type MonthlyTrend,
  type TrendDirection,
} from "./trends.js";

export {
  segmentCustomers,
  segmentOf,
  type CustomerSegment,
  type SegmentName,
} from "./segments.js";

export {
  rankByRevenue,
  type Rankable,
  type RankedEntity,
  type RankingOptions,
} from "./ranking.js";

export {
  forecastRevenue,
  type ConfidenceLevel,
  type ForecastOptions,
  type ForecastResult,
} from "./forecasting.js";

export {
  buildProductsResponse,
  buildDashboardResponse,
  buildCategoriesResponse,
  buildDemographicsResponse,
  buildRevenueInsightsResponse,
  errorEnvelope,
  DASHBOARD_DAYS,
  type CategoriesResponse,
  type DashboardOptions,
  type DashboardResponse,
  type DemographicsResponse,
  type ErrorEnvelope,
  type ProductsResponse,
  type RevenueInsightsOptions,
  type RevenueInsightsResponse,
} from "./responses.js";

export {
  InvalidParameterError,
  NO_DATA_DETAIL,
  type EngineFailure,
  type FailureKind,
  type Outcome,
} from "./errors.js";
