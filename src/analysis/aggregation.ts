// ── Aggregation ─────────────────────────────────────────────────────
// Group-then-reduce over transaction records: one hash-map pass per key,
// then a fixed set of reducers (sum, count, null-aware mean) per group.

import {
  AGE_BUCKETS,
  ageBucketOf,
  type AgeBucket,
  type TransactionRecord,
} from "./records.js";

export interface GroupSummary {
  transactionCount: number;
  totalRevenue: number;
  totalUnits: number;
  /** Mean of the ratings present in the group; null when none are */
  averageRating: number | null;
  averageOrderValue: number;
}

export interface ProductMetric {
  productName: string;
  /** Unit price of the most recent purchase */
  price: number;
  totalCount: number;
  averageRating: number | null;
  totalRevenue: number;
  category: string;
}

export interface CategoryMetric {
  category: string;
  totalRevenue: number;
  avgRevenuePerTransaction: number;
  transactionCount: number;
  avgRating: number | null;
  totalUnitsSold: number;
  revenuePercentage: number;
}

export interface AgeGroupMetric {
  ageRange: AgeBucket;
  /** Counted per transaction: the records carry no customer identity */
  customerCount: number;
  avgSpending: number;
  totalRevenue: number;
  avgRating: number | null;
  transactionCount: number;
  revenuePercentage: number;
}

/**
 * Group records by a key. Groups keep first-seen order and are never empty.
 */
export function groupRecords<K>(
  records: readonly TransactionRecord[],
  keyOf: (record: TransactionRecord) => K,
): Map<K, TransactionRecord[]> {
  const groups = new Map<K, TransactionRecord[]>();
  for (const record of records) {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/** Reduce a group of records to its sums, count and averages. */
export function summarize(records: readonly TransactionRecord[]): GroupSummary {
  let totalRevenue = 0;
  let totalUnits = 0;
  let ratingSum = 0;
  let ratingCount = 0;

  for (const record of records) {
    totalRevenue += record.revenue;
    totalUnits += record.quantity;
    if (record.customerRating !== null) {
      ratingSum += record.customerRating;
      ratingCount += 1;
    }
  }

  const transactionCount = records.length;
  return {
    transactionCount,
    totalRevenue,
    totalUnits,
    averageRating: ratingCount > 0 ? ratingSum / ratingCount : null,
    averageOrderValue: transactionCount > 0 ? totalRevenue / transactionCount : 0,
  };
}

/** Percentage of `total` that `part` represents; 0 when the total is 0. */
export function revenueShare(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

export function aggregateProducts(
  records: readonly TransactionRecord[],
): ProductMetric[] {
  const products: ProductMetric[] = [];

  for (const [productName, group] of groupRecords(records, (r) => r.productName)) {
    const summary = summarize(group);
    const latest = mostRecent(group);
    products.push({
      productName,
      price: latest.price,
      totalCount: summary.totalUnits,
      averageRating: summary.averageRating,
      totalRevenue: summary.totalRevenue,
      category: latest.category,
    });
  }

  return products.sort((a, b) => compareNames(a.productName, b.productName));
}

export function aggregateCategories(
  records: readonly TransactionRecord[],
): CategoryMetric[] {
  const groups = groupRecords(records, (r) => r.category);
  const summaries = [...groups].map(([category, group]) => ({
    category,
    summary: summarize(group),
  }));
  const grandTotal = sumRevenue(summaries.map((s) => s.summary));

  return summaries
    .map(({ category, summary }) => ({
      category,
      totalRevenue: summary.totalRevenue,
      avgRevenuePerTransaction: summary.averageOrderValue,
      transactionCount: summary.transactionCount,
      avgRating: summary.averageRating,
      totalUnitsSold: summary.totalUnits,
      revenuePercentage: revenueShare(summary.totalRevenue, grandTotal),
    }))
    .sort((a, b) => compareNames(a.category, b.category));
}

export function aggregateAgeGroups(
  records: readonly TransactionRecord[],
): AgeGroupMetric[] {
  const groups = groupRecords(records, (r) => ageBucketOf(r.customerAge));
  const summaries: Array<{ ageRange: AgeBucket; summary: GroupSummary }> = [];

  for (const ageRange of AGE_BUCKETS) {
    const group = groups.get(ageRange);
    if (group) summaries.push({ ageRange, summary: summarize(group) });
  }
  const grandTotal = sumRevenue(summaries.map((s) => s.summary));

  return summaries.map(({ ageRange, summary }) => ({
    ageRange,
    customerCount: summary.transactionCount,
    avgSpending: summary.averageOrderValue,
    totalRevenue: summary.totalRevenue,
    avgRating: summary.averageRating,
    transactionCount: summary.transactionCount,
    revenuePercentage: revenueShare(summary.totalRevenue, grandTotal),
  }));
}

// ── Helpers ─────────────────────────────────────────────────────────

/** Code-point order, independent of the host locale. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sumRevenue(summaries: GroupSummary[]): number {
  return summaries.reduce((sum, s) => sum + s.totalRevenue, 0);
}

// Latest purchase date wins; the later record wins a tie.
function mostRecent(group: readonly TransactionRecord[]): TransactionRecord {
  const [first, ...rest] = group;
  if (!first) throw new Error("mostRecent called with an empty group");
  return rest.reduce(
    (latest, record) => (record.purchaseDate >= latest.purchaseDate ? record : latest),
    first,
  );
}
