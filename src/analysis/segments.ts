// ── Customer Value Segments ─────────────────────────────────────────
// Each transaction is placed in a segment by its own revenue, not by the
// customer's lifetime value.

import type { TransactionRecord } from "./records.js";

export type SegmentName = "High Value" | "Medium Value" | "Low Value";

export interface CustomerSegment {
  segment: SegmentName;
  /** Number of qualifying transactions */
  customerCount: number;
  avgOrderValue: number;
  totalRevenue: number;
  criteria: string;
}

export const HIGH_VALUE_FLOOR = 200;
export const MEDIUM_VALUE_FLOOR = 50;

const SEGMENTS: ReadonlyArray<{ segment: SegmentName; criteria: string }> = [
  { segment: "High Value", criteria: `Orders > $${HIGH_VALUE_FLOOR}` },
  { segment: "Medium Value", criteria: `Orders $${MEDIUM_VALUE_FLOOR}-$${HIGH_VALUE_FLOOR}` },
  { segment: "Low Value", criteria: `Orders < $${MEDIUM_VALUE_FLOOR}` },
];

/** Both 50 and 200 fall in Medium Value. */
export function segmentOf(revenue: number): SegmentName {
  if (revenue > HIGH_VALUE_FLOOR) return "High Value";
  if (revenue >= MEDIUM_VALUE_FLOOR) return "Medium Value";
  return "Low Value";
}

/**
 * Per-segment totals. Always returns High, Medium and Low in that order;
 * a segment with no transactions reports zeros.
 */
export function segmentCustomers(
  records: readonly TransactionRecord[],
): CustomerSegment[] {
  const totals = new Map<SegmentName, { count: number; revenue: number }>();
  for (const record of records) {
    const name = segmentOf(record.revenue);
    const current = totals.get(name) ?? { count: 0, revenue: 0 };
    current.count += 1;
    current.revenue += record.revenue;
    totals.set(name, current);
  }

  return SEGMENTS.map(({ segment, criteria }) => {
    const { count, revenue } = totals.get(segment) ?? { count: 0, revenue: 0 };
    return {
      segment,
      customerCount: count,
      avgOrderValue: count > 0 ? revenue / count : 0,
      totalRevenue: revenue,
      criteria,
    };
  });
}
