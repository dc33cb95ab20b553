// ── Transaction Records ─────────────────────────────────────────────
// Validates raw rows into an immutable TransactionSet. Rows that fail
// validation are kept out of every aggregation and reported in `rejected`.

import { z } from "zod";

export interface TransactionRecord {
  readonly id: string;
  readonly productName: string;
  readonly category: string;
  readonly price: number;
  readonly quantity: number;
  readonly revenue: number;
  readonly customerAge: number;
  readonly purchaseDate: string; // "YYYY-MM-DD"
  readonly customerRating: number | null;
}

export interface RejectedRecord {
  /** 1-based position of the row in the input */
  row: number;
  id: string | null;
  issues: string[];
}

export interface TransactionSet {
  readonly records: readonly TransactionRecord[];
  readonly rejected: readonly RejectedRecord[];
  readonly loadedAt: string;
}

export const AGE_BUCKETS = ["18-25", "26-35", "36-45", "46-55", "56+"] as const;
export type AgeBucket = (typeof AGE_BUCKETS)[number];

// Lower bound of each bucket, inclusive. The next bound is exclusive.
const AGE_BUCKET_FLOORS: ReadonlyArray<[number, AgeBucket]> = [
  [56, "56+"],
  [46, "46-55"],
  [36, "36-45"],
  [26, "26-35"],
  [18, "18-25"],
];

export const MIN_CUSTOMER_AGE = 18;
const REVENUE_TOLERANCE = 0.01;

// ── Raw row schema ──────────────────────────────────────────────────

const blankToUndefined = (value: unknown) =>
  value === null || (typeof value === "string" && value.trim() === "")
    ? undefined
    : value;

const requiredText = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z.string().trim().min(1, "must not be empty"),
);

// Plain decimal notation only: no exponent, hex, or surrounding whitespace.
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

const toNumber = (value: unknown) => {
  const present = blankToUndefined(value);
  return typeof present === "string" && DECIMAL.test(present) ? Number(present) : present;
};

const numeric = () =>
  z
    .number({ invalid_type_error: "must be a number", required_error: "is required" })
    .finite("must be a finite number");

const requiredNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(toNumber, schema);

const optionalNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(toNumber, schema.optional());

// Optional time of day after the date, with an optional UTC offset
const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](?:[01]\d|2[0-3]):[0-5]\d(?::[0-5]\d(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const dateField = z
  .preprocess(
    (value) => (value instanceof Date ? value.toISOString() : value),
    z.string().trim(),
  )
  .transform((value, ctx) => {
    const match = TIMESTAMP.exec(value);
    if (match && isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
      return value.slice(0, 10);
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable date "${value}"` });
    return z.NEVER;
  });

const rawRecordSchema = z
  .object({
    transaction_id: requiredText,
    product_name: requiredText,
    category: requiredText,
    price: requiredNumber(numeric().positive()),
    quantity: requiredNumber(numeric().int().positive()),
    revenue: optionalNumber(numeric().nonnegative()),
    customer_age: requiredNumber(numeric().int().min(MIN_CUSTOMER_AGE)),
    purchase_date: dateField,
    customer_rating: optionalNumber(numeric().min(1).max(5)),
  })
  .superRefine((row, ctx) => {
    if (row.revenue === undefined) return;
    if (Math.abs(row.revenue - row.price * row.quantity) > REVENUE_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["revenue"],
        message: `revenue ${row.revenue} does not equal price * quantity`,
      });
    }
  });

/**
 * Validate raw rows (CSV or JSON shaped) into a frozen TransactionSet.
 *
 * Malformed rows are never coerced into the set. A repeated
 * `transaction_id` rejects every occurrence after the first.
 */
export function createTransactionSet(
  rows: readonly Record<string, unknown>[],
  loadedAt: Date = new Date(),
): TransactionSet {
  const records: TransactionRecord[] = [];
  const rejected: RejectedRecord[] = [];
  const seenIds = new Set<string>();

  rows.forEach((row, index) => {
    const parsed = rawRecordSchema.safeParse(row);
    const rawId = typeof row.transaction_id === "string" || typeof row.transaction_id === "number"
      ? String(row.transaction_id)
      : null;

    if (!parsed.success) {
      rejected.push({
        row: index + 1,
        id: rawId,
        issues: parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        ),
      });
      return;
    }

    const data = parsed.data;
    if (seenIds.has(data.transaction_id)) {
      rejected.push({
        row: index + 1,
        id: data.transaction_id,
        issues: [`transaction_id: duplicate id "${data.transaction_id}"`],
      });
      return;
    }
    seenIds.add(data.transaction_id);

    records.push(
      Object.freeze({
        id: data.transaction_id,
        productName: data.product_name,
        category: data.category,
        price: data.price,
        quantity: data.quantity,
        revenue: data.revenue ?? data.price * data.quantity,
        customerAge: data.customer_age,
        purchaseDate: data.purchase_date,
        customerRating: data.customer_rating ?? null,
      }),
    );
  });

  return Object.freeze({
    records: Object.freeze(records),
    rejected: Object.freeze(rejected),
    loadedAt: loadedAt.toISOString(),
  });
}

/** Fixed age bucket for a (validated) customer age. */
export function ageBucketOf(age: number): AgeBucket | null {
  for (const [floor, bucket] of AGE_BUCKET_FLOORS) {
    if (age >= floor) return bucket;
  }
  return null;
}

/** Earliest and latest purchase dates, or null for an empty set. */
export function dateRange(
  records: readonly TransactionRecord[],
): { start: string; end: string } | null {
  let start: string | null = null;
  let end: string | null = null;
  for (const record of records) {
    if (start === null || record.purchaseDate < start) start = record.purchaseDate;
    if (end === null || record.purchaseDate > end) end = record.purchaseDate;
  }
  return start !== null && end !== null ? { start, end } : null;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day
  );
}
