import { describe, expect, test } from "vitest";
import { ageBucketOf, createTransactionSet, dateRange } from "./records.js";

function row(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    transaction_id: "T1",
    product_name: "Desk Lamp",
    category: "Home",
    price: "25.00",
    quantity: "2",
    revenue: "50.00",
    customer_age: "34",
    purchase_date: "2024-03-05",
    customer_rating: "4.5",
    ...overrides,
  };
}

describe("createTransactionSet", () => {
  test("parses string fields into a typed record", () => {
    const set = createTransactionSet([row()]);
    expect(set.rejected).toHaveLength(0);
    expect(set.records).toEqual([
      {
        id: "T1",
        productName: "Desk Lamp",
        category: "Home",
        price: 25,
        quantity: 2,
        revenue: 50,
        customerAge: 34,
        purchaseDate: "2024-03-05",
        customerRating: 4.5,
      },
    ]);
  });

  test("treats an empty rating as absent, not zero", () => {
    const set = createTransactionSet([row({ customer_rating: "" })]);
    expect(set.records[0]?.customerRating).toBeNull();
  });

  test("treats a missing rating column as absent", () => {
    const { customer_rating: _omitted, ...withoutRating } = row();
    const set = createTransactionSet([withoutRating]);
    expect(set.records[0]?.customerRating).toBeNull();
  });

  test("derives revenue from price and quantity when missing", () => {
    const set = createTransactionSet([row({ revenue: "", price: "12.5", quantity: "4" })]);
    expect(set.records[0]?.revenue).toBe(50);
  });

  test("accepts numeric JSON values", () => {
    const set = createTransactionSet([
      row({ transaction_id: 7, price: 10, quantity: 3, revenue: 30, customer_age: 40, customer_rating: 3 }),
    ]);
    expect(set.records[0]?.id).toBe("7");
    expect(set.records[0]?.revenue).toBe(30);
  });

  test("drops the time part of a timestamp", () => {
    const set = createTransactionSet([row({ purchase_date: "2024-03-05 14:22:00" })]);
    expect(set.records[0]?.purchaseDate).toBe("2024-03-05");
  });

  test("rejects malformed rows and records why", () => {
    const set = createTransactionSet([
      row({ transaction_id: "OK" }),
      row({ transaction_id: "NEG", quantity: "-1", revenue: "" }),
      row({ transaction_id: "DATE", purchase_date: "2024-02-30" }),
      row({ transaction_id: "RATE", customer_rating: "6" }),
      row({ transaction_id: "REV", revenue: "99" }),
      row({ transaction_id: "AGE", customer_age: "17" }),
      row({ transaction_id: "NAME", product_name: "  " }),
    ]);

    expect(set.records.map((r) => r.id)).toEqual(["OK"]);
    expect(set.rejected.map((r) => [r.row, r.id])).toEqual([
      [2, "NEG"],
      [3, "DATE"],
      [4, "RATE"],
      [5, "REV"],
      [6, "AGE"],
      [7, "NAME"],
    ]);
    expect(set.rejected[1]?.issues).toEqual([
      'purchase_date: unparseable date "2024-02-30"',
    ]);
    expect(set.rejected[3]?.issues).toEqual([
      "revenue: revenue 99 does not equal price * quantity",
    ]);
  });

  test("rejects a non-numeric price instead of coercing it", () => {
    const set = createTransactionSet([row({ price: "abc" })]);
    expect(set.records).toHaveLength(0);
    expect(set.rejected[0]?.issues).toEqual(["price: must be a number"]);
  });

  test("rejects numbers that overflow to infinity", () => {
    const set = createTransactionSet([
      row({ transaction_id: "HUGE", price: "1e400", revenue: "" }),
      row({ transaction_id: "INF", price: Number.POSITIVE_INFINITY, revenue: "" }),
      row({ transaction_id: "OK", price: "10", quantity: "1", revenue: "10" }),
    ]);
    expect(set.records.map((r) => r.id)).toEqual(["OK"]);
    expect(set.rejected.map((r) => [r.id, r.issues])).toEqual([
      ["HUGE", ["price: must be a number"]],
      ["INF", ["price: must be a finite number"]],
    ]);
  });

  test("accepts only plain decimal notation for numbers", () => {
    const set = createTransactionSet([
      row({ transaction_id: "HEX", quantity: "0x10", revenue: "" }),
      row({ transaction_id: "EXP", price: "1e1", revenue: "" }),
      row({ transaction_id: "PAD", customer_age: " 40 " }),
      row({ transaction_id: "DEC", price: ".5", quantity: "4", revenue: "2" }),
    ]);
    expect(set.records.map((r) => [r.id, r.price])).toEqual([["DEC", 0.5]]);
    expect(set.rejected.map((r) => [r.id, r.issues])).toEqual([
      ["HEX", ["quantity: must be a number"]],
      ["EXP", ["price: must be a number"]],
      ["PAD", ["customer_age: must be a number"]],
    ]);
  });

  test("rejects a date followed by anything but a time of day", () => {
    const set = createTransactionSet([
      row({ transaction_id: "JUNK", purchase_date: "2024-01-15Tgarbage" }),
      row({ transaction_id: "HOUR", purchase_date: "2024-01-15T25:00" }),
      row({ transaction_id: "ISO", purchase_date: "2024-01-15T09:30:00.000Z" }),
    ]);
    expect(set.records.map((r) => [r.id, r.purchaseDate])).toEqual([["ISO", "2024-01-15"]]);
    expect(set.rejected.map((r) => r.issues)).toEqual([
      ['purchase_date: unparseable date "2024-01-15Tgarbage"'],
      ['purchase_date: unparseable date "2024-01-15T25:00"'],
    ]);
  });

  test("keeps the first of two rows sharing an id", () => {
    const set = createTransactionSet([
      row({ transaction_id: "DUP", product_name: "First" }),
      row({ transaction_id: "DUP", product_name: "Second" }),
    ]);
    expect(set.records.map((r) => r.productName)).toEqual(["First"]);
    expect(set.rejected).toEqual([
      { row: 2, id: "DUP", issues: ['transaction_id: duplicate id "DUP"'] },
    ]);
  });

  test("freezes the snapshot", () => {
    const set = createTransactionSet([row()], new Date("2024-04-01T00:00:00Z"));
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.records)).toBe(true);
    expect(Object.isFrozen(set.records[0])).toBe(true);
    expect(set.loadedAt).toBe("2024-04-01T00:00:00.000Z");
  });
});

describe("ageBucketOf", () => {
  test("uses closed-open buckets with an open-ended last bucket", () => {
    expect(ageBucketOf(18)).toBe("18-25");
    expect(ageBucketOf(25)).toBe("18-25");
    expect(ageBucketOf(26)).toBe("26-35");
    expect(ageBucketOf(35)).toBe("26-35");
    expect(ageBucketOf(36)).toBe("36-45");
    expect(ageBucketOf(46)).toBe("46-55");
    expect(ageBucketOf(55)).toBe("46-55");
    expect(ageBucketOf(56)).toBe("56+");
    expect(ageBucketOf(104)).toBe("56+");
  });

  test("returns null below the minimum age", () => {
    expect(ageBucketOf(17)).toBeNull();
  });
});

describe("dateRange", () => {
  test("returns null for no records", () => {
    expect(dateRange([])).toBeNull();
  });

  test("finds the earliest and latest purchase", () => {
    const set = createTransactionSet([
      row({ transaction_id: "a", purchase_date: "2024-02-10" }),
      row({ transaction_id: "b", purchase_date: "2024-01-03" }),
      row({ transaction_id: "c", purchase_date: "2024-03-21" }),
    ]);
    expect(dateRange(set.records)).toEqual({ start: "2024-01-03", end: "2024-03-21" });
  });
});
