import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadTransactionSet, parseSalesCsv } from "./loader.js";

const CSV = [
  "transaction_id,product_name,category,price,quantity,customer_age,customer_rating,revenue,purchase_date",
  "T001,Wireless Mouse,Electronics,25.50,2,28,4.5,51.00,2024-01-15",
  "T002,Cookbook,Books,18.00,1,52,,18.00,2024-01-20",
  "",
  "T003,Desk Chair,Furniture,-5,1,40,3,,2024-02-02",
].join("\n");

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "storefront-analytics-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("parseSalesCsv", () => {
  test("keys rows by header and skips blank lines", () => {
    const rows = parseSalesCsv(CSV);
    expect(rows).toHaveLength(3);
    expect(rows[1]).toEqual({
      transaction_id: "T002",
      product_name: "Cookbook",
      category: "Books",
      price: "18.00",
      quantity: "1",
      customer_age: "52",
      customer_rating: "",
      revenue: "18.00",
      purchase_date: "2024-01-20",
    });
  });
});

describe("loadTransactionSet", () => {
  test("loads valid rows and counts malformed ones", async () => {
    const path = join(dir, "sales.csv");
    await writeFile(path, CSV, "utf8");

    const set = await loadTransactionSet(path);
    expect(set.records.map((r) => r.id)).toEqual(["T001", "T002"]);
    expect(set.records[1]?.customerRating).toBeNull();
    expect(set.rejected.map((r) => [r.row, r.id])).toEqual([[3, "T003"]]);
  });

  test("reports a missing file", async () => {
    await expect(loadTransactionSet(join(dir, "nope.csv"))).rejects.toThrow(
      `Sales data file not found: ${join(dir, "nope.csv")}`,
    );
  });
});
