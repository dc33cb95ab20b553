import { describe, expect, test } from "vitest";
import { InvalidParameterError } from "./errors.js";
import { rankByRevenue } from "./ranking.js";

const entities = [
  { name: "Lamp", totalRevenue: 300 },
  { name: "Chair", totalRevenue: 500 },
  { name: "Desk", totalRevenue: 500 },
  { name: "Rug", totalRevenue: 700 },
];

describe("rankByRevenue", () => {
  test("orders by revenue, breaking ties by name", () => {
    const result = rankByRevenue(entities);
    expect(result.map((r) => [r.rank, r.name])).toEqual([
      [1, "Rug"],
      [2, "Chair"],
      [3, "Desk"],
      [4, "Lamp"],
    ]);
  });

  test("contribution is measured against every entity, not just the top N", () => {
    const result = rankByRevenue(entities, { limit: 2 });
    expect(result).toHaveLength(2);
    expect(result.map((r) => r.contributionPercentage)).toEqual([35, 25]);
  });

  test("returns identical output on repeated runs without mutating input", () => {
    const before = entities.map((e) => e.name);
    const first = rankByRevenue(entities, { limit: 3 });
    const second = rankByRevenue(entities, { limit: 3 });
    expect(second).toEqual(first);
    expect(entities.map((e) => e.name)).toEqual(before);
  });

  test("keeps the original entity on each entry", () => {
    const [top] = rankByRevenue(entities, { limit: 1 });
    expect(top?.entity).toBe(entities[3]);
  });

  test("a limit larger than the family returns everything", () => {
    expect(rankByRevenue(entities, { limit: 10 })).toHaveLength(4);
  });

  test("zero total revenue gives zero contributions", () => {
    const result = rankByRevenue([
      { name: "B", totalRevenue: 0 },
      { name: "A", totalRevenue: 0 },
    ]);
    expect(result.map((r) => [r.name, r.contributionPercentage])).toEqual([
      ["A", 0],
      ["B", 0],
    ]);
  });

  test("rejects a limit that is not a positive integer", () => {
    expect(() => rankByRevenue(entities, { limit: 0 })).toThrow(InvalidParameterError);
    expect(() => rankByRevenue(entities, { limit: 1.5 })).toThrow(
      "Ranking limit must be a positive integer, received 1.5",
    );
  });
});
