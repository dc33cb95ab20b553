import { describe, expect, test } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";

describe("createLogger", () => {
  test("writes one JSON line per entry with fields merged in", () => {
    const lines: string[] = [];
    const logger = createLogger("info", (line) => lines.push(line));

    logger.info("Dataset snapshot published", { records: 3 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toEqual({
      timestamp: expect.any(String),
      level: "info",
      message: "Dataset snapshot published",
      records: 3,
    });
  });

  test("drops entries below the threshold", () => {
    const lines: string[] = [];
    const logger = createLogger("warn", (line) => lines.push(line));

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((l) => JSON.parse(l).message)).toEqual(["c", "d"]);
  });
});

describe("isLogLevel", () => {
  test("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
