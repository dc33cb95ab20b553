import { describe, expect, test } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({}, [])).toEqual({
      dataPath: "data/sales_data.csv",
      server: { port: 8000, transport: "http", corsOrigins: ["*"] },
      analytics: { insightsTopProducts: 2, dashboardTopProducts: 5, dashboardDefaultDays: 30 },
      logLevel: "info",
    });
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        DATA_PATH: "/srv/sales.csv",
        PORT: "9001",
        TRANSPORT: "stdio",
        CORS_ORIGINS: "http://a.test, http://b.test",
        LOG_LEVEL: "debug",
        INSIGHTS_TOP_PRODUCTS: "3",
        DASHBOARD_DEFAULT_DAYS: "7",
      },
      [],
    );
    expect(config.dataPath).toBe("/srv/sales.csv");
    expect(config.server).toEqual({
      port: 9001,
      transport: "stdio",
      corsOrigins: ["http://a.test", "http://b.test"],
    });
    expect(config.logLevel).toBe("debug");
    expect(config.analytics.insightsTopProducts).toBe(3);
    expect(config.analytics.dashboardDefaultDays).toBe(7);
  });

  test("--transport flag wins over TRANSPORT", () => {
    expect(loadConfig({ TRANSPORT: "http" }, ["--transport", "stdio"]).server.transport).toBe("stdio");
  });

  test("rejects a bad log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" }, [])).toThrow("Invalid LOG_LEVEL: verbose");
  });

  test("rejects non-positive integers", () => {
    expect(() => loadConfig({ PORT: "0" }, [])).toThrow('PORT must be a positive integer, received "0"');
    expect(() => loadConfig({ DASHBOARD_TOP_PRODUCTS: "2.5" }, [])).toThrow(
      'DASHBOARD_TOP_PRODUCTS must be a positive integer, received "2.5"',
    );
  });

  test("caps the default dashboard window", () => {
    expect(() => loadConfig({ DASHBOARD_DEFAULT_DAYS: "365" }, [])).toThrow(
      "DASHBOARD_DEFAULT_DAYS must not exceed 180",
    );
  });
});
