import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger as requestLogger } from "hono/logger";
import { z } from "zod";
import {
  buildCategoriesResponse,
  buildDashboardResponse,
  buildDemographicsResponse,
  buildProductsResponse,
  buildRevenueInsightsResponse,
  errorEnvelope,
  DASHBOARD_DAYS,
  type EngineFailure,
} from "../analysis/index.js";
import type { Config } from "../config.js";
import type { DatasetStore } from "../data/store.js";
import type { Logger } from "../logger.js";
import { auditLog } from "../middleware/audit.js";

export interface AppDeps {
  store: DatasetStore;
  config: Config;
  logger: Logger;
}

const DAYS_MESSAGE = `days must be an integer between ${DASHBOARD_DAYS.min} and ${DASHBOARD_DAYS.max}`;

const dashboardQuery = z.object({
  days: z.coerce
    .number({ invalid_type_error: DAYS_MESSAGE })
    .int(DAYS_MESSAGE)
    .min(DASHBOARD_DAYS.min, DAYS_MESSAGE)
    .max(DASHBOARD_DAYS.max, DAYS_MESSAGE)
    .optional(),
});

// Prefix of the 500 detail, per endpoint
const ROUTE_ERRORS: Record<string, string> = {
  "/api/products": "Error retrieving product data",
  "/api/dashboard": "Error building dashboard",
  "/api/categories": "Error analyzing category performance",
  "/api/demographics": "Error analyzing customer demographics",
  "/api/revenue-insights": "Error generating revenue insights",
};

/**
 * REST surface over the analytics engine. Every handler reads the store
 * once, so a reload mid-request cannot mix two snapshots.
 */
export function createApp({ store, config, logger }: AppDeps): Hono {
  const app = new Hono();

  // ── Middleware ──
  app.use(requestLogger((message) => logger.debug(message)));
  app.use(auditLog(logger));
  app.use(
    cors({
      origin: config.server.corsOrigins.includes("*") ? "*" : config.server.corsOrigins,
      allowMethods: ["GET", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    }),
  );

  // ── Health check ──
  app.get("/health", (c) => {
    const set = store.current();
    return c.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      records: set.records.length,
      rejected_records: set.rejected.length,
    });
  });

  // ── Analytics ──
  app.get("/api/products", (c) => c.json(buildProductsResponse(store.current())));

  app.get("/api/dashboard", (c) => {
    const query = dashboardQuery.safeParse({ days: c.req.query("days") });
    if (!query.success) {
      return c.json(errorEnvelope(DAYS_MESSAGE, 422), 422);
    }
    const outcome = buildDashboardResponse(store.current(), {
      days: query.data.days ?? config.analytics.dashboardDefaultDays,
      topProducts: config.analytics.dashboardTopProducts,
    });
    return outcome.ok ? c.json(outcome.value) : failure(c, outcome.failure);
  });

  app.get("/api/categories", (c) => c.json(buildCategoriesResponse(store.current())));

  app.get("/api/demographics", (c) =>
    c.json(buildDemographicsResponse(store.current())),
  );

  app.get("/api/revenue-insights", (c) => {
    const outcome = buildRevenueInsightsResponse(store.current(), {
      topProducts: config.analytics.insightsTopProducts,
    });
    return outcome.ok ? c.json(outcome.value) : failure(c, outcome.failure);
  });

  // ── Errors ──
  app.notFound((c) => c.json(errorEnvelope("Not Found", 404), 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(errorEnvelope(err.message, err.status), err.status);
    }
    logger.error("Unhandled error", {
      path: c.req.path,
      error: err.message,
      stack: err.stack,
    });
    const prefix = ROUTE_ERRORS[c.req.path] ?? "Internal server error";
    return c.json(errorEnvelope(`${prefix}: ${err.message}`, 500), 500);
  });

  return app;
}

function failure(c: Context, { kind, detail }: EngineFailure) {
  switch (kind) {
    case "no_data":
      return c.json(errorEnvelope(detail, 404), 404);
    case "invalid_parameter":
      return c.json(errorEnvelope(detail, 422), 422);
  }
}
