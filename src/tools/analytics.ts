import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  buildCategoriesResponse,
  buildDashboardResponse,
  buildDemographicsResponse,
  buildProductsResponse,
  buildRevenueInsightsResponse,
  DASHBOARD_DAYS,
  type Outcome,
} from "../analysis/index.js";
import type { Config } from "../config.js";
import type { DatasetStore } from "../data/store.js";

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function registerAnalyticsTools(
  server: McpServer,
  store: DatasetStore,
  config: Config,
) {
  server.registerTool(
    "get_products",
    {
      description:
        "List every product with its latest unit price, units sold, average customer rating (null when no customer rated it), total revenue and category. Use this to look up a specific product's performance or to compare products side by side.",
      annotations: { readOnlyHint: true },
    },
    async () => run(() => buildProductsResponse(store.current())),
  );

  server.registerTool(
    "get_dashboard",
    {
      description:
        "Summarize sales over a trailing window of days ending at the most recent purchase in the dataset: revenue, transaction and unit totals, average order value and rating, monthly trend with growth rates, top products and a category breakdown. Use this for a quick health check of recent sales.",
      inputSchema: {
        days: z
          .number()
          .int()
          .min(DASHBOARD_DAYS.min)
          .max(DASHBOARD_DAYS.max)
          .optional()
          .describe(
            `Length of the trailing window in days (${DASHBOARD_DAYS.min}-${DASHBOARD_DAYS.max}). Defaults to ${config.analytics.dashboardDefaultDays}.`,
          ),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ days }) =>
      runOutcome(() =>
        buildDashboardResponse(store.current(), {
          days: days ?? config.analytics.dashboardDefaultDays,
          topProducts: config.analytics.dashboardTopProducts,
        }),
      ),
  );

  server.registerTool(
    "get_categories",
    {
      description:
        "Break revenue down by product category, highest revenue first: total and average revenue per transaction, transaction count, units sold, average rating and each category's share of total revenue. Use this to see which categories drive the business.",
      annotations: { readOnlyHint: true },
    },
    async () => run(() => buildCategoriesResponse(store.current())),
  );

  server.registerTool(
    "get_demographics",
    {
      description:
        "Break revenue down by customer age group (18-25, 26-35, 36-45, 46-55, 56+): customer and transaction counts, average spending, total revenue, average rating and revenue share. Age groups without purchases are left out.",
      annotations: { readOnlyHint: true },
    },
    async () => run(() => buildDemographicsResponse(store.current())),
  );

  server.registerTool(
    "get_revenue_insights",
    {
      description:
        "Executive revenue overview across the whole dataset: monthly trends with growth rates, top products, category distribution, customer value segments (per order: > $200, $50-$200, < $50), growth metrics with the best month and a seasonal label, and a next-month revenue forecast with a confidence level and key drivers.",
      annotations: { readOnlyHint: true },
    },
    async () =>
      runOutcome(() =>
        buildRevenueInsightsResponse(store.current(), {
          topProducts: config.analytics.insightsTopProducts,
        }),
      ),
  );
}

// ── Helpers ─────────────────────────────────────────────────────────

function run(build: () => unknown): ToolResult {
  try {
    return textResult(JSON.stringify(build(), null, 2));
  } catch (error) {
    return errorResult(error);
  }
}

function runOutcome<T>(build: () => Outcome<T>): ToolResult {
  try {
    const outcome = build();
    if (!outcome.ok) {
      return { ...textResult(`Error: ${outcome.failure.detail}`), isError: true };
    }
    return textResult(JSON.stringify(outcome.value, null, 2));
  } catch (error) {
    return errorResult(error);
  }
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  return { ...textResult(`Error: ${message}`), isError: true };
}
