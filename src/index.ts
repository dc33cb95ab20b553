#!/usr/bin/env node
/**
 * Storefront Analytics
 *
 * Business-intelligence metrics over e-commerce transactions, served over
 * REST (HTTP) or as MCP tools (stdio).
 *
 * Usage:
 *   node dist/index.js --transport http    # REST API on port 8000
 *   node dist/index.js --transport stdio   # MCP server for local clients
 *
 * Send SIGHUP to reload the dataset without restarting.
 */

import { loadConfig } from "./config.js";
import { loadTransactionSet } from "./data/loader.js";
import { DatasetStore } from "./data/store.js";
import { createLogger } from "./logger.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const store = new DatasetStore(() => loadTransactionSet(config.dataPath), logger);
await store.reload();

process.on("SIGHUP", () => {
  store.reload().catch((error: unknown) => {
    logger.error("Dataset reload failed; keeping previous snapshot", {
      error: error instanceof Error ? error.message : String(error),
    });
  });
});

if (config.server.transport === "stdio") {
  await startStdio();
} else {
  await startHttp();
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/stdio.js"
  );
  const { createMcpServer } = await import("./mcp/server.js");

  const server = createMcpServer(store, config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server connected over stdio");

  process.on("SIGINT", () => {
    server
      .close()
      .catch((error: unknown) => {
        logger.error("Error closing MCP server", {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => process.exit(0));
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { serve } = await import("@hono/node-server");
  const { createApp } = await import("./api/app.js");

  const app = createApp({ store, config, logger });
  const port = config.server.port;

  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info("Storefront analytics listening", {
      url: `http://localhost:${info.port}`,
      endpoints: [
        "GET /api/products",
        "GET /api/dashboard?days=30",
        "GET /api/categories",
        "GET /api/demographics",
        "GET /api/revenue-insights",
        "GET /health",
      ],
    });
  });

  process.on("SIGINT", () => {
    server.close(() => process.exit(0));
  });
}
