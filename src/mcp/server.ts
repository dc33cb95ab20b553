import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "../config.js";
import type { DatasetStore } from "../data/store.js";
import { registerAnalyticsTools } from "../tools/analytics.js";
import { registerPrompts } from "../tools/prompts.js";
import { registerResources } from "../tools/resources.js";

const SERVER_NAME = "storefront-analytics";
const SERVER_VERSION = "0.1.0";

/**
 * Create and configure an MCP server with all analytics tools, resources
 * and prompts registered against the given dataset store.
 */
export function createMcpServer(store: DatasetStore, config: Config): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Analysis tools: computed metrics
  registerAnalyticsTools(server, store, config);

  // Resources: read-only data surfaces
  registerResources(server, store);

  // Prompts: canned analysis templates
  registerPrompts(server);

  return server;
}
