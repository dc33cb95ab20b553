import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { dateRange } from "../analysis/index.js";
import type { DatasetStore } from "../data/store.js";

export function registerResources(server: McpServer, store: DatasetStore) {
  server.registerResource(
    "dataset",
    "analytics://dataset",
    {
      description:
        "The loaded sales dataset: record counts, excluded malformed rows, covered date range and load time",
    },
    async (uri) => {
      const set = store.current();
      const range = dateRange(set.records);

      const overview = {
        records: set.records.length,
        rejectedRecords: set.rejected.length,
        rejected: set.rejected.slice(0, 20),
        firstPurchase: range?.start ?? null,
        lastPurchase: range?.end ?? null,
        loadedAt: set.loadedAt,
      };

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(overview, null, 2),
          },
        ],
      };
    }
  );
}
