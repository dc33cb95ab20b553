import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "executive-review",
    {
      description:
        "Executive sales review covering revenue trends, category and product performance, customer segments, demographics and next month's outlook",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please prepare an executive sales review. Use these tools in order:\n\n1. **get_revenue_insights** - Monthly trends, top products, customer segments and the revenue forecast\n2. **get_categories** - Revenue, units and ratings per category\n3. **get_demographics** - Spending and ratings per customer age group\n4. **get_dashboard** - The last 30 days in detail\n\nFormat the review with these sections:\n- **Revenue Trend**: Month-over-month growth, the best month and the current direction\n- **What Sells**: Top products and categories with their share of revenue\n- **Who Buys**: Age groups and value segments, with average order values\n- **Customer Satisfaction**: Categories or age groups whose ratings stand out, noting where ratings are missing\n- **Outlook**: The predicted revenue for next month, its confidence level and key drivers\n- **Recommendations**: 3-5 specific actions for merchandising, pricing or retention",
          },
        },
      ],
    })
  );
}
