import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ProductQaService } from "../services/productQaService.js";

export function registerSearchRelatedTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "search_related",
    {
      title: "Search Related",
      description: "Returns the products and FAQ entries that best match a question.",
      inputSchema: {
        question: z.string().min(1).describe("Customer question"),
      },
    },
    async ({ question }) => {
      const result = await service.searchRelated(question);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    },
  );
}
