import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProductQaService } from "../services/productQaService.js";

export function registerReleaseResourcesTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "release_resources",
    {
      title: "Release Resources",
      description: "Drops every cached resource; they reload on next use.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(service.releaseResources(), null, 2),
        },
      ],
    }),
  );
}
