import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProductQaService } from "../services/productQaService.js";

export function registerResourceStatusTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "resource_status",
    {
      title: "Resource Status",
      description: "Reports which corpora, tokenizer and answer client are currently loaded.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(service.status(), null, 2),
        },
      ],
    }),
  );
}
