import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ProductQaService } from "../services/productQaService.js";

export function registerGenerateAnswerTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "generate_answer",
    {
      title: "Generate Answer",
      description: "Generates a prose answer grounded in the matching products and FAQ entries.",
      inputSchema: {
        question: z.string().min(1).describe("Customer question"),
      },
    },
    async ({ question }) => {
      const { answer } = await service.generateAnswer(question);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ answer }, null, 2),
          },
        ],
      };
    },
  );
}
