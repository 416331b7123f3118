import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProductQaService, StatusResult } from "../services/productQaService.js";

export interface HealthReport {
  status: "ok" | "degraded";
  ready: boolean;
  answer_client_available: boolean;
  unloaded: string[];
}

export function buildHealthReport(status: StatusResult): HealthReport {
  const answerClientAvailable = !status.resources.answerClient.unavailable;
  return {
    status: status.ready && answerClientAvailable ? "ok" : "degraded",
    ready: status.ready,
    answer_client_available: answerClientAvailable,
    unloaded: Object.entries(status.resources)
      .filter(([, slot]) => !slot.loaded)
      .map(([kind]) => kind),
  };
}

export function registerHealthCheckTool(server: McpServer, service: ProductQaService) {
  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Reports whether the corpora, tokenizer and answer client are ready.",
      inputSchema: {},
    },
    async () => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(buildHealthReport(service.status()), null, 2),
        },
      ],
    }),
  );
}
