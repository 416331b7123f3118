import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { loadConfig } from "./config/env.js";
import { createResourceCache } from "./infra/cache/createResourceCache.js";
import { ProductQaService } from "./services/productQaService.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerGenerateAnswerTool } from "./tools/generateAnswer.js";
import { registerHealthCheckTool } from "./tools/healthCheck.js";
import { registerReleaseResourcesTool } from "./tools/releaseResources.js";
import { registerResourceStatusTool } from "./tools/resourceStatus.js";
import { registerSearchRelatedTool } from "./tools/searchRelated.js";
import { createLogger, describeError, setLogLevel } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const resources = createResourceCache(config);
  const service = new ProductQaService(resources, {
    releaseAfterRequests: config.releaseAfterRequests,
    productScanLimit: config.productScanLimit,
    faqScanLimit: config.faqScanLimit,
  });

  const server = createAppServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server listening on stdio", { answer_provider: config.answerProvider });

  // Preload in the background so the first question does not pay for the dictionary.
  void resources.warmUp().then(
    () => logger.info("Resources warmed up", { ready: service.status().ready }),
    (error: unknown) => logger.error("Warm-up failed", { reason: describeError(error) }),
  );

  const shutdown = async () => {
    resources.releaseAll();
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function createAppServer(service: ProductQaService): McpServer {
  const server = new McpServer({
    name: "shop-qa-mcp",
    version: "0.1.0",
  });

  registerHealthCheckTool(server, service);
  registerSearchRelatedTool(server, service);
  registerGenerateAnswerTool(server, service);
  registerAskQuestionTool(server, service);
  registerResourceStatusTool(server, service);
  registerReleaseResourcesTool(server, service);

  return server;
}

main().catch((error) => {
  logger.error("Failed to start MCP server", { reason: describeError(error) });
  process.exit(1);
});
