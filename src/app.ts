import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppConfig } from "./config/env.js";
import { Crawl4AiClient } from "./infra/crawl/crawl4aiClient.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { createKeepAliveAgent } from "./infra/http/types.js";
import { SearxClient } from "./infra/search/searxClient.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { CrawlCoordinator } from "./services/crawlCoordinator.js";
import { Summarizer } from "./services/summarizer.js";
import { VectorIndex } from "./services/vectorIndex.js";
import { WebSearchService } from "./services/webSearchService.js";
import { registerCleanupIndexTool } from "./tools/cleanupIndex.js";
import { registerCollectionStatsTool } from "./tools/collectionStats.js";
import { registerResetIndexTool } from "./tools/resetIndex.js";
import { registerWebSearchContextTool } from "./tools/webSearchContext.js";
import { registerWebSearchTool } from "./tools/webSearch.js";
import { Logger } from "./utils/logger.js";

export const SERVER_NAME = "web-search-rag";
export const SERVER_VERSION = "0.1.0";

export interface AppContext {
  service: WebSearchService;
  close: () => Promise<void>;
}

/** Wires the pipeline from configuration. `close` drains maintenance before releasing pools. */
export async function createAppContext(config: AppConfig, logger: Logger): Promise<AppContext> {
  const searchAgent = createKeepAliveAgent({
    connectTimeoutMs: config.searchConnectTimeoutMs,
    maxConnections: config.crawlMaxConnections,
  });
  const crawlAgent = createKeepAliveAgent({
    connectTimeoutMs: config.crawlConnectTimeoutMs,
    maxConnections: config.crawlMaxConnections,
  });

  const aiClient = new DefaultAiClient(config);
  const { vectorStore, close: closeStore } = await createVectorStore(config);

  const service = new WebSearchService({
    searchClient: new SearxClient({
      baseUrl: config.searxUrl,
      language: config.searxLanguage,
      timeoutMs: config.searchTimeoutMs,
      dispatcher: searchAgent,
    }),
    crawler: new CrawlCoordinator(
      new Crawl4AiClient({ endpoint: config.crawlUrl, dispatcher: crawlAgent }),
      { concurrency: config.crawlConcurrency, timeoutMs: config.crawlTimeoutMs },
      logger,
    ),
    vectorIndex: new VectorIndex(vectorStore, aiClient, {
      embeddingConcurrency: config.embeddingConcurrency,
      embeddingBatchSize: config.embeddingBatchSize,
    }),
    summarizer: new Summarizer(
      aiClient,
      { maxContextChars: config.summaryContextMaxChars },
      logger,
    ),
    options: {
      searchResultLimit: config.searchResultLimit,
      crawlTopN: config.crawlTopN,
      chunkMaxChars: config.chunkMaxChars,
      chunkOverlap: config.chunkOverlap,
      retrievalTopK: config.retrievalTopK,
      evictionThreshold: config.evictionThreshold,
      maxAgeHours: config.maxAgeHours,
    },
    logger,
  });

  logger.info("pipeline ready", {
    vector_backend: vectorStore.backend,
    embedding_provider: config.embeddingProvider,
    answer_mode: config.answerMode,
  });

  return {
    service,
    close: async () => {
      await service.whenIdle();
      await closeStore();
      await Promise.all([searchAgent.close(), crawlAgent.close()]);
    },
  };
}

export function createAppServer(service: WebSearchService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerWebSearchTool(server, service);
  registerWebSearchContextTool(server, service);
  registerCollectionStatsTool(server, service);
  registerCleanupIndexTool(server, service);
  registerResetIndexTool(server, service);

  return server;
}
