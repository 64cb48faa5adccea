import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { WebSearchService } from "../services/webSearchService.js";
import { runTool } from "./respond.js";

export function registerCollectionStatsTool(server: McpServer, service: WebSearchService) {
  server.registerTool(
    "collection_stats",
    {
      title: "Collection Stats",
      description: "Reports index size, eviction policy and crawl gate occupancy.",
      inputSchema: {},
    },
    async () => runTool(() => service.collectionStats()),
  );
}
