import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { WebSearchService } from "../services/webSearchService.js";
import { runTool } from "./respond.js";

export function registerResetIndexTool(server: McpServer, service: WebSearchService) {
  server.registerTool(
    "reset_index",
    {
      title: "Reset Index",
      description: "Deletes every indexed chunk from the vector index.",
      inputSchema: {},
    },
    async () => runTool(() => service.resetIndex()),
  );
}
