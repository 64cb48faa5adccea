import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { WebSearchService, webSearchRequestShape } from "../services/webSearchService.js";
import { runTool } from "./respond.js";

export function registerWebSearchTool(server: McpServer, service: WebSearchService) {
  server.registerTool(
    "web_search",
    {
      title: "Web Search",
      description:
        "Searches the web, crawls the top results and returns a summary grounded in their content with cited source URLs.",
      inputSchema: webSearchRequestShape,
    },
    async (request) => runTool(() => service.search(request)),
  );
}
