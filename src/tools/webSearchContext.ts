import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { WebSearchService, webSearchRequestShape } from "../services/webSearchService.js";
import { runTool } from "./respond.js";

export function registerWebSearchContextTool(server: McpServer, service: WebSearchService) {
  server.registerTool(
    "web_search_context",
    {
      title: "Web Search Context",
      description:
        "Runs the same search and crawl pipeline but returns the retrieved page snippets instead of a summary.",
      inputSchema: webSearchRequestShape,
    },
    async (request) => runTool(() => service.searchWithContext(request)),
  );
}
