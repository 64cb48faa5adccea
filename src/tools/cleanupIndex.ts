import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { WebSearchService } from "../services/webSearchService.js";
import { runTool } from "./respond.js";

export function registerCleanupIndexTool(server: McpServer, service: WebSearchService) {
  server.registerTool(
    "cleanup_index",
    {
      title: "Cleanup Index",
      description: "Deletes indexed chunks older than the given age.",
      inputSchema: {
        max_age_hours: z
          .number()
          .positive()
          .max(24 * 365)
          .optional()
          .describe("Age limit in hours; defaults to INDEX_MAX_AGE_HOURS"),
      },
    },
    async ({ max_age_hours }) => runTool(() => service.cleanup(max_age_hours)),
  );
}
