import { afterEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { z } from "zod";
import { createAppServer } from "../src/app.js";
import { PipelineError } from "../src/domain/errors.js";
import { SearchResult } from "../src/domain/types.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { CrawlCoordinator } from "../src/services/crawlCoordinator.js";
import { Summarizer } from "../src/services/summarizer.js";
import { VectorIndex } from "../src/services/vectorIndex.js";
import { WebSearchService } from "../src/services/webSearchService.js";
import { FakeCrawlBackend, ScriptedAiClient, StaticSearchClient, searchResult } from "./helpers/fakes.js";

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).min(1),
});

function readResult(result: unknown): { isError: boolean; payload: unknown } {
  const parsed = toolResultSchema.parse(result);
  return { isError: parsed.isError ?? false, payload: JSON.parse(parsed.content[0].text) };
}

function createService(results: () => Promise<SearchResult[]>): WebSearchService {
  const client = new ScriptedAiClient("extractive");
  return new WebSearchService({
    searchClient: new StaticSearchClient(results),
    crawler: new CrawlCoordinator(
      new FakeCrawlBackend({
        "https://a.example/guide": {
          kind: "page",
          title: "Guide",
          markdown: "Ownership guide: each value has one owner.",
        },
      }),
      { concurrency: 2, timeoutMs: 500 },
    ),
    vectorIndex: new VectorIndex(new InMemoryVectorStore(), client, {
      embeddingConcurrency: 1,
      embeddingBatchSize: 8,
    }),
    summarizer: new Summarizer(client, { maxContextChars: 12_000 }),
    options: {
      searchResultLimit: 6,
      crawlTopN: 5,
      chunkMaxChars: 1_000,
      chunkOverlap: 150,
      retrievalTopK: 8,
      evictionThreshold: 10_000,
      maxAgeHours: 24,
    },
  });
}

describe("MCP tools", () => {
  const clients: Client[] = [];

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
  });

  async function connect(service: WebSearchService): Promise<Client> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createAppServer(service).connect(serverTransport);
    const client = new Client({ name: "web-search-rag-test", version: "1.0.0-test" });
    await client.connect(clientTransport);
    clients.push(client);
    return client;
  }

  it("registers the pipeline tools", async () => {
    const client = await connect(createService(async () => []));

    const listed = await client.listTools({});

    expect(listed.tools.map((tool) => tool.name).sort()).toEqual([
      "cleanup_index",
      "collection_stats",
      "health_check",
      "reset_index",
      "web_search",
      "web_search_context",
    ]);
  });

  it("returns retrieved snippets from web_search_context", async () => {
    const client = await connect(
      createService(async () => [searchResult("https://a.example/guide")]),
    );

    const { isError, payload } = readResult(
      await client.callTool({ name: "web_search_context", arguments: { query: "ownership" } }),
    );

    expect(isError).toBe(false);
    expect(payload).toMatchObject({
      query: "ownership",
      degraded: false,
      snippets: [
        {
          url: "https://a.example/guide",
          title: "Guide",
          snippet: "Ownership guide: each value has one owner.",
        },
      ],
    });
  });

  it("returns cited sources from web_search", async () => {
    const client = await connect(
      createService(async () => [searchResult("https://a.example/guide")]),
    );

    const { payload } = readResult(
      await client.callTool({ name: "web_search", arguments: { query: "ownership", k: 3 } }),
    );

    expect(payload).toMatchObject({
      cited_sources: ["https://a.example/guide"],
      answer_generation_mode: "extractive",
    });
  });

  it("maps pipeline failures to tool errors", async () => {
    const client = await connect(
      createService(async () => {
        throw new PipelineError("UpstreamUnavailable", "SearxNG search timed out after 15000ms");
      }),
    );

    const result = readResult(
      await client.callTool({ name: "web_search", arguments: { query: "ownership" } }),
    );

    expect(result).toEqual({
      isError: true,
      payload: {
        error: {
          kind: "UpstreamUnavailable",
          message: "SearxNG search timed out after 15000ms",
        },
      },
    });
  });

  it("reports collection stats and runs cleanup", async () => {
    const client = await connect(createService(async () => []));

    const stats = readResult(await client.callTool({ name: "collection_stats", arguments: {} }));
    const cleanup = readResult(
      await client.callTool({ name: "cleanup_index", arguments: { max_age_hours: 1 } }),
    );

    expect(stats.payload).toEqual({
      total_points: 0,
      eviction_threshold: 10_000,
      max_age_hours: 24,
      vector_backend: "memory",
      crawl: { active: 0, pending: 0 },
      maintenance_running: false,
    });
    expect(cleanup.payload).toEqual({ deleted_count: 0 });
  });

  it("empties the index on reset", async () => {
    const client = await connect(
      createService(async () => [searchResult("https://a.example/guide", "Guide")]),
    );

    await client.callTool({ name: "web_search", arguments: { query: "ownership" } });
    const reset = readResult(await client.callTool({ name: "reset_index", arguments: {} }));
    const stats = readResult(await client.callTool({ name: "collection_stats", arguments: {} }));

    expect(reset).toEqual({ isError: false, payload: { deleted_count: 1 } });
    expect(stats.payload).toMatchObject({ total_points: 0 });
  });
});
