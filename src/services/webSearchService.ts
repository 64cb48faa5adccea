import { randomUUID } from "node:crypto";
import { z } from "zod";
import { AnswerMode } from "../config/env.js";
import { PipelineWarning, describeError } from "../domain/errors.js";
import { Chunk, CrawledDocument, CrawlFailureKind, RetrievedContext } from "../domain/types.js";
import { SearchClient } from "../infra/search/searxClient.js";
import { EMPTY_CONTEXT_SUMMARY } from "../pipelines/answering.js";
import { splitIntoChunks } from "../pipelines/chunking.js";
import { Logger, NullLogger } from "../utils/logger.js";
import { CrawlCoordinator, CrawlGateStats } from "./crawlCoordinator.js";
import { Summarizer } from "./summarizer.js";
import { VectorIndex } from "./vectorIndex.js";

const HOUR_MS = 60 * 60 * 1000;
const CONTEXT_SNIPPET_MAX_CHARS = 1200;

export const webSearchRequestShape = {
  query: z.string().trim().min(1).max(500).describe("Question or search terms"),
  k: z.number().int().min(1).max(20).optional().describe("Number of search results to consider"),
  lang: z.string().trim().min(2).max(16).optional().describe("Preferred result language, e.g. en-US"),
  freshness_days: z
    .number()
    .int()
    .min(1)
    .max(3650)
    .optional()
    .describe("Only consider content published within this many days"),
};

export const webSearchRequestSchema = z.object(webSearchRequestShape);

export type WebSearchRequest = z.infer<typeof webSearchRequestSchema>;

export interface WebSearchServiceOptions {
  searchResultLimit: number;
  crawlTopN: number;
  chunkMaxChars: number;
  chunkOverlap: number;
  retrievalTopK: number;
  evictionThreshold: number;
  maxAgeHours: number;
}

export interface WebSearchServiceDeps {
  searchClient: SearchClient;
  crawler: CrawlCoordinator;
  vectorIndex: VectorIndex;
  summarizer: Summarizer;
  options: WebSearchServiceOptions;
  logger?: Logger;
  now?: () => Date;
  createQueryId?: () => string;
}

export interface PipelineStats {
  search_results: number;
  crawled: number;
  crawl_succeeded: number;
  crawl_failed: number;
  chunks_indexed: number;
  chunks_retrieved: number;
}

export interface CrawlFailureSummary {
  url: string;
  kind: CrawlFailureKind;
  reason: string;
}

interface PipelineResponseBase {
  query: string;
  query_id: string;
  degraded: boolean;
  warnings: PipelineWarning[];
  crawl_failures: CrawlFailureSummary[];
  stats: PipelineStats;
  latency_ms: number;
}

export interface WebSearchAnswer extends PipelineResponseBase {
  summary: string;
  cited_sources: string[];
  answer_generation_mode: AnswerMode;
}

export interface ContextSnippet {
  url: string;
  title: string;
  snippet: string;
  score: number;
}

export interface WebSearchContextResult extends PipelineResponseBase {
  snippets: ContextSnippet[];
}

export interface CollectionStatsResult {
  total_points: number;
  eviction_threshold: number;
  max_age_hours: number;
  vector_backend: VectorIndex["backend"];
  crawl: CrawlGateStats;
  maintenance_running: boolean;
}

export interface CleanupResult {
  deleted_count: number;
}

interface RetrievalRun {
  queryId: string;
  context: RetrievedContext;
  warnings: PipelineWarning[];
  crawlFailures: CrawlFailureSummary[];
  stats: PipelineStats;
}

/**
 * Runs one query through search, crawl, indexing and retrieval. Every chunk a
 * run indexes carries its own query id, and retrieval never leaves that id.
 */
export class WebSearchService {
  private readonly logger: Logger;

  private readonly now: () => Date;

  private readonly createQueryId: () => string;

  private maintenance: Promise<void> | null = null;

  private maintenanceRequested = false;

  constructor(private readonly deps: WebSearchServiceDeps) {
    this.logger = deps.logger ?? new NullLogger();
    this.now = deps.now ?? (() => new Date());
    this.createQueryId = deps.createQueryId ?? randomUUID;
  }

  async search(request: WebSearchRequest): Promise<WebSearchAnswer> {
    const startedAt = Date.now();
    const run = await this.retrieve(request);

    let summary = EMPTY_CONTEXT_SUMMARY;
    let citedSources: string[] = [];
    let answerGenerationMode = this.deps.summarizer.answerMode;

    if (run.context.length > 0) {
      this.logger.debug("summarizing", { query_id: run.queryId, chunks: run.context.length });
      const answer = await this.deps.summarizer.summarize(request.query, run.context);
      const retrievedUrls = new Set(run.context.map((item) => item.chunk.sourceUrl));
      summary = answer.summary;
      citedSources = answer.citedSources.filter((url) => retrievedUrls.has(url));
      answerGenerationMode = answer.generationMode;
    }

    const latencyMs = Date.now() - startedAt;
    this.logger.info("web search completed", {
      query_id: run.queryId,
      cited_sources: citedSources.length,
      warnings: run.warnings,
      latency_ms: latencyMs,
    });

    return {
      query: request.query,
      query_id: run.queryId,
      summary,
      cited_sources: citedSources,
      answer_generation_mode: answerGenerationMode,
      degraded: run.warnings.length > 0,
      warnings: run.warnings,
      crawl_failures: run.crawlFailures,
      stats: run.stats,
      latency_ms: latencyMs,
    };
  }

  async searchWithContext(request: WebSearchRequest): Promise<WebSearchContextResult> {
    const startedAt = Date.now();
    const run = await this.retrieve(request);
    const latencyMs = Date.now() - startedAt;

    this.logger.info("web search context completed", {
      query_id: run.queryId,
      snippets: run.context.length,
      warnings: run.warnings,
      latency_ms: latencyMs,
    });

    return {
      query: request.query,
      query_id: run.queryId,
      snippets: run.context.map((item) => ({
        url: item.chunk.sourceUrl,
        title: item.chunk.title,
        snippet: item.chunk.text.slice(0, CONTEXT_SNIPPET_MAX_CHARS),
        score: Number(item.score.toFixed(4)),
      })),
      degraded: run.warnings.length > 0,
      warnings: run.warnings,
      crawl_failures: run.crawlFailures,
      stats: run.stats,
      latency_ms: latencyMs,
    };
  }

  async collectionStats(): Promise<CollectionStatsResult> {
    const { options } = this.deps;
    return {
      total_points: await this.deps.vectorIndex.count(),
      eviction_threshold: options.evictionThreshold,
      max_age_hours: options.maxAgeHours,
      vector_backend: this.deps.vectorIndex.backend,
      crawl: this.deps.crawler.stats(),
      maintenance_running: this.maintenance !== null,
    };
  }

  async cleanup(maxAgeHours = this.deps.options.maxAgeHours): Promise<CleanupResult> {
    const deleted = await this.deps.vectorIndex.evictOlderThan(maxAgeHours * HOUR_MS);
    this.logger.info("manual index cleanup", { max_age_hours: maxAgeHours, deleted_count: deleted });
    return { deleted_count: deleted };
  }

  /** Drops every indexed chunk, whatever run or age it belongs to. */
  async resetIndex(): Promise<CleanupResult> {
    await this.whenIdle();
    const deleted = await this.deps.vectorIndex.reset();
    this.logger.warn("index reset", { deleted_count: deleted });
    return { deleted_count: deleted };
  }

  /** Resolves once no background maintenance is running. */
  async whenIdle(): Promise<void> {
    while (this.maintenance) {
      await this.maintenance;
    }
  }

  private async retrieve(request: WebSearchRequest): Promise<RetrievalRun> {
    const { options } = this.deps;
    const queryId = this.createQueryId();
    const warnings: PipelineWarning[] = [];

    this.logger.debug("searching", { query_id: queryId, query: request.query });
    const results = await this.deps.searchClient.search(request.query, {
      k: request.k ?? options.searchResultLimit,
      language: request.lang,
      freshnessDays: request.freshness_days,
    });

    const urls = dedupe(results.map((result) => result.url));
    this.logger.debug("crawling", { query_id: queryId, urls: Math.min(urls.length, options.crawlTopN) });
    const outcomes = await this.deps.crawler.crawlAll(urls, options.crawlTopN);

    const documents: CrawledDocument[] = [];
    const crawlFailures: CrawlFailureSummary[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        documents.push(outcome.document);
      } else {
        crawlFailures.push({ url: outcome.url, kind: outcome.kind, reason: outcome.reason });
      }
    }
    if (crawlFailures.length > 0) {
      warnings.push("PartialCrawlFailure");
    }

    const chunks = this.toChunks(documents, queryId);
    this.logger.debug("indexing", { query_id: queryId, chunks: chunks.length });
    const indexed = await this.deps.vectorIndex.upsert(chunks);
    if (indexed > 0) {
      this.scheduleMaintenance();
    }

    let context: RetrievedContext = [];
    if (indexed > 0) {
      this.logger.debug("retrieving", { query_id: queryId, top_k: options.retrievalTopK });
      const queryVector = await this.deps.vectorIndex.embedQuery(request.query);
      context = await this.deps.vectorIndex.search(queryVector, queryId, options.retrievalTopK);
    }
    if (context.length === 0) {
      warnings.push("EmptyContext");
    }

    return {
      queryId,
      context,
      warnings,
      crawlFailures,
      stats: {
        search_results: results.length,
        crawled: outcomes.length,
        crawl_succeeded: documents.length,
        crawl_failed: crawlFailures.length,
        chunks_indexed: indexed,
        chunks_retrieved: context.length,
      },
    };
  }

  private toChunks(documents: CrawledDocument[], queryId: string): Chunk[] {
    const { options } = this.deps;
    const createdAt = this.now();
    const seen = new Set<string>();
    const chunks: Chunk[] = [];

    for (const document of documents) {
      for (const text of splitIntoChunks(document.markdown, options.chunkMaxChars, options.chunkOverlap)) {
        if (seen.has(text)) {
          continue;
        }
        seen.add(text);
        chunks.push({
          text,
          sourceUrl: document.url,
          title: document.title,
          queryId,
          createdAt,
        });
      }
    }

    return chunks;
  }

  private scheduleMaintenance(): void {
    if (this.maintenance) {
      this.maintenanceRequested = true;
      return;
    }
    this.maintenance = this.drainMaintenance();
  }

  private async drainMaintenance(): Promise<void> {
    try {
      do {
        this.maintenanceRequested = false;
        await this.runMaintenanceCheck();
      } while (this.maintenanceRequested);
    } finally {
      this.maintenance = null;
    }
  }

  private async runMaintenanceCheck(): Promise<void> {
    const { options } = this.deps;
    try {
      const total = await this.deps.vectorIndex.count();
      if (total <= options.evictionThreshold) {
        return;
      }
      const deleted = await this.deps.vectorIndex.evictOlderThan(options.maxAgeHours * HOUR_MS);
      this.logger.info("evicted stale index points", {
        total_points: total,
        deleted_count: deleted,
        max_age_hours: options.maxAgeHours,
      });
    } catch (error) {
      this.logger.error("index maintenance failed", { reason: describeError(error) });
    }
  }
}

function dedupe(values: string[]): string[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}
