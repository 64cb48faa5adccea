import { z } from "zod";
import { PipelineError, describeError } from "../../domain/errors.js";
import { SearchResult } from "../../domain/types.js";
import { HttpFetch, isAbortError, undiciFetch } from "../http/types.js";
import type { Dispatcher } from "undici";

const MAX_RESULTS = 20;

/** One SearxNG result entry; unknown engine-specific fields pass through. */
const searxResultSchema = z
  .object({
    url: z.string(),
    title: z.string().nullish(),
    content: z.string().nullish(),
    score: z.number().nullish(),
  })
  .passthrough();

// Some engines fail and SearxNG drops the results array entirely.
const searxResponseSchema = z
  .object({
    results: z.array(z.unknown()).default([]),
  })
  .passthrough();

export interface SearxClientOptions {
  baseUrl: string;
  language: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export interface SearxQueryOptions {
  k?: number;
  language?: string;
  freshnessDays?: number;
}

export interface SearchClient {
  search(query: string, options?: SearxQueryOptions): Promise<SearchResult[]>;
}

export class SearxClient implements SearchClient {
  constructor(
    private readonly options: SearxClientOptions,
    private readonly fetchImpl: HttpFetch = undiciFetch,
  ) {}

  async search(query: string, options: SearxQueryOptions = {}): Promise<SearchResult[]> {
    const url = new URL(this.options.baseUrl);
    url.search = buildParams(query, {
      language: options.language?.trim() || this.options.language,
      freshnessDays: options.freshnessDays,
    }).toString();

    let payload: unknown;
    try {
      const response = await this.fetchImpl(url.toString(), {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
        dispatcher: this.options.dispatcher,
      });

      if (!response.ok) {
        throw new Error(`SearxNG search failed (${response.status}): ${await response.text()}`);
      }
      payload = await response.json();
    } catch (error) {
      const reason = isAbortError(error)
        ? `SearxNG search timed out after ${this.options.timeoutMs}ms`
        : describeError(error);
      throw new PipelineError("UpstreamUnavailable", reason, { cause: error });
    }

    const parsed = searxResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PipelineError("UpstreamUnavailable", "SearxNG returned an invalid payload.", {
        cause: parsed.error,
      });
    }

    const limit = Math.min(Math.max(options.k ?? 6, 1), MAX_RESULTS);
    return rankResults(parsed.data.results).slice(0, limit);
  }
}

function buildParams(
  query: string,
  options: { language: string; freshnessDays?: number },
): URLSearchParams {
  const params = new URLSearchParams({
    q: query,
    format: "json",
    language: options.language,
    safesearch: "1",
    categories: "general",
  });

  const timeRange = toTimeRange(options.freshnessDays);
  if (timeRange) {
    params.set("time_range", timeRange);
  }
  return params;
}

export function toTimeRange(freshnessDays: number | undefined): string | null {
  if (freshnessDays === undefined || freshnessDays <= 0) {
    return null;
  }
  if (freshnessDays <= 1) {
    return "day";
  }
  if (freshnessDays <= 7) {
    return "week";
  }
  if (freshnessDays <= 31) {
    return "month";
  }
  return "year";
}

function rankResults(rawResults: unknown[]): SearchResult[] {
  const ranked: Array<{ result: SearchResult; score: number }> = [];

  for (const raw of rawResults) {
    const parsed = searxResultSchema.safeParse(raw);
    if (!parsed.success || !isHttpUrl(parsed.data.url)) {
      continue;
    }
    ranked.push({
      result: {
        url: parsed.data.url,
        title: parsed.data.title?.trim() || parsed.data.url,
        snippet: parsed.data.content?.trim() ?? "",
      },
      score: parsed.data.score ?? 0,
    });
  }

  return ranked.sort((a, b) => b.score - a.score).map((item) => item.result);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
