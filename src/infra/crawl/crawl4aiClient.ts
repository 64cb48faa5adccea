import { z } from "zod";
import type { Dispatcher } from "undici";
import { CrawledDocument } from "../../domain/types.js";
import { CrawlPayload, selectContent } from "../../pipelines/extraction.js";
import { HttpFetch, undiciFetch } from "../http/types.js";

const markdownSchema = z.union([
  z.string(),
  z.object({
    fit_markdown: z.string().nullish(),
    raw_markdown: z.string().nullish(),
  }),
]);

const crawlPayloadSchema = z.object({
  success: z.boolean().nullish(),
  error_message: z.string().nullish(),
  markdown: markdownSchema.nullish(),
  cleaned_html: z.string().nullish(),
  extracted_content: z.string().nullish(),
  content: z.string().nullish(),
  metadata: z.object({ title: z.string().nullish() }).nullish(),
});

// Batch endpoints wrap the page payload in a results array.
const crawlEnvelopeSchema = z.object({
  results: z.array(z.unknown()).min(1),
});

type ParsedCrawlPayload = z.infer<typeof crawlPayloadSchema>;

export interface CrawlBackend {
  crawl(url: string, signal: AbortSignal): Promise<CrawledDocument>;
}

export interface Crawl4AiClientOptions {
  endpoint: string;
  dispatcher?: Dispatcher;
}

/** Client for a Crawl4AI-style service returning page markdown for one URL. */
export class Crawl4AiClient implements CrawlBackend {
  constructor(
    private readonly options: Crawl4AiClientOptions,
    private readonly fetchImpl: HttpFetch = undiciFetch,
  ) {}

  async crawl(url: string, signal: AbortSignal): Promise<CrawledDocument> {
    const response = await this.fetchImpl(this.options.endpoint, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        url,
        f: "bm25",
        c: "0",
        skip_internal_links: true,
      }),
      signal,
      dispatcher: this.options.dispatcher,
    });

    if (!response.ok) {
      throw new Error(`Crawl failed (${response.status}): ${await response.text()}`);
    }

    const body = await response.json();
    const envelope = crawlEnvelopeSchema.safeParse(body);
    const parsed = crawlPayloadSchema.safeParse(envelope.success ? envelope.data.results[0] : body);
    if (!parsed.success) {
      throw new Error(`Crawl returned an invalid payload for ${url}.`);
    }

    const payload = parsed.data;

    if (payload.success === false) {
      throw new Error(payload.error_message?.trim() || `Crawl reported failure for ${url}.`);
    }

    const extracted = selectContent(toCrawlPayload(payload));
    if (!extracted) {
      throw new Error(`No extractable content for ${url}.`);
    }

    return {
      url,
      title: payload.metadata?.title?.trim() || url,
      markdown: extracted.text,
      format: extracted.format,
    };
  }
}

function toCrawlPayload(payload: ParsedCrawlPayload): CrawlPayload {
  return {
    markdown: payload.markdown,
    cleaned_html: payload.cleaned_html,
    extracted_content: payload.extracted_content,
    content: payload.content,
  };
}
