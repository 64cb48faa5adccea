import { RetrievedContext } from "../domain/types.js";
import { GroundingContext } from "../infra/ai/types.js";
import { collapseWhitespace, toExcerpt } from "../utils/text.js";

export const DEFAULT_SNIPPET_MAX_CHARS = 1200;

const MIN_SNIPPET_CHARS = 120;
const DIGEST_LINE_LIMIT = 5;
const DIGEST_EXCERPT_CHARS = 240;

export const EMPTY_CONTEXT_SUMMARY =
  "No fresh content could be retrieved for this query. Try rephrasing it or widening the freshness window.";

export const SOURCES_ONLY_SUMMARY =
  "The generated answer contained only a source list, so no summary is available for this query.";

/**
 * Numbers retrieved chunks as prompt contexts until the character budget is
 * spent. Order follows the retrieval ranking.
 */
export function buildGroundingContexts(
  context: RetrievedContext,
  maxChars: number,
  maxSnippetChars = DEFAULT_SNIPPET_MAX_CHARS,
): GroundingContext[] {
  const contexts: GroundingContext[] = [];
  const seen = new Set<string>();
  let used = 0;

  for (const item of context) {
    if (seen.has(item.chunk.id)) {
      continue;
    }
    const normalized = collapseWhitespace(item.chunk.text);
    if (!normalized) {
      continue;
    }

    const remaining = maxChars - used;
    if (remaining < MIN_SNIPPET_CHARS) {
      break;
    }

    const snippet = normalized.slice(0, Math.min(maxSnippetChars, remaining));
    contexts.push({
      source: item.chunk.sourceUrl,
      title: item.chunk.title,
      snippet,
    });
    seen.add(item.chunk.id);
    used += snippet.length;
  }

  return contexts;
}

/** Deterministic digest used when no LLM answer mode is configured. */
export function buildExtractiveDigest(query: string, contexts: GroundingContext[]): string {
  const lineLimit = Math.min(contexts.length, DIGEST_LINE_LIMIT);
  const lines = [`Question: ${query}`, "Context-grounded summary:"];

  for (let i = 0; i < lineLimit; i += 1) {
    lines.push(`${i + 1}. ${toExcerpt(contexts[i].snippet, DIGEST_EXCERPT_CHARS)} [${i + 1}]`);
  }

  const sources = contexts
    .slice(0, lineLimit)
    .map((context) => context.source)
    .filter((source, index, all) => all.indexOf(source) === index);

  lines.push("", "Sources:");
  for (const source of sources) {
    lines.push(`* ${source}`);
  }

  return lines.join("\n");
}
