import { z } from "zod";

export const DEFAULT_MAX_CITED_SOURCES = 8;

const SOURCE_LINE = /^\s*[*\-•]\s+<?(https?:\/\/[^\s<>]+?)>?\s*$/;
const SOURCES_HEADING = /^\s*(?:#{1,6}\s*)?\**\s*(?:sources|references|fontes)\s*:?\s*\**\s*:?\s*$/i;
const CITATION_TOKEN = /https?:\/\/[^\s<>()[\]{}"'`]+|\[(\d{1,3})\]/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

const jsonEnvelopeSchema = z.object({ content: z.string() });

export interface CitationInput {
  // Sources in prompt order, so that a `[n]` marker resolves to `numberedSources[n - 1]`.
  numberedSources: string[];
  allowedSources: string[];
  maxSources?: number;
}

export interface CitationExtraction {
  body: string;
  citedSources: string[];
}

/**
 * Separates the answer body from its source list and keeps only citations
 * that point at a URL actually present in the retrieved context.
 */
export function extractCitations(rawOutput: string, input: CitationInput): CitationExtraction {
  const text = unwrapJsonEnvelope(rawOutput);
  const bodyLines: string[] = [];
  const listedSources: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = SOURCE_LINE.exec(line);
    if (match) {
      listedSources.push(stripTrailingPunctuation(match[1]));
      continue;
    }
    bodyLines.push(line);
  }

  while (bodyLines.length > 0) {
    const last = bodyLines[bodyLines.length - 1];
    if (last.trim() === "" || SOURCES_HEADING.test(last)) {
      bodyLines.pop();
      continue;
    }
    break;
  }

  const body = bodyLines.join("\n").trim();
  const candidates = [...collectInlineCitations(body, input.numberedSources), ...listedSources];

  return {
    body,
    citedSources: verifyCitations(
      candidates,
      input.allowedSources,
      input.maxSources ?? DEFAULT_MAX_CITED_SOURCES,
    ),
  };
}

export function canonicalUrl(value: string): string {
  try {
    const url = new URL(value.trim());
    url.hash = "";
    return url.href.replace(/\/+$/, "");
  } catch {
    return value.trim().replace(/\/+$/, "");
  }
}

function collectInlineCitations(body: string, numberedSources: string[]): string[] {
  const found: string[] = [];
  for (const match of body.matchAll(CITATION_TOKEN)) {
    const marker = match[1];
    if (marker === undefined) {
      found.push(stripTrailingPunctuation(match[0]));
      continue;
    }
    const source = numberedSources[Number(marker) - 1];
    if (source) {
      found.push(source);
    }
  }
  return found;
}

function verifyCitations(
  candidates: string[],
  allowedSources: string[],
  maxSources: number,
): string[] {
  const allowed = new Map<string, string>();
  for (const source of allowedSources) {
    const key = canonicalUrl(source);
    if (!allowed.has(key)) {
      allowed.set(key, source);
    }
  }

  const cited: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    if (cited.length >= maxSources) {
      break;
    }
    const key = canonicalUrl(candidate);
    const source = allowed.get(key);
    if (!source || seen.has(key)) {
      continue;
    }
    seen.add(key);
    cited.push(source);
  }
  return cited;
}

function unwrapJsonEnvelope(rawOutput: string): string {
  const trimmed = rawOutput.trim();
  if (!trimmed.startsWith("{")) {
    return rawOutput;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return rawOutput;
  }

  const envelope = jsonEnvelopeSchema.safeParse(parsed);
  return envelope.success ? envelope.data.content : rawOutput;
}

function stripTrailingPunctuation(url: string): string {
  return url.replace(TRAILING_PUNCTUATION, "");
}
