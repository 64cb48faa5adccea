import { normalizeText } from "../utils/text.js";

export const DEFAULT_MAX_CHARS = 1000;
export const DEFAULT_OVERLAP = 150;

const MIN_BOUNDARY_RATIO = 0.55;

interface BoundaryTier {
  tokens: string[];
  // Characters of the token kept at the end of the current chunk.
  keep: number;
}

const BOUNDARY_TIERS: BoundaryTier[] = [
  { tokens: ["\n\n"], keep: 0 },
  { tokens: ["\n"], keep: 0 },
  { tokens: [". ", "! ", "? "], keep: 1 },
  { tokens: ["; ", ", "], keep: 1 },
  { tokens: [" "], keep: 0 },
];

/**
 * Splits extracted page text into windows of at most `maxChars` characters.
 * Consecutive windows share up to `overlap` characters; exact duplicate
 * windows are dropped, keeping the first occurrence.
 */
export function splitIntoChunks(
  text: string,
  maxChars: number = DEFAULT_MAX_CHARS,
  overlap: number = DEFAULT_OVERLAP,
): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}.`);
  }

  const safeOverlap = Math.min(Math.max(Math.floor(overlap), 0), maxChars - 1);
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  return dedupeChunks(splitTextByNaturalBoundary(normalized, maxChars, safeOverlap));
}

function splitTextByNaturalBoundary(
  text: string,
  maxChars: number,
  overlap: number,
): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const chunks: string[] = [];
  const minBoundary = Math.floor(maxChars * MIN_BOUNDARY_RATIO);
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + maxChars, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const boundary = findBoundary(text.slice(start, hardEnd), minBoundary);
      if (boundary > 0) {
        end = start + boundary;
      }
    }

    // Windows never end between the two halves of a surrogate pair. A single
    // code point wider than maxChars is kept whole.
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end = end - 1 > start ? end - 1 : end + 1;
    }

    const piece = text.slice(start, end).trim();
    if (piece) {
      chunks.push(piece);
    }

    if (end >= text.length) {
      break;
    }

    let nextStart = end - overlap;
    if (isLowSurrogate(text.charCodeAt(nextStart))) {
      nextStart += 1;
    }
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

function findBoundary(window: string, minBoundary: number): number {
  for (const tier of BOUNDARY_TIERS) {
    let best = -1;
    for (const token of tier.tokens) {
      const idx = window.lastIndexOf(token);
      if (idx > best) {
        best = idx;
      }
    }
    if (best >= minBoundary) {
      return best + tier.keep;
    }
  }
  return -1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function dedupeChunks(chunks: string[]): string[] {
  const seen = new Set<string>();
  const deduped: string[] = [];

  for (const chunk of chunks) {
    if (seen.has(chunk)) {
      continue;
    }
    seen.add(chunk);
    deduped.push(chunk);
  }

  return deduped;
}
