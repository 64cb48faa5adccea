export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
}

export type ExtractionFormat = "markdown" | "cleaned_html" | "extracted_content";

export interface CrawledDocument {
  url: string;
  title: string;
  markdown: string;
  format: ExtractionFormat;
}

export type CrawlFailureKind = "timeout" | "error";

export type CrawlOutcome =
  | { ok: true; document: CrawledDocument }
  | { ok: false; url: string; kind: CrawlFailureKind; reason: string };

export interface Chunk {
  text: string;
  sourceUrl: string;
  title: string;
  queryId: string;
  createdAt: Date;
}

export interface IndexPoint extends Chunk {
  id: string;
  vector: number[];
}

export interface IndexedChunk extends Chunk {
  id: string;
}

export interface RetrievedChunk {
  chunk: IndexedChunk;
  score: number;
}

export type RetrievedContext = RetrievedChunk[];

export interface Answer {
  summary: string;
  citedSources: string[];
}
