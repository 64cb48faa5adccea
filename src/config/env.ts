import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).optional();
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  SEARX_URL: z.string().url().default("http://127.0.0.1:8080/search"),
  SEARX_LANGUAGE: z.string().default("en"),
  SEARCH_RESULT_LIMIT: positiveInt.max(20).default(6),
  SEARCH_TIMEOUT_MS: positiveInt.default(15_000),
  SEARCH_CONNECT_TIMEOUT_MS: positiveInt.default(3_000),
  CRAWL_URL: z.string().url().default("http://127.0.0.1:11235/md"),
  CRAWL_CONCURRENCY: positiveInt.max(64).default(5),
  CRAWL_TIMEOUT_MS: positiveInt.default(30_000),
  CRAWL_CONNECT_TIMEOUT_MS: positiveInt.default(5_000),
  CRAWL_MAX_CONNECTIONS: positiveInt.default(10),
  CRAWL_TOP_N: positiveInt.max(20).default(5),
  CHUNK_MAX_CHARS: positiveInt.min(50).default(1_000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(150),
  RETRIEVAL_TOP_K: positiveInt.max(50).default(8),
  INDEX_EVICTION_THRESHOLD: positiveInt.default(10_000),
  INDEX_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
  ENABLE_PGVECTOR: booleanFlag,
  DATABASE_URL: z.string().optional(),
  VECTOR_COLLECTION: z
    .string()
    .regex(/^[a-z_][a-z0-9_]{0,62}$/, "VECTOR_COLLECTION must be a lowercase SQL identifier.")
    .default("web_chunks"),
  VECTOR_DIMENSION: positiveInt.optional(),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  EMBEDDING_CONCURRENCY: positiveInt.max(32).default(4),
  EMBEDDING_BATCH_SIZE: positiveInt.max(512).default(32),
  EMBEDDING_TIMEOUT_MS: positiveInt.default(30_000),
  ANSWER_MODE: z.enum(["extractive", "openai", "ollama"]).default("extractive"),
  LLM_TIMEOUT_MS: positiveInt.default(60_000),
  SUMMARY_CONTEXT_MAX_CHARS: positiveInt.min(500).default(12_000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: positiveInt.default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type EmbeddingProvider = "openai" | "ollama";

/** Output sizes of the default embedding models, `text-embedding-3-small` and `nomic-embed-text`. */
const DEFAULT_VECTOR_DIMENSIONS: Record<EmbeddingProvider, number> = {
  openai: 1536,
  ollama: 768,
};
export type AnswerMode = "extractive" | "openai" | "ollama";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  searxUrl: string;
  searxLanguage: string;
  searchResultLimit: number;
  searchTimeoutMs: number;
  searchConnectTimeoutMs: number;
  crawlUrl: string;
  crawlConcurrency: number;
  crawlTimeoutMs: number;
  crawlConnectTimeoutMs: number;
  crawlMaxConnections: number;
  crawlTopN: number;
  chunkMaxChars: number;
  chunkOverlap: number;
  retrievalTopK: number;
  evictionThreshold: number;
  maxAgeHours: number;
  enablePgvector: boolean;
  databaseUrl: string | null;
  vectorCollection: string;
  vectorDimension: number;
  embeddingProvider: EmbeddingProvider;
  embeddingConcurrency: number;
  embeddingBatchSize: number;
  embeddingTimeoutMs: number;
  answerMode: AnswerMode;
  llmTimeoutMs: number;
  summaryContextMaxChars: number;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";
  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_MAX_CHARS) {
    throw new Error("CHUNK_OVERLAP must be smaller than CHUNK_MAX_CHARS.");
  }

  const embeddingProvider = parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "ollama");

  if ((embeddingProvider === "openai" || parsed.ANSWER_MODE === "openai") && !openaiApiKey) {
    throw new Error("OpenAI embeddings or answers require OPENAI_API_KEY.");
  }

  return {
    searxUrl: parsed.SEARX_URL,
    searxLanguage: parsed.SEARX_LANGUAGE,
    searchResultLimit: parsed.SEARCH_RESULT_LIMIT,
    searchTimeoutMs: parsed.SEARCH_TIMEOUT_MS,
    searchConnectTimeoutMs: parsed.SEARCH_CONNECT_TIMEOUT_MS,
    crawlUrl: parsed.CRAWL_URL,
    crawlConcurrency: parsed.CRAWL_CONCURRENCY,
    crawlTimeoutMs: parsed.CRAWL_TIMEOUT_MS,
    crawlConnectTimeoutMs: parsed.CRAWL_CONNECT_TIMEOUT_MS,
    crawlMaxConnections: parsed.CRAWL_MAX_CONNECTIONS,
    crawlTopN: parsed.CRAWL_TOP_N,
    chunkMaxChars: parsed.CHUNK_MAX_CHARS,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    retrievalTopK: parsed.RETRIEVAL_TOP_K,
    evictionThreshold: parsed.INDEX_EVICTION_THRESHOLD,
    maxAgeHours: parsed.INDEX_MAX_AGE_HOURS,
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorCollection: parsed.VECTOR_COLLECTION,
    vectorDimension: parsed.VECTOR_DIMENSION ?? DEFAULT_VECTOR_DIMENSIONS[embeddingProvider],
    embeddingProvider,
    embeddingConcurrency: parsed.EMBEDDING_CONCURRENCY,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    answerMode: parsed.ANSWER_MODE,
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    summaryContextMaxChars: parsed.SUMMARY_CONTEXT_MAX_CHARS,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
