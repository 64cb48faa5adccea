import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export interface VectorStoreBootstrapResult {
  vectorStore: VectorStore;
  close: () => Promise<void>;
}

export async function createVectorStore(
  config: AppConfig,
): Promise<VectorStoreBootstrapResult> {
  if (!config.enablePgvector) {
    return {
      vectorStore: new InMemoryVectorStore(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const vectorStore = new PgVectorStore(
    pool,
    config.vectorCollection,
    config.vectorDimension,
  );
  await vectorStore.initialize();

  return {
    vectorStore,
    close: async () => {
      await pool.end();
    },
  };
}
