import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import { PipelineError, describeError } from "../domain/errors.js";
import { Chunk, IndexPoint, RetrievedContext } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { Embedder } from "../infra/ai/types.js";

export interface VectorIndexOptions {
  embeddingConcurrency: number;
  embeddingBatchSize: number;
  now?: () => Date;
  createPointId?: () => string;
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Embeds chunks and owns the points committed to the backing store. The
 * embedding pool is shared by every request that goes through this index.
 */
export class VectorIndex {
  private readonly embeddingPool: Limit;

  private readonly batchSize: number;

  private readonly now: () => Date;

  private readonly createPointId: () => string;

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder,
    options: VectorIndexOptions,
  ) {
    this.embeddingPool = pLimit(Math.max(1, Math.floor(options.embeddingConcurrency)));
    this.batchSize = Math.max(1, Math.floor(options.embeddingBatchSize));
    this.now = options.now ?? (() => new Date());
    this.createPointId = options.createPointId ?? randomUUID;
  }

  get backend(): VectorStore["backend"] {
    return this.store.backend;
  }

  async upsert(chunks: Chunk[]): Promise<number> {
    if (chunks.length === 0) {
      return 0;
    }

    const vectors = await this.embedInBatches(chunks.map((chunk) => chunk.text));
    const points: IndexPoint[] = chunks.map((chunk, index) => ({
      ...chunk,
      id: this.createPointId(),
      vector: vectors[index],
    }));

    await this.withStore("insert points", () => this.store.insertPoints(points));
    return points.length;
  }

  async embedQuery(text: string): Promise<number[]> {
    try {
      return await this.embeddingPool(() => this.embedder.embedQuery(text));
    } catch (error) {
      throw new PipelineError(
        "EmbeddingUnavailable",
        `Query embedding failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async search(vector: number[], queryId: string, k: number): Promise<RetrievedContext> {
    return this.withStore("search", () =>
      this.store.search({ vector, queryId, topK: k }),
    );
  }

  async count(): Promise<number> {
    return this.withStore("count", () => this.store.count());
  }

  async evictOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - maxAgeMs);
    return this.withStore("evict", () => this.store.deleteOlderThan(cutoff));
  }

  async reset(): Promise<number> {
    return this.withStore("reset", () => this.store.clear());
  }

  private async embedInBatches(texts: string[]): Promise<number[][]> {
    const batches: string[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      batches.push(texts.slice(start, start + this.batchSize));
    }

    let embedded: number[][][];
    try {
      embedded = await Promise.all(
        batches.map((batch) => this.embeddingPool(() => this.embedder.embedTexts(batch))),
      );
    } catch (error) {
      throw new PipelineError(
        "EmbeddingUnavailable",
        `Chunk embedding failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    const vectors = embedded.flat();
    if (vectors.length !== texts.length) {
      throw new PipelineError(
        "EmbeddingUnavailable",
        `Embedding count mismatch: expected ${texts.length}, received ${vectors.length}.`,
      );
    }
    return vectors;
  }

  private async withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new PipelineError(
        "IndexUnavailable",
        `Vector store ${operation} failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
