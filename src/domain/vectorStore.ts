import { IndexPoint, RetrievedChunk } from "./types.js";

export interface VectorSearchInput {
  vector: number[];
  queryId: string;
  topK: number;
}

export interface VectorStore {
  readonly backend: "memory" | "pgvector";
  insertPoints(points: IndexPoint[]): Promise<void>;
  search(input: VectorSearchInput): Promise<RetrievedChunk[]>;
  count(): Promise<number>;
  deleteOlderThan(cutoff: Date): Promise<number>;
  clear(): Promise<number>;
}
