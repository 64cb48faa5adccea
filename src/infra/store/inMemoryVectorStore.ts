import { IndexPoint, RetrievedChunk } from "../../domain/types.js";
import { VectorSearchInput, VectorStore } from "../../domain/vectorStore.js";
import { cosineSimilarity, normalizeSimilarity } from "../../utils/vector.js";

/**
 * Process-local vector store. Every operation runs to completion inside one
 * event-loop turn, so a point is either fully present or fully gone for any
 * concurrent search.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly backend = "memory" as const;

  private pointsById = new Map<string, IndexPoint>();

  private idsByQueryId = new Map<string, Set<string>>();

  async insertPoints(points: IndexPoint[]): Promise<void> {
    for (const point of points) {
      if (this.pointsById.has(point.id)) {
        continue;
      }
      this.pointsById.set(point.id, { ...point, vector: [...point.vector] });

      let ids = this.idsByQueryId.get(point.queryId);
      if (!ids) {
        ids = new Set<string>();
        this.idsByQueryId.set(point.queryId, ids);
      }
      ids.add(point.id);
    }
  }

  async search(input: VectorSearchInput): Promise<RetrievedChunk[]> {
    const ids = this.idsByQueryId.get(input.queryId);
    if (!ids || input.topK <= 0) {
      return [];
    }

    const candidates: RetrievedChunk[] = [];
    for (const id of ids) {
      const point = this.pointsById.get(id);
      if (!point) {
        continue;
      }
      candidates.push({
        chunk: {
          id: point.id,
          text: point.text,
          sourceUrl: point.sourceUrl,
          title: point.title,
          queryId: point.queryId,
          createdAt: point.createdAt,
        },
        score: normalizeSimilarity(cosineSimilarity(input.vector, point.vector)),
      });
    }

    return candidates.sort((a, b) => b.score - a.score).slice(0, input.topK);
  }

  async count(): Promise<number> {
    return this.pointsById.size;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    let deleted = 0;

    for (const point of [...this.pointsById.values()]) {
      if (point.createdAt.getTime() >= cutoffMs) {
        continue;
      }
      this.removePoint(point);
      deleted += 1;
    }

    return deleted;
  }

  async clear(): Promise<number> {
    const cleared = this.pointsById.size;
    this.pointsById.clear();
    this.idsByQueryId.clear();
    return cleared;
  }

  private removePoint(point: IndexPoint): void {
    this.pointsById.delete(point.id);
    const ids = this.idsByQueryId.get(point.queryId);
    if (!ids) {
      return;
    }
    ids.delete(point.id);
    if (ids.size === 0) {
      this.idsByQueryId.delete(point.queryId);
    }
  }
}
