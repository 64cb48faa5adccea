import { Pool } from "pg";
import { IndexPoint, RetrievedChunk } from "../../domain/types.js";
import { VectorSearchInput, VectorStore } from "../../domain/vectorStore.js";
import { normalizeSimilarity, toVectorLiteral } from "../../utils/vector.js";

interface PgPointRow {
  id: string;
  query_id: string;
  source_url: string;
  title: string;
  content: string;
  created_at: Date;
  similarity: number;
}

/**
 * Nearest neighbours within one run. The run's rows are materialized before
 * ranking, so the filter never runs after an approximate HNSW scan and every
 * run with `topK` points returns `topK` rows.
 */
export function buildRunSearchQuery(table: string): string {
  return [
    `WITH run AS MATERIALIZED (`,
    `  SELECT id, query_id, source_url, title, content, created_at, embedding`,
    `  FROM ${table}`,
    `  WHERE query_id = $2`,
    `)`,
    `SELECT id, query_id, source_url, title, content, created_at,`,
    `  (1 - (embedding <=> $1::vector)) AS similarity`,
    `FROM run`,
    `ORDER BY embedding <=> $1::vector`,
    `LIMIT $3`,
  ].join("\n");
}

export class PgVectorStore implements VectorStore {
  readonly backend = "pgvector" as const;

  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly table: string,
    private readonly vectorDimension: number,
  ) {
    if (!/^[a-z_][a-z0-9_]{0,62}$/.test(table)) {
      throw new Error(`Invalid vector collection name: ${table}`);
    }
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id UUID PRIMARY KEY,
        query_id TEXT NOT NULL,
        source_url TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_${this.table}_query_id ON ${this.table}(query_id)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_${this.table}_created_at ON ${this.table}(created_at)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_${this.table}_embedding
      ON ${this.table} USING hnsw (embedding vector_cosine_ops)
    `);

    this.initialized = true;
  }

  async insertPoints(points: IndexPoint[]): Promise<void> {
    await this.initialize();
    if (points.length === 0) {
      return;
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      for (const point of points) {
        await client.query(
          `
            INSERT INTO ${this.table} (id, query_id, source_url, title, content, created_at, embedding)
            VALUES ($1, $2, $3, $4, $5, $6, $7::vector)
            ON CONFLICT (id) DO NOTHING
          `,
          [
            point.id,
            point.queryId,
            point.sourceUrl,
            point.title,
            point.text,
            point.createdAt,
            toVectorLiteral(point.vector),
          ],
        );
      }

      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async search(input: VectorSearchInput): Promise<RetrievedChunk[]> {
    await this.initialize();
    if (input.topK <= 0) {
      return [];
    }

    const result = await this.pool.query<PgPointRow>(
      buildRunSearchQuery(this.table),
      [toVectorLiteral(input.vector), input.queryId, input.topK],
    );

    return result.rows.map((row) => ({
      chunk: {
        id: row.id,
        text: row.content,
        sourceUrl: row.source_url,
        title: row.title,
        queryId: row.query_id,
        createdAt: row.created_at,
      },
      score: normalizeSimilarity(Number(row.similarity)),
    }));
  }

  async count(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM ${this.table}`,
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(
      `DELETE FROM ${this.table} WHERE created_at < $1`,
      [cutoff],
    );
    return result.rowCount ?? 0;
  }

  async clear(): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM ${this.table}`);
    return result.rowCount ?? 0;
  }
}
