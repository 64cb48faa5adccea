import { Pool } from "pg";
import { describe, expect, it } from "vitest";
import { PgVectorStore, buildRunSearchQuery } from "../src/infra/store/pgVectorStore.js";

describe("PgVectorStore", () => {
  it("filters to the run before ranking by distance", () => {
    const sql = buildRunSearchQuery("web_chunks");
    const filterAt = sql.indexOf("WHERE query_id = $2");
    const rankAt = sql.indexOf("ORDER BY embedding <=> $1::vector");

    expect(sql.startsWith("WITH run AS MATERIALIZED (")).toBe(true);
    expect(filterAt).toBeGreaterThan(0);
    expect(filterAt).toBeLessThan(sql.indexOf(")\nSELECT"));
    expect(sql.slice(rankAt)).toBe("ORDER BY embedding <=> $1::vector\nLIMIT $3");
    expect(sql).toContain("\nFROM run\n");
  });

  it("rejects a collection name that is not a plain identifier", () => {
    expect(() => new PgVectorStore(new Pool(), "chunks; DROP TABLE x", 768)).toThrow(
      "Invalid vector collection name: chunks; DROP TABLE x",
    );
  });
});
