import { describe, expect, it } from "vitest";
import { collapseWhitespace, normalizeText, tidyLines, toExcerpt } from "../src/utils/text.js";
import { cosineSimilarity, normalizeSimilarity, toVectorLiteral } from "../src/utils/vector.js";

describe("text utils", () => {
  it("normalizes line endings and tabs", () => {
    expect(normalizeText("\ta\r\nb\rc  ")).toBe("a\nb\nc");
  });

  it("collapses whitespace runs", () => {
    expect(collapseWhitespace("  one\n\n two\tthree ")).toBe("one two three");
  });

  it("cuts long excerpts with an ellipsis", () => {
    expect(toExcerpt("abcdefghij", 10)).toBe("abcdefghij");
    expect(toExcerpt("abcdefghijk", 10)).toBe("abcdefg...");
  });

  it("drops blank lines and trims the rest", () => {
    expect(tidyLines("  Title \n\n\n  body   text\n")).toBe("Title\nbody text");
  });
});

describe("vector utils", () => {
  it("computes cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([1, 0], [0, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });

  it("maps cosine onto the unit interval", () => {
    expect(normalizeSimilarity(-1)).toBe(0);
    expect(normalizeSimilarity(0)).toBe(0.5);
    expect(normalizeSimilarity(1)).toBe(1);
  });

  it("formats a pgvector literal", () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe("[0.5,-1,2]");
  });
});
