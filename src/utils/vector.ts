export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Maps a cosine similarity from [-1, 1] onto [0, 1]. */
export function normalizeSimilarity(cosine: number): number {
  const scaled = (cosine + 1) / 2;
  return Math.min(1, Math.max(0, scaled));
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
