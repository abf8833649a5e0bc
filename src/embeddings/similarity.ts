/**
 * Compute cosine similarity between two vectors.
 * Returns 0 for vectors of different length or zero magnitude.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;

  return dot / denom;
}

/** Serialize a vector for a BLOB column. */
export function vectorToBuffer(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/** Read a vector back from a BLOB column. Copies, so alignment never matters. */
export function bufferToVector(buffer: Buffer): Float32Array {
  return new Float32Array(new Uint8Array(buffer).buffer);
}

export interface Scored<T> {
  item: T;
  distance: number;
}

/**
 * Rank items by cosine distance (1 - similarity) to the query, closest first.
 * Items without a vector are left out.
 */
export function rankByEmbedding<T>(
  query: Float32Array,
  items: readonly T[],
  vectorOf: (item: T) => Float32Array | null,
  limit: number,
): Scored<T>[] {
  const scored: Scored<T>[] = [];

  for (const item of items) {
    const vector = vectorOf(item);
    if (!vector) continue;
    scored.push({ item, distance: 1 - cosineSimilarity(query, vector) });
  }

  scored.sort((a, b) => a.distance - b.distance);
  return scored.slice(0, limit);
}
