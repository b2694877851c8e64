/**
 * Exact k-nearest-neighbour index over product vectors, scored by cosine
 * similarity.
 *
 * @module ai/vector-index
 */

import { IndexCorruptionError } from '../core/errors';

export interface ScoredProduct {
  productId: string;
  score: number;
}

export class VectorIndex {
  private readonly entries = new Map<string, number[]>();
  private dims: number | null;

  /**
   * @param dimensions Fixed vector length. When omitted, the first vector
   * added sets it.
   */
  constructor(dimensions?: number) {
    this.dims = dimensions ?? null;
  }

  get dimensions(): number | null {
    return this.dims;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Insert or overwrite the vector for `productId`.
   *
   * @throws IndexCorruptionError on a length mismatch or non-finite values;
   * the index is left unchanged.
   */
  add(productId: string, vector: readonly number[]): void {
    const expected = this.dims ?? vector.length;
    if (vector.length !== expected || vector.length === 0) {
      throw new IndexCorruptionError(
        `Vector for ${productId} has ${vector.length} dimensions, index expects ${expected}`,
        expected,
        vector.length,
        productId
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new IndexCorruptionError(`Vector for ${productId} has non-finite values`, expected, vector.length, productId);
    }

    this.dims = expected;
    this.entries.set(productId, [...vector]);
  }

  remove(productId: string): boolean {
    return this.entries.delete(productId);
  }

  has(productId: string): boolean {
    return this.entries.has(productId);
  }

  get(productId: string): number[] | null {
    const vector = this.entries.get(productId);
    return vector ? [...vector] : null;
  }

  /**
   * Up to `k` products by descending cosine similarity; equal scores are
   * ordered by ascending product id.
   *
   * @throws IndexCorruptionError when the query length differs from the
   * dimension of a non-empty index.
   */
  search(query: readonly number[], k: number): ScoredProduct[] {
    if (this.entries.size === 0 || k <= 0) {
      return [];
    }
    if (query.length !== this.dims) {
      const expected = this.dims ?? query.length;
      throw new IndexCorruptionError(
        `Query has ${query.length} dimensions, index expects ${expected}`,
        expected,
        query.length
      );
    }

    const queryNorm = norm(query);
    const scored: ScoredProduct[] = [];
    for (const [productId, vector] of this.entries) {
      scored.push({ productId, score: cosineSimilarity(query, queryNorm, vector) });
    }

    scored.sort(compareScored);
    return scored.slice(0, Math.floor(k));
  }

  /**
   * Take over every vector of `source` in one synchronous step, so a search
   * sees either the old contents or the new ones. `source` is left empty.
   */
  replaceWith(source: VectorIndex): void {
    if (source === this) {
      return;
    }
    this.entries.clear();
    for (const [productId, vector] of source.entries) {
      this.entries.set(productId, vector);
    }
    this.dims = source.dims;
    source.entries.clear();
  }
}

const compareScored = (a: ScoredProduct, b: ScoredProduct): number => {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.productId === b.productId) {
    return 0;
  }
  return a.productId < b.productId ? -1 : 1;
};

const norm = (vector: readonly number[]): number => {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
};

// Zero vectors score 0 against everything
const cosineSimilarity = (query: readonly number[], queryNorm: number, vector: readonly number[]): number => {
  let dot = 0;
  let normB = 0;
  for (let i = 0; i < vector.length; i += 1) {
    dot += query[i] * vector[i];
    normB += vector[i] * vector[i];
  }
  if (queryNorm === 0 || normB === 0) {
    return 0;
  }
  return dot / (queryNorm * Math.sqrt(normB));
};
