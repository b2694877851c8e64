export interface EmbeddingProvider {
  /** Identifies the model; vectors from different versions never mix. */
  readonly modelVersion: string;
  readonly dimensions: number;
  /** One vector per input text, in input order. */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

const STOP_WORDS = new Set([
  'de', 'la', 'le', 'les', 'et', 'en', 'au', 'aux', 'du', 'des', 'un', 'une', 'pour', 'avec', 'sur', 'par',
  'the', 'and', 'of', 'for', 'with', 'in', 'on', 'to'
]);

/**
 * Lower-cased, accent-free word tokens of two characters or more.
 */
export const tokenize = (text: string): string[] =>
  (text
    .normalize('NFD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .match(/[\p{L}\p{N}]+/gu) ?? []
  ).filter((token) => token.length >= 2 && !STOP_WORDS.has(token));

/**
 * Deterministic embedding provider for tests and offline use.
 * Hashes word tokens into a fixed number of buckets (bag of words) and
 * L2-normalises the result.
 */
export class DeterministicEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly modelVersion: string;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
    this.modelVersion = `hashed-bow-v1/${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedText(text));
  }

  private embedText(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      vector[this.hashToken(token)] += 1;
    }

    const norm = Math.hypot(...vector);
    if (norm === 0) {
      return vector;
    }

    return vector.map((value) => value / norm);
  }

  private hashToken(token: string): number {
    let hash = 0;
    for (let i = 0; i < token.length; i += 1) {
      hash = (hash * 31 + token.charCodeAt(i)) % this.dimensions;
    }
    return Math.abs(hash % this.dimensions);
  }
}
