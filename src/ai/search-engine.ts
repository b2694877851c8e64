/**
 * Search Engine
 *
 * Query text → encoder → vector index → catalog lookup → filters → ranked
 * hits. The engine never mutates the index or the catalog.
 *
 * Each query moves through `idle → embedding → ranking → done`, or to
 * `failed` from either working phase. Transitions are checked and reported to
 * an optional listener.
 *
 * @module ai/search-engine
 */

import type { CatalogStore } from '../services/catalog-store';
import type { CanonicalProduct, SearchFilters, SearchHit } from '../types/catalog';
import { logger, startSpan } from '../utils/logger';
import type { EmbeddingEncoder } from './embedding-encoder';
import type { ScoredProduct, VectorIndex } from './vector-index';

export type QueryPhase = 'idle' | 'embedding' | 'ranking' | 'done' | 'failed';

export interface PhaseChange {
  from: QueryPhase;
  to: QueryPhase;
}

export interface QueryOptions {
  /** Drop hits scoring below this value. */
  minScore?: number;
  onPhase?: (change: PhaseChange) => void;
}

export interface SearchEngineOptions {
  /** Candidates fetched per requested result, before filtering (3-10). */
  overfetch?: number;
}

const TRANSITIONS: Record<QueryPhase, readonly QueryPhase[]> = {
  idle: ['embedding'],
  embedding: ['ranking', 'failed'],
  ranking: ['done', 'failed'],
  done: [],
  failed: []
};

export const MIN_OVERFETCH = 3;
export const MAX_OVERFETCH = 10;

export const clampOverfetch = (value: number): number =>
  Math.min(MAX_OVERFETCH, Math.max(MIN_OVERFETCH, Math.floor(value)));

class QueryLifecycle {
  private current: QueryPhase = 'idle';

  constructor(private readonly listener?: (change: PhaseChange) => void) {}

  get phase(): QueryPhase {
    return this.current;
  }

  moveTo(next: QueryPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid search phase transition: ${this.current} -> ${next}`);
    }
    const change = { from: this.current, to: next };
    this.current = next;
    this.listener?.(change);
  }
}

export const matchesFilters = (product: CanonicalProduct, filters: SearchFilters): boolean => {
  if (filters.category !== undefined && product.category.toLowerCase() !== filters.category.trim().toLowerCase()) {
    return false;
  }
  if (filters.minPrice !== undefined && (product.price === undefined || product.price < filters.minPrice)) {
    return false;
  }
  if (filters.maxPrice !== undefined && (product.price === undefined || product.price > filters.maxPrice)) {
    return false;
  }
  return true;
};

export class SearchEngine {
  private readonly overfetch: number;

  constructor(
    private readonly encoder: EmbeddingEncoder,
    private readonly index: VectorIndex,
    private readonly catalog: CatalogStore,
    options: SearchEngineOptions = {}
  ) {
    this.overfetch = clampOverfetch(options.overfetch ?? 5);
  }

  /**
   * Up to `k` products matching `text` and `filters`, best first. Returns
   * fewer hits (possibly none) when fewer candidates survive the filters.
   *
   * @throws EncodingError when the query cannot be embedded (including empty
   * text); IndexCorruptionError when the query vector does not fit the index.
   */
  async query(text: string, k: number, filters: SearchFilters = {}, options: QueryOptions = {}): Promise<SearchHit[]> {
    const lifecycle = new QueryLifecycle(options.onPhase);
    const span = startSpan('search.query');

    lifecycle.moveTo('embedding');
    let vector: number[];
    try {
      vector = await this.encoder.encode(text);
    } catch (error) {
      lifecycle.moveTo('failed');
      span.end({ phase: 'embedding', failed: true });
      throw error;
    }

    lifecycle.moveTo('ranking');
    try {
      const hits = await this.rank(vector, k, filters, options.minScore);
      lifecycle.moveTo('done');
      span.end({ k, hits: hits.length });
      return hits;
    } catch (error) {
      lifecycle.moveTo('failed');
      span.end({ phase: 'ranking', failed: true });
      throw error;
    }
  }

  /**
   * Products closest to a stored product, excluding the product itself. An
   * unknown or unindexed id yields no hits.
   */
  async similarTo(productId: string, k: number, filters: SearchFilters = {}): Promise<SearchHit[]> {
    const vector = this.index.get(productId);
    if (!vector) {
      logger.debug('Similar-product lookup for unindexed product', { productId });
      return [];
    }
    return this.rank(vector, k, filters, undefined, productId);
  }

  /**
   * Run several queries with the same `k` and filters. Repeated texts are
   * answered once.
   */
  async queryBatch(texts: readonly string[], k: number, filters: SearchFilters = {}): Promise<Map<string, SearchHit[]>> {
    const results = new Map<string, SearchHit[]>();
    for (const text of texts) {
      if (!results.has(text)) {
        results.set(text, await this.query(text, k, filters));
      }
    }
    return results;
  }

  private async rank(
    vector: number[],
    k: number,
    filters: SearchFilters,
    minScore = -Infinity,
    excludeId?: string
  ): Promise<SearchHit[]> {
    if (k <= 0) {
      return [];
    }

    const wanted = Math.floor(k);
    const fetchCount = (wanted + (excludeId === undefined ? 0 : 1)) * this.overfetch;
    const candidates = this.index.search(vector, fetchCount);
    const hits: SearchHit[] = [];

    for (const candidate of candidates) {
      if (hits.length >= wanted) {
        break;
      }
      if (candidate.productId === excludeId || candidate.score < minScore) {
        continue;
      }
      const product = await this.catalog.get(candidate.productId);
      if (!product) {
        logger.warn('Indexed product missing from catalog', { productId: candidate.productId });
        continue;
      }
      if (matchesFilters(product, filters)) {
        hits.push(toHit(product, candidate, hits.length + 1));
      }
    }

    return hits;
  }
}

const toHit = (product: CanonicalProduct, candidate: ScoredProduct, rank: number): SearchHit => ({
  productId: product.productId,
  name: product.name,
  price: product.price ?? null,
  category: product.category,
  score: candidate.score,
  rank
});
