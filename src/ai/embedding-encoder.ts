/**
 * Embedding Encoder
 *
 * Sits in front of an EmbeddingProvider and owns everything the provider
 * should not care about: input checks, the per-model LRU cache, the per-call
 * timeout, retries with backoff and output validation.
 *
 * @module ai/embedding-encoder
 */

import { LRUCache } from 'lru-cache';
import { EncodingError, isRetryableEncodingError } from '../core/errors';
import { hashText } from '../core/fingerprint';
import type { CanonicalProduct } from '../types/catalog';
import { settleInChunks } from '../utils/batch';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import type { EmbeddingProvider } from './embedding-provider';

export interface EncoderOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  cacheMaxEntries?: number;
  /** Provider calls in flight at once during `encodeBatch`. */
  concurrency?: number;
}

export interface EncoderStats {
  modelVersion: string;
  cacheSize: number;
  hits: number;
  misses: number;
}

/**
 * Text embedded for a product.
 */
export const productText = (product: Pick<CanonicalProduct, 'name' | 'description'>): string =>
  [product.name, product.description].filter((part) => part.trim().length > 0).join('\n');

export class EmbeddingEncoder {
  private readonly cache: LRUCache<string, number[]>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly concurrency: number;
  private cachedModelVersion: string;
  private hits = 0;
  private misses = 0;

  constructor(private readonly provider: EmbeddingProvider, options: EncoderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 200;
    this.concurrency = options.concurrency ?? 8;
    this.cache = new LRUCache<string, number[]>({ max: options.cacheMaxEntries ?? 2048 });
    this.cachedModelVersion = provider.modelVersion;
  }

  get modelVersion(): string {
    return this.provider.modelVersion;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  /**
   * Embed one text.
   *
   * @throws EncodingError `empty_text` for missing or blank input (never
   * retried); `timeout`, `provider_error` or `invalid_vector` when the
   * provider fails after retries.
   */
  async encode(input: string | null | undefined): Promise<number[]> {
    if (typeof input !== 'string' || input.trim().length === 0) {
      throw new EncodingError('Cannot embed empty text', 'empty_text', false);
    }
    const text = input;

    this.syncModelVersion();
    const key = `${this.cachedModelVersion}:${hashText(text)}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.hits += 1;
      return [...cached];
    }
    this.misses += 1;

    const vector = await withRetry(() => this.callProvider(text), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      retryOn: isRetryableEncodingError,
      operation: 'embed'
    });

    this.cache.set(key, vector);
    return [...vector];
  }

  /**
   * Embed many texts with bounded concurrency. One outcome per input text, in
   * input order; a failed text does not fail the batch.
   */
  encodeBatch(texts: readonly string[]): Promise<PromiseSettledResult<number[]>[]> {
    return settleInChunks(texts, this.concurrency, (text) => this.encode(text));
  }

  stats(): EncoderStats {
    return {
      modelVersion: this.provider.modelVersion,
      cacheSize: this.cache.size,
      hits: this.hits,
      misses: this.misses
    };
  }

  private syncModelVersion(): void {
    if (this.provider.modelVersion !== this.cachedModelVersion) {
      logger.info('Embedding model changed, clearing encoder cache', {
        previous: this.cachedModelVersion,
        current: this.provider.modelVersion,
        evicted: this.cache.size
      });
      this.cache.clear();
      this.cachedModelVersion = this.provider.modelVersion;
    }
  }

  private async callProvider(text: string): Promise<number[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new EncodingError(`Embedding timed out after ${this.timeoutMs}ms`, 'timeout', true));
      }, this.timeoutMs);
    });

    let vectors: number[][];
    try {
      vectors = await Promise.race([this.provider.embed([text], controller.signal), timeout]);
    } catch (error) {
      if (error instanceof EncodingError) {
        throw error;
      }
      throw new EncodingError(
        `Embedding provider failed: ${error instanceof Error ? error.message : String(error)}`,
        'provider_error',
        true,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
    }

    return this.validate(vectors);
  }

  private validate(vectors: number[][]): number[] {
    if (vectors.length !== 1) {
      throw new EncodingError(`Expected 1 vector, provider returned ${vectors.length}`, 'invalid_vector', false);
    }
    const [vector] = vectors;
    if (vector.length !== this.provider.dimensions) {
      throw new EncodingError(
        `Expected ${this.provider.dimensions} dimensions, provider returned ${vector.length}`,
        'invalid_vector',
        false
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new EncodingError('Provider returned a vector with non-finite values', 'invalid_vector', false);
    }
    return vector;
  }
}
