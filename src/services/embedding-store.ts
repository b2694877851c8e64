/**
 * Embedding Store
 *
 * Persisted EmbeddingVector table keyed by (product id, model version). The
 * vector index is rebuilt from it on start, so vectors are only recomputed
 * when a product's text or the model changes.
 *
 * @module services/embedding-store
 */

import type { EmbeddingVector } from '../types/catalog';
import { embeddingVectorSchema } from './store-schemas';
import { DEFAULT_COMPACTION_RATIO, JsonLinesLog, needsCompaction, type FileStoreOptions } from './json-lines-log';
import type { RedisKeyValueClient } from './redis-client';
import { logger } from '../utils/logger';

export interface EmbeddingStore {
  get(productId: string, modelVersion: string): Promise<EmbeddingVector | null>;
  /** Insert or replace the vector for (productId, modelVersion). */
  put(entry: EmbeddingVector): Promise<void>;
  /** Every stored vector for one model version. */
  list(modelVersion: string): AsyncIterable<EmbeddingVector>;
  size(): Promise<number>;
}

const keyOf = (productId: string, modelVersion: string): string => `${modelVersion}|${productId}`;

const copy = (entry: EmbeddingVector): EmbeddingVector => ({ ...entry, vector: [...entry.vector] });

export class InMemoryEmbeddingStore implements EmbeddingStore {
  protected readonly entries = new Map<string, EmbeddingVector>();

  async get(productId: string, modelVersion: string): Promise<EmbeddingVector | null> {
    await this.ready();
    const entry = this.entries.get(keyOf(productId, modelVersion));
    return entry ? copy(entry) : null;
  }

  async put(entry: EmbeddingVector): Promise<void> {
    this.entries.set(keyOf(entry.productId, entry.modelVersion), copy(entry));
  }

  list(modelVersion: string): AsyncIterable<EmbeddingVector> {
    return {
      [Symbol.asyncIterator]: () => this.iterate(modelVersion)
    };
  }

  async size(): Promise<number> {
    await this.ready();
    return this.entries.size;
  }

  protected async ready(): Promise<void> {
    // Nothing to load
  }

  private async *iterate(modelVersion: string): AsyncGenerator<EmbeddingVector> {
    await this.ready();
    for (const entry of [...this.entries.values()]) {
      if (entry.modelVersion === modelVersion) {
        yield copy(entry);
      }
    }
  }
}

export class FileEmbeddingStore extends InMemoryEmbeddingStore {
  private readonly log: JsonLinesLog<EmbeddingVector>;
  private readonly compactionRatio: number;
  private loading: Promise<void> | null = null;

  constructor(filePath: string, options: FileStoreOptions = {}) {
    super();
    this.log = new JsonLinesLog(filePath, embeddingVectorSchema);
    this.compactionRatio = options.compactionRatio ?? DEFAULT_COMPACTION_RATIO;
  }

  override async put(entry: EmbeddingVector): Promise<void> {
    await this.ready();
    const stored = copy(entry);
    await this.log.append(stored);
    this.entries.set(keyOf(stored.productId, stored.modelVersion), stored);
  }

  protected override ready(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const { entries, invalidLines } = await this.log.readAll();
    for (const entry of entries) {
      this.entries.set(keyOf(entry.productId, entry.modelVersion), entry);
    }
    const logLines = entries.length + invalidLines;
    logger.info('Embeddings loaded', { path: this.log.path, vectors: this.entries.size, logLines });
    if (needsCompaction(logLines, this.entries.size, this.compactionRatio)) {
      await this.rewriteLog();
    }
  }

  private async rewriteLog(): Promise<void> {
    await this.log.rewrite(this.entries.values());
    logger.info('Embedding log compacted', { path: this.log.path, vectors: this.entries.size });
  }
}

export class RedisEmbeddingStore implements EmbeddingStore {
  private readonly keyPrefix: string;

  constructor(private readonly client: RedisKeyValueClient, keyPrefix = 'shelfwise:') {
    this.keyPrefix = `${keyPrefix}embedding:`;
  }

  async get(productId: string, modelVersion: string): Promise<EmbeddingVector | null> {
    const data = await this.client.get(this.keyFor(productId, modelVersion));
    return data ? this.decode(data) : null;
  }

  async put(entry: EmbeddingVector): Promise<void> {
    await this.client.set(this.keyFor(entry.productId, entry.modelVersion), JSON.stringify(entry));
  }

  list(modelVersion: string): AsyncIterable<EmbeddingVector> {
    return {
      [Symbol.asyncIterator]: () => this.iterate(modelVersion)
    };
  }

  async size(): Promise<number> {
    return (await this.client.keys(`${this.keyPrefix}*`)).length;
  }

  private keyFor(productId: string, modelVersion: string): string {
    return `${this.keyPrefix}${modelVersion}:${productId}`;
  }

  private async *iterate(modelVersion: string): AsyncGenerator<EmbeddingVector> {
    const keys = (await this.client.keys(`${this.keyPrefix}${modelVersion}:*`)).sort();
    if (keys.length === 0) {
      return;
    }
    const values = await this.client.mGet(keys);
    for (const value of values) {
      const entry = value === null ? null : this.decode(value);
      // KEYS globbing can match a longer model version sharing this prefix
      if (entry && entry.modelVersion === modelVersion) {
        yield entry;
      }
    }
  }

  private decode(data: string): EmbeddingVector | null {
    try {
      const result = embeddingVectorSchema.safeParse(JSON.parse(data));
      return result.success ? result.data : null;
    } catch (error) {
      logger.warn('Unreadable embedding entry in Redis', { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}
