/**
 * Catalog Store
 *
 * Canonical products keyed by product id. Three backends share one contract:
 *
 * - `InMemoryCatalogStore`: a Map, for tests and throwaway runs
 * - `FileCatalogStore`: the in-memory map backed by an append-only
 *   JSON-lines log (`catalog.jsonl`), replayed on start
 * - `RedisCatalogStore`: one key per product (`{prefix}product:{id}`)
 *
 * Every upsert writes a whole product in one operation, and values are copied
 * in and out, so callers never observe or cause a partial write.
 *
 * @module services/catalog-store
 */

import type { CanonicalProduct } from '../types/catalog';
import { canonicalProductSchema } from './store-schemas';
import { DEFAULT_COMPACTION_RATIO, JsonLinesLog, needsCompaction, type FileStoreOptions } from './json-lines-log';
import type { RedisKeyValueClient } from './redis-client';
import { logger } from '../utils/logger';

export interface CatalogStore {
  /** Replace any product with the same id. */
  upsert(product: CanonicalProduct): Promise<void>;
  /** The product, or null when the id is unknown. */
  get(productId: string): Promise<CanonicalProduct | null>;
  /**
   * Every product. Each iteration starts over; order is stable for one store
   * instance.
   */
  all(): AsyncIterable<CanonicalProduct>;
  size(): Promise<number>;
}

const copy = (product: CanonicalProduct): CanonicalProduct => structuredClone(product);

export class InMemoryCatalogStore implements CatalogStore {
  protected readonly entries = new Map<string, CanonicalProduct>();

  async upsert(product: CanonicalProduct): Promise<void> {
    this.entries.set(product.productId, copy(product));
  }

  async get(productId: string): Promise<CanonicalProduct | null> {
    await this.ready();
    const product = this.entries.get(productId);
    return product ? copy(product) : null;
  }

  all(): AsyncIterable<CanonicalProduct> {
    return {
      [Symbol.asyncIterator]: () => this.iterate()
    };
  }

  async size(): Promise<number> {
    await this.ready();
    return this.entries.size;
  }

  protected async ready(): Promise<void> {
    // Nothing to load
  }

  private async *iterate(): AsyncGenerator<CanonicalProduct> {
    await this.ready();
    for (const product of [...this.entries.values()]) {
      yield copy(product);
    }
  }
}

export class FileCatalogStore extends InMemoryCatalogStore {
  private readonly log: JsonLinesLog<CanonicalProduct>;
  private readonly compactionRatio: number;
  private loading: Promise<void> | null = null;

  constructor(filePath: string, options: FileStoreOptions = {}) {
    super();
    this.log = new JsonLinesLog(filePath, canonicalProductSchema);
    this.compactionRatio = options.compactionRatio ?? DEFAULT_COMPACTION_RATIO;
  }

  override async upsert(product: CanonicalProduct): Promise<void> {
    await this.ready();
    const stored = copy(product);
    // Log first: the in-memory view only changes once the line is durable
    await this.log.append(stored);
    this.entries.set(stored.productId, stored);
  }

  protected override ready(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const { entries, invalidLines } = await this.log.readAll();
    for (const product of entries) {
      this.entries.set(product.productId, product);
    }
    const logLines = entries.length + invalidLines;
    logger.info('Catalog loaded', { path: this.log.path, products: this.entries.size, logLines });
    if (needsCompaction(logLines, this.entries.size, this.compactionRatio)) {
      await this.rewriteLog();
    }
  }

  private async rewriteLog(): Promise<void> {
    await this.log.rewrite(this.entries.values());
    logger.info('Catalog log compacted', { path: this.log.path, products: this.entries.size });
  }
}

const REDIS_BATCH_SIZE = 100;

export class RedisCatalogStore implements CatalogStore {
  private readonly keyPrefix: string;

  constructor(private readonly client: RedisKeyValueClient, keyPrefix = 'shelfwise:') {
    this.keyPrefix = `${keyPrefix}product:`;
  }

  async upsert(product: CanonicalProduct): Promise<void> {
    await this.client.set(this.keyFor(product.productId), JSON.stringify(product));
  }

  async get(productId: string): Promise<CanonicalProduct | null> {
    const data = await this.client.get(this.keyFor(productId));
    return data ? this.decode(data, productId) : null;
  }

  all(): AsyncIterable<CanonicalProduct> {
    return {
      [Symbol.asyncIterator]: () => this.iterate()
    };
  }

  async size(): Promise<number> {
    const keys = await this.client.keys(`${this.keyPrefix}*`);
    return keys.length;
  }

  private keyFor(productId: string): string {
    return `${this.keyPrefix}${productId}`;
  }

  private async *iterate(): AsyncGenerator<CanonicalProduct> {
    const keys = (await this.client.keys(`${this.keyPrefix}*`)).sort();
    for (let i = 0; i < keys.length; i += REDIS_BATCH_SIZE) {
      const batch = keys.slice(i, i + REDIS_BATCH_SIZE);
      const values = await this.client.mGet(batch);
      for (let j = 0; j < values.length; j++) {
        const value = values[j];
        // Deleted between KEYS and MGET
        if (value === null) {
          continue;
        }
        const product = this.decode(value, batch[j]);
        if (product) {
          yield product;
        }
      }
    }
  }

  private decode(data: string, key: string): CanonicalProduct | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.warn('Unreadable catalog entry in Redis', { key, error: error instanceof Error ? error.message : String(error) });
      return null;
    }
    const result = canonicalProductSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn('Invalid catalog entry in Redis', { key, issues: result.error.issues.length });
      return null;
    }
    return result.data;
  }
}
