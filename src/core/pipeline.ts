/**
 * Catalog Pipeline
 *
 * Drives raw records through normalize → deduplicate → store → embed/index.
 * Each stage finishes for every record before the next one starts, and a
 * failure is local to the record or product that caused it: it is logged,
 * listed in the run summary and the run carries on.
 *
 * @module core/pipeline
 */

import type { CategoryVocabulary } from '../config/categories';
import { productText, type EmbeddingEncoder } from '../ai/embedding-encoder';
import { VectorIndex } from '../ai/vector-index';
import type { CatalogStore } from '../services/catalog-store';
import type { EmbeddingStore } from '../services/embedding-store';
import type {
  EmbeddingVector,
  NormalizedRecord,
  PipelineStage,
  RawRecord,
  RunSummary,
  StageFailure
} from '../types/catalog';
import { settleInChunks } from '../utils/batch';
import { KeyedLock } from '../utils/keyed-lock';
import { errorMeta, generateRequestId, logger, runWithContext, startSpan } from '../utils/logger';
import { absorb, clusterRecords, sameProduct } from './deduplicator';
import { EncodingError, IndexCorruptionError } from './errors';
import { hashText } from './fingerprint';
import { normalizeRecord } from './record-normalizer';

export interface PipelineDependencies {
  vocabulary: CategoryVocabulary;
  catalog: CatalogStore;
  embeddings: EmbeddingStore;
  encoder: EmbeddingEncoder;
  index: VectorIndex;
  /** Records or products processed at once within a stage. */
  concurrency?: number;
  /** Shared with other writers of the same stores. */
  lock?: KeyedLock;
}

type StoreOutcome = 'created' | 'updated' | 'unchanged';

interface EmbeddingPlan {
  productId: string;
  text: string;
  textHash: string;
}

interface EmbedTarget {
  index: VectorIndex;
  /** Vectors of the current model loaded up front; looked up one by one when absent. */
  stored?: Map<string, EmbeddingVector>;
}

export const emptySummary = (): RunSummary => ({
  received: 0,
  normalized: 0,
  rejected: 0,
  products: 0,
  created: 0,
  updated: 0,
  embedded: 0,
  reused: 0,
  skipped: 0,
  failures: []
});

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const failureStage = (error: unknown): PipelineStage => (error instanceof IndexCorruptionError ? 'index' : 'embed');

export class CatalogPipeline {
  private readonly concurrency: number;
  private readonly lock: KeyedLock;
  private rebuilding: Promise<RunSummary> | null = null;
  /** Index being filled by a rebuild; other runs write into it as well. */
  private staging: VectorIndex | null = null;

  constructor(private readonly deps: PipelineDependencies) {
    this.concurrency = deps.concurrency ?? 8;
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * Ingest one batch of scraped records.
   *
   * @param rejectedUpstream Rows the reader already rejected; counted as
   * received and rejected.
   */
  run(records: RawRecord[], rejectedUpstream: StageFailure[] = []): Promise<RunSummary> {
    const runId = generateRequestId();
    return runWithContext({ runId }, () => this.execute(records, rejectedUpstream));
  }

  /**
   * Embedding pass over the whole catalog. Reuses every stored vector whose
   * text hash and model version still match and encodes the rest into a
   * staging index, which then replaces the live index in one step; searches
   * keep the old contents until then. A call while a rebuild is running
   * joins it.
   */
  rebuildIndex(): Promise<RunSummary> {
    if (!this.rebuilding) {
      const runId = generateRequestId();
      this.rebuilding = runWithContext({ runId }, () => this.rebuild()).finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  private async rebuild(): Promise<RunSummary> {
    const span = startSpan('pipeline.rebuild-index', 'info');
    const { catalog, embeddings, encoder, index } = this.deps;
    const staging = new VectorIndex(encoder.dimensions);
    this.staging = staging;

    try {
      const productIds: string[] = [];
      for await (const product of catalog.all()) {
        productIds.push(product.productId);
      }
      const stored = new Map<string, EmbeddingVector>();
      for await (const entry of embeddings.list(encoder.modelVersion)) {
        stored.set(entry.productId, entry);
      }

      const summary = emptySummary();
      summary.products = productIds.length;
      await this.embedProducts(productIds, summary, { index: staging, stored });
      index.replaceWith(staging);
      span.end({ products: summary.products, embedded: summary.embedded, reused: summary.reused, skipped: summary.skipped });
      return summary;
    } finally {
      this.staging = null;
    }
  }

  private async execute(records: RawRecord[], rejectedUpstream: StageFailure[]): Promise<RunSummary> {
    const summary = emptySummary();
    summary.received = records.length + rejectedUpstream.length;
    summary.rejected = rejectedUpstream.length;
    summary.failures.push(...rejectedUpstream);

    const runSpan = startSpan('pipeline.run', 'info');

    const normalized = await this.normalize(records, summary);
    const clusters = this.deduplicate(normalized);
    summary.products = clusters.size;
    const productIds = await this.store(clusters, summary);
    await this.embedProducts(productIds, summary, { index: this.deps.index });

    runSpan.end({
      received: summary.received,
      rejected: summary.rejected,
      products: summary.products,
      created: summary.created,
      updated: summary.updated,
      embedded: summary.embedded,
      skipped: summary.skipped
    });
    return summary;
  }

  private async normalize(records: RawRecord[], summary: RunSummary): Promise<NormalizedRecord[]> {
    const span = startSpan('pipeline.normalize', 'info');
    const outcomes = await settleInChunks(records, this.concurrency, async (raw) =>
      normalizeRecord(raw, this.deps.vocabulary)
    );

    const accepted: NormalizedRecord[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled' && outcome.value.status === 'accepted') {
        accepted.push(outcome.value.record);
        return;
      }

      const subject = records[index].sourceUrl || `record ${index}`;
      const error = outcome.status === 'rejected' ? describe(outcome.reason) : outcome.value.error.message;
      summary.rejected += 1;
      summary.failures.push({ stage: 'normalize', subject, error });
      logger.warn('Record rejected', { stage: 'normalize', subject, error });
    });

    summary.normalized = accepted.length;
    span.end({ accepted: accepted.length, rejected: records.length - accepted.length });
    return accepted;
  }

  private deduplicate(records: NormalizedRecord[]): Map<string, NormalizedRecord[]> {
    const span = startSpan('pipeline.deduplicate', 'info');
    const clusters = clusterRecords(records);
    span.end({ records: records.length, clusters: clusters.size });
    return clusters;
  }

  private async store(clusters: Map<string, NormalizedRecord[]>, summary: RunSummary): Promise<string[]> {
    const span = startSpan('pipeline.store', 'info');
    const entries = [...clusters.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const outcomes = await settleInChunks(entries, this.concurrency, ([productId, incoming]) =>
      this.lock.run(productId, async (): Promise<StoreOutcome> => {
        const existing = await this.deps.catalog.get(productId);
        const merged = absorb(productId, existing, incoming);
        if (existing && sameProduct(existing, merged)) {
          return 'unchanged';
        }
        await this.deps.catalog.upsert(merged);
        return existing ? 'updated' : 'created';
      })
    );

    const stored: string[] = [];
    outcomes.forEach((outcome, index) => {
      const productId = entries[index][0];
      if (outcome.status === 'rejected') {
        summary.failures.push({ stage: 'store', subject: productId, error: describe(outcome.reason) });
        logger.warn('Product not stored', { stage: 'store', productId, ...errorMeta(outcome.reason) });
        return;
      }
      if (outcome.value === 'created') summary.created += 1;
      if (outcome.value === 'updated') summary.updated += 1;
      stored.push(productId);
    });

    span.end({ created: summary.created, updated: summary.updated });
    return stored;
  }

  private async embedProducts(productIds: string[], summary: RunSummary, target: EmbedTarget): Promise<void> {
    const span = startSpan('pipeline.embed', 'info');
    const { catalog, embeddings, encoder } = this.deps;
    const modelVersion = encoder.modelVersion;

    // Reuse stored vectors that still match; collect the rest for encoding
    const plans: EmbeddingPlan[] = [];
    const planOutcomes = await settleInChunks(productIds, this.concurrency, (productId) =>
      this.lock.run(productId, async (): Promise<EmbeddingPlan | 'reused' | 'missing'> => {
        const product = await catalog.get(productId);
        if (!product) {
          return 'missing';
        }
        const text = productText(product);
        const textHash = hashText(text);
        const stored = target.stored
          ? target.stored.get(productId) ?? null
          : await embeddings.get(productId, modelVersion);
        if (stored && stored.textHash === textHash && stored.vector.length === encoder.dimensions) {
          target.index.add(productId, stored.vector);
          this.mirrorToStaging(target.index, productId, stored.vector);
          return 'reused';
        }
        return { productId, text, textHash };
      })
    );

    planOutcomes.forEach((outcome, position) => {
      const productId = productIds[position];
      if (outcome.status === 'rejected') {
        this.skip(summary, productId, outcome.reason);
      } else if (outcome.value === 'reused') {
        summary.reused += 1;
      } else if (outcome.value === 'missing') {
        this.skip(summary, productId, new Error('Product disappeared from the catalog'));
      } else {
        plans.push(outcome.value);
      }
    });

    const encoded = await encoder.encodeBatch(plans.map((plan) => plan.text));

    const writes = await settleInChunks(plans, this.concurrency, (plan, position) => {
      const outcome = encoded[position];
      if (outcome.status === 'rejected') {
        return Promise.reject(outcome.reason);
      }
      return this.lock.run(plan.productId, () => this.indexVector(target.index, plan, outcome.value, modelVersion));
    });

    writes.forEach((outcome, position) => {
      if (outcome.status === 'fulfilled') {
        summary.embedded += 1;
      } else {
        this.skip(summary, plans[position].productId, outcome.reason);
      }
    });

    span.end({ embedded: summary.embedded, reused: summary.reused, skipped: summary.skipped });
  }

  /**
   * Add to the index, then persist. A failed write puts the previous vector
   * back so the index never holds a vector the store does not.
   */
  private async indexVector(index: VectorIndex, plan: EmbeddingPlan, vector: number[], modelVersion: string): Promise<void> {
    const { embeddings } = this.deps;
    const previous = index.get(plan.productId);
    index.add(plan.productId, vector);
    try {
      await embeddings.put({ productId: plan.productId, modelVersion, vector, textHash: plan.textHash });
    } catch (error) {
      if (previous) {
        index.add(plan.productId, previous);
      } else {
        index.remove(plan.productId);
      }
      throw error;
    }
    this.mirrorToStaging(index, plan.productId, vector);
  }

  // Keeps writes made during a rebuild from being lost when the staging index is swapped in
  private mirrorToStaging(written: VectorIndex, productId: string, vector: readonly number[]): void {
    if (this.staging && this.staging !== written) {
      this.staging.add(productId, vector);
    }
  }

  private skip(summary: RunSummary, productId: string, reason: unknown): void {
    summary.skipped += 1;
    summary.failures.push({ stage: failureStage(reason), subject: productId, error: describe(reason) });
    logger.warn('Product left out of the index', {
      stage: failureStage(reason),
      productId,
      retryable: reason instanceof EncodingError ? reason.retryable : undefined,
      ...errorMeta(reason)
    });
  }
}
