/**
 * Catalog data model shared by the normalizer, deduplicator, stores and
 * search engine.
 *
 * @module types/catalog
 */

export const UNKNOWN_CATEGORY = 'unknown';

/**
 * One listing as produced by the scraper. Any field may be missing or
 * garbage; a record without a usable name is rejected by the normalizer.
 */
export interface RawRecord {
  sourceUrl?: string | null;
  rawName?: string | null;
  rawPriceText?: string | null;
  rawCategoryText?: string | null;
  rawDescription?: string | null;
  imageUrl?: string | null;
  /** ISO-8601 string or epoch milliseconds. */
  scrapeTimestamp?: string | number | null;
}

export type PromotionType = 'discount' | 'percentage' | 'multi_buy' | 'special_offer';

export interface Promotion {
  type: PromotionType;
  reducedPrice?: number;
  discountPercent?: number;
}

export interface NormalizedRecord {
  name: string;
  price?: number;
  category: string;
  description: string;
  imageUrl?: string;
  /** Empty when the scraper recorded no url. */
  sourceUrl: string;
  /** Epoch milliseconds of the scrape, when known. */
  scrapedAt?: number;
  brand?: string;
  size?: string;
  promotion?: Promotion;
}

/** Fields whose origin is tracked when records are merged. */
export type ProvenanceField = 'name' | 'price' | 'category' | 'description' | 'imageUrl' | 'brand' | 'size';

export interface CanonicalProduct {
  productId: string;
  name: string;
  price?: number;
  category: string;
  description: string;
  imageUrl?: string;
  brand?: string;
  size?: string;
  promotion?: Promotion;
  /** Sorted, de-duplicated source urls of every merged record. */
  mergedFrom: string[];
  fieldProvenance: Partial<Record<ProvenanceField, string>>;
  /** The normalized records this product was merged from, in merge order. */
  observations: NormalizedRecord[];
}

export interface EmbeddingVector {
  productId: string;
  modelVersion: string;
  vector: number[];
  /** Hash of the text the vector was computed from. */
  textHash: string;
}

export interface SearchResult {
  productId: string;
  score: number;
  rank: number;
}

export interface SearchFilters {
  category?: string;
  minPrice?: number;
  maxPrice?: number;
}

export interface SearchHit extends SearchResult {
  name: string;
  price: number | null;
  category: string;
}

export type PipelineStage = 'normalize' | 'deduplicate' | 'store' | 'embed' | 'index';

export interface StageFailure {
  stage: PipelineStage;
  /** Source url for record-level failures, product id for product-level ones. */
  subject: string;
  error: string;
}

export interface RunSummary {
  received: number;
  normalized: number;
  rejected: number;
  products: number;
  created: number;
  updated: number;
  embedded: number;
  reused: number;
  skipped: number;
  failures: StageFailure[];
}
