/**
 * Deduplicator
 *
 * Clusters normalized records by fingerprint and merges each cluster into one
 * CanonicalProduct. Only exact fingerprint matches are merged; near-duplicate
 * names ("Huile Olive 1L" vs "Huile d'Olive 1 L") stay separate products.
 *
 * Merge policy, applied over the cluster in a fixed total order (source url,
 * then the record's stable serialization):
 *
 * | field       | winner                                                     |
 * |-------------|------------------------------------------------------------|
 * | name        | longest non-empty, first on ties                           |
 * | price       | latest `scrapedAt` among priced records, first on ties     |
 * | category    | first value other than "unknown"                           |
 * | description | longest non-empty, first on ties                           |
 * | imageUrl    | first defined (also brand, size)                           |
 *
 * The promotion travels with the winning price.
 *
 * @module core/deduplicator
 */

import {
  UNKNOWN_CATEGORY,
  type CanonicalProduct,
  type NormalizedRecord,
  type ProvenanceField
} from '../types/catalog';
import { fingerprint, productIdFor, stableSerialize } from './fingerprint';

interface OrderedRecord {
  record: NormalizedRecord;
  key: string;
}

const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Drop exact duplicates and sort into merge order. The order depends only on
 * record content, never on input order.
 */
export const orderRecords = (records: NormalizedRecord[]): NormalizedRecord[] => {
  const unique = new Map<string, OrderedRecord>();
  for (const record of records) {
    const key = stableSerialize(record);
    if (!unique.has(key)) {
      unique.set(key, { record, key });
    }
  }

  return [...unique.values()]
    .sort((a, b) => compareCodeUnits(a.record.sourceUrl, b.record.sourceUrl) || compareCodeUnits(a.key, b.key))
    .map(({ record }) => record);
};

const longest = (
  records: NormalizedRecord[],
  pick: (record: NormalizedRecord) => string
): NormalizedRecord | undefined => {
  let best: NormalizedRecord | undefined;
  for (const record of records) {
    const value = pick(record);
    if (value.length > 0 && (!best || value.length > pick(best).length)) {
      best = record;
    }
  }
  return best;
};

const firstDefined = <K extends 'imageUrl' | 'brand' | 'size'>(
  records: NormalizedRecord[],
  field: K
): NormalizedRecord | undefined => records.find((record) => record[field] !== undefined);

const latestPriced = (records: NormalizedRecord[]): NormalizedRecord | undefined => {
  let best: NormalizedRecord | undefined;
  let bestTime = -Infinity;
  for (const record of records) {
    if (record.price === undefined) {
      continue;
    }
    const time = record.scrapedAt ?? -Infinity;
    if (!best || time > bestTime) {
      best = record;
      bestTime = time;
    }
  }
  return best;
};

/**
 * Merge one cluster of same-product records. Returns a fresh object; callers
 * replace the stored product with it as a whole.
 */
export const mergeRecords = (productId: string, records: NormalizedRecord[]): CanonicalProduct => {
  const ordered = orderRecords(records);
  if (ordered.length === 0) {
    throw new Error(`Cannot merge an empty cluster for ${productId}`);
  }

  const provenance: Partial<Record<ProvenanceField, string>> = {};
  // Records scraped without a url leave no provenance
  const note = (field: ProvenanceField, source: NormalizedRecord): void => {
    if (source.sourceUrl) {
      provenance[field] = source.sourceUrl;
    }
  };

  const nameSource = longest(ordered, (record) => record.name) ?? ordered[0];
  note('name', nameSource);

  const categorySource = ordered.find((record) => record.category !== UNKNOWN_CATEGORY);
  if (categorySource) {
    note('category', categorySource);
  }

  const descriptionSource = longest(ordered, (record) => record.description);
  if (descriptionSource) {
    note('description', descriptionSource);
  }

  const product: CanonicalProduct = {
    productId,
    name: nameSource.name,
    category: categorySource?.category ?? UNKNOWN_CATEGORY,
    description: descriptionSource?.description ?? '',
    mergedFrom: [...new Set(ordered.map((record) => record.sourceUrl).filter(Boolean))].sort(compareCodeUnits),
    fieldProvenance: provenance,
    observations: ordered
  };

  const priceSource = latestPriced(ordered);
  if (priceSource?.price !== undefined) {
    product.price = priceSource.price;
    note('price', priceSource);
    if (priceSource.promotion) {
      product.promotion = priceSource.promotion;
    }
  }

  const imageSource = firstDefined(ordered, 'imageUrl');
  if (imageSource?.imageUrl !== undefined) {
    product.imageUrl = imageSource.imageUrl;
    note('imageUrl', imageSource);
  }

  const brandSource = firstDefined(ordered, 'brand');
  if (brandSource?.brand !== undefined) {
    product.brand = brandSource.brand;
    note('brand', brandSource);
  }

  const sizeSource = firstDefined(ordered, 'size');
  if (sizeSource?.size !== undefined) {
    product.size = sizeSource.size;
    note('size', sizeSource);
  }

  return product;
};

/**
 * Group records by product id (derived from the fingerprint).
 */
export const clusterRecords = (records: NormalizedRecord[]): Map<string, NormalizedRecord[]> => {
  const clusters = new Map<string, NormalizedRecord[]>();
  for (const record of records) {
    const productId = productIdFor(fingerprint(record));
    const cluster = clusters.get(productId);
    if (cluster) {
      cluster.push(record);
    } else {
      clusters.set(productId, [record]);
    }
  }
  return clusters;
};

/**
 * Deduplicate a full record set. Same set in any order → same products, same
 * ids, sorted by product id.
 */
export const deduplicate = (records: NormalizedRecord[]): CanonicalProduct[] =>
  [...clusterRecords(records).entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([productId, cluster]) => mergeRecords(productId, cluster));

/**
 * Fold newly scraped records into an existing product. Equivalent to
 * deduplicating the union of the product's observations and the new records.
 */
export const absorb = (
  productId: string,
  existing: CanonicalProduct | null,
  incoming: NormalizedRecord[]
): CanonicalProduct => mergeRecords(productId, [...(existing?.observations ?? []), ...incoming]);

/**
 * True when two products carry the same merged content.
 */
export const sameProduct = (a: CanonicalProduct, b: CanonicalProduct): boolean =>
  stableSerialize(a) === stableSerialize(b);
