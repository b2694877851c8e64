/**
 * Fingerprints and content hashes.
 *
 * Product identity is content-addressed: a product id is derived from the
 * canonical form of the product's name and category, so the same product
 * gets the same id on every run regardless of the order records arrive in.
 *
 * @module core/fingerprint
 */

import crypto from 'crypto';

export const PRODUCT_ID_PREFIX = 'prd_';

const sha256 = (input: string): string => crypto.createHash('sha256').update(input, 'utf8').digest('hex');

/**
 * Canonical form of a product name: NFC, lower-cased, punctuation replaced by
 * spaces, whitespace collapsed.
 *
 * @example canonicalName("Huile d'Olive, 1L") === "huile d olive 1l"
 */
export const canonicalName = (name: string): string =>
  name
    .normalize('NFC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Same-product key. Records with equal fingerprints are merged.
 */
export const fingerprint = (record: { name: string; category: string }): string =>
  `${canonicalName(record.name)}|${record.category.normalize('NFC').trim().toLowerCase()}`;

export const productIdFor = (fingerprintKey: string): string =>
  `${PRODUCT_ID_PREFIX}${sha256(fingerprintKey).slice(0, 16)}`;

/**
 * Hash of a text as fed to the embedding model. Used as the cache key and to
 * detect when a stored vector is stale.
 */
export const hashText = (text: string): string => `sha256:${sha256(text)}`;

/**
 * JSON serialization with object keys sorted at every level, so two equal
 * values always serialize identically.
 */
export const stableSerialize = (value: unknown): string => JSON.stringify(sortKeys(value));

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry);
      }
    }
    return sorted;
  }
  return value;
};
