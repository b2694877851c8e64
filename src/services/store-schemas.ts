/**
 * Zod schemas for values read back from persistent stores.
 *
 * @module services/store-schemas
 */

import { z } from 'zod';
import type { CanonicalProduct, EmbeddingVector, NormalizedRecord, Promotion } from '../types/catalog';

export const promotionSchema: z.ZodType<Promotion> = z.object({
  type: z.enum(['discount', 'percentage', 'multi_buy', 'special_offer']),
  reducedPrice: z.number().optional(),
  discountPercent: z.number().optional()
});

export const normalizedRecordSchema: z.ZodType<NormalizedRecord> = z.object({
  name: z.string().min(1),
  price: z.number().optional(),
  category: z.string(),
  description: z.string(),
  imageUrl: z.string().optional(),
  sourceUrl: z.string(),
  scrapedAt: z.number().optional(),
  brand: z.string().optional(),
  size: z.string().optional(),
  promotion: promotionSchema.optional()
});

export const canonicalProductSchema: z.ZodType<CanonicalProduct> = z.object({
  productId: z.string().min(1),
  name: z.string().min(1),
  price: z.number().optional(),
  category: z.string(),
  description: z.string(),
  imageUrl: z.string().optional(),
  brand: z.string().optional(),
  size: z.string().optional(),
  promotion: promotionSchema.optional(),
  mergedFrom: z.array(z.string()),
  fieldProvenance: z.object({
    name: z.string().optional(),
    price: z.string().optional(),
    category: z.string().optional(),
    description: z.string().optional(),
    imageUrl: z.string().optional(),
    brand: z.string().optional(),
    size: z.string().optional()
  }),
  observations: z.array(normalizedRecordSchema)
});

export const embeddingVectorSchema: z.ZodType<EmbeddingVector> = z.object({
  productId: z.string().min(1),
  modelVersion: z.string().min(1),
  vector: z.array(z.number()),
  textHash: z.string()
});
