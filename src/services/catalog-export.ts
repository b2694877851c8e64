/**
 * Catalog export for the downstream analysis stage.
 *
 * @module services/catalog-export
 */

import { stringify } from 'csv-stringify/sync';
import type { CanonicalProduct } from '../types/catalog';
import type { CatalogStore } from './catalog-store';

export type ExportFormat = 'csv' | 'jsonl';

export const EXPORT_COLUMNS = ['product_id', 'name', 'price', 'category', 'description', 'image_url'] as const;

export type ExportRow = Record<(typeof EXPORT_COLUMNS)[number], string | number | null>;

export const toExportRow = (product: CanonicalProduct): ExportRow => ({
  product_id: product.productId,
  name: product.name,
  price: product.price ?? null,
  category: product.category,
  description: product.description,
  image_url: product.imageUrl ?? null
});

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  jsonl: 'application/x-ndjson; charset=utf-8'
};

/**
 * Render products sorted by product id. Missing prices and images are empty
 * CSV cells and `null` in JSON lines.
 */
export const renderExport = (products: CanonicalProduct[], format: ExportFormat): string => {
  const rows = [...products]
    .sort((a, b) => (a.productId < b.productId ? -1 : a.productId > b.productId ? 1 : 0))
    .map(toExportRow);

  if (format === 'jsonl') {
    return rows.map((row) => `${JSON.stringify(row)}\n`).join('');
  }

  return stringify(rows, { header: true, columns: [...EXPORT_COLUMNS] });
};

export const exportCatalog = async (catalog: CatalogStore, format: ExportFormat): Promise<string> => {
  const products: CanonicalProduct[] = [];
  for await (const product of catalog.all()) {
    products.push(product);
  }
  return renderExport(products, format);
};
