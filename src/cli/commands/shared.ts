import { z } from 'zod';
import { getCatalogServices, resetCatalogServices, type CatalogServices } from '../../services/catalog-services';
import type { RunSummary, SearchHit } from '../../types/catalog';

export const positiveInt = z.coerce.number().int().min(1);
export const optionalAmount = z.coerce.number().min(0).optional();

/**
 * Run a command body against the configured services and release them
 * afterwards. Failures set a non-zero exit code.
 */
export const withServices = async (fn: (services: CatalogServices) => Promise<void>): Promise<void> => {
  try {
    await fn(await getCatalogServices());
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    await resetCatalogServices();
  }
};

export const formatPrice = (price: number | null): string => (price === null ? '-' : price.toFixed(2));

export const printHits = (hits: SearchHit[]): void => {
  if (hits.length === 0) {
    console.log('No matching products.');
    return;
  }
  for (const hit of hits) {
    console.log(
      `${String(hit.rank).padStart(3)}. ${hit.score.toFixed(4)}  ${hit.productId}  ${hit.name}  [${hit.category}]  ${formatPrice(hit.price)}`
    );
  }
};

export const printSummary = (summary: RunSummary): void => {
  console.log(`Received:   ${summary.received}`);
  console.log(`Normalized: ${summary.normalized}`);
  console.log(`Rejected:   ${summary.rejected}`);
  console.log(`Products:   ${summary.products} (${summary.created} new, ${summary.updated} updated)`);
  console.log(`Embedded:   ${summary.embedded} (${summary.reused} reused, ${summary.skipped} skipped)`);
  for (const failure of summary.failures) {
    console.log(`  [${failure.stage}] ${failure.subject}: ${failure.error}`);
  }
};
