import type { CatalogServices } from '../../services/catalog-services';

/** How route handlers reach the service graph. */
export type ServicesResolver = () => Promise<CatalogServices>;
