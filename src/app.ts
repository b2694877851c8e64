/**
 * Express application factory, kept apart from server.ts so tests can mount
 * the app on an ephemeral port with their own services.
 */

import express from 'express';
import { createCatalogRouter } from './api/routes/catalog';
import { createIndexRouter } from './api/routes/index-admin';
import { createSearchRouter } from './api/routes/search';
import type { ServicesResolver } from './api/routes/services';
import { config } from './config/env';
import { errorHandler, notFoundHandler, asyncHandler } from './middleware/error-handler';
import { requestContextMiddleware } from './middleware/request-context';
import { createCorsMiddleware, createSecurityHeadersMiddleware, type SecurityConfig } from './middleware/security';
import { getCatalogServices } from './services/catalog-services';

export interface AppOptions {
  services?: ServicesResolver;
  security?: SecurityConfig;
}

export function createApp(options: AppOptions = {}): express.Express {
  const resolve = options.services ?? getCatalogServices;
  const security = options.security ?? config.security;
  const app = express();

  app.use(createSecurityHeadersMiddleware());
  app.use(createCorsMiddleware(security));
  app.use(requestContextMiddleware);
  app.use(express.json({ limit: security.maxRequestSize }));

  app.get('/health', asyncHandler(async (_req, res) => {
    const { catalog, index, encoder, config: serviceConfig } = await resolve();
    res.json({
      status: 'healthy',
      timestamp: Date.now(),
      store: serviceConfig.storage.backend,
      catalog: { products: await catalog.size() },
      index: { vectors: index.size, dimensions: index.dimensions },
      encoder: encoder.stats()
    });
  }));

  app.use('/v1/catalog', createCatalogRouter(resolve));
  app.use('/v1/search', createSearchRouter(resolve));
  app.use('/v1/index', createIndexRouter(resolve));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
