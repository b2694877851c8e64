import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../../middleware/error-handler';
import type { AppConfig } from '../../config/env';
import type { ServicesResolver } from './services';

const filtersSchema = z
  .object({
    category: z.string().min(1).optional(),
    minPrice: z.number().min(0).optional(),
    maxPrice: z.number().min(0).optional()
  })
  .default({});

const kSchema = (search: AppConfig['search']) => z.number().int().min(1).max(search.maxK).default(search.defaultK);

// Blank queries are let through so the encoder rejects them as empty text
const searchRequestSchema = (search: AppConfig['search']) =>
  z.object({
    query: z.string().max(1000),
    k: kSchema(search),
    filters: filtersSchema,
    minScore: z.number().min(-1).max(1).optional()
  });

const batchRequestSchema = (search: AppConfig['search']) =>
  z.object({
    queries: z.array(z.string().max(1000)).min(1).max(50),
    k: kSchema(search),
    filters: filtersSchema
  });

const similarQuerySchema = (search: AppConfig['search']) =>
  z.object({
    k: z.coerce.number().int().min(1).max(search.maxK).default(search.defaultK)
  });

export const createSearchRouter = (resolve: ServicesResolver): Router => {
  const router = Router();

  router.post('/', asyncHandler(async (req, res) => {
    const { config, engine } = await resolve();
    const { query, k, filters, minScore } = searchRequestSchema(config.search).parse(req.body);
    const results = await engine.query(query, k, filters, { minScore });
    res.json({ results });
  }));

  router.post('/batch', asyncHandler(async (req, res) => {
    const { config, engine } = await resolve();
    const { queries, k, filters } = batchRequestSchema(config.search).parse(req.body);
    const results = await engine.queryBatch(queries, k, filters);
    res.json({ results: Object.fromEntries(results) });
  }));

  router.get('/similar/:id', asyncHandler(async (req, res) => {
    const { config, engine } = await resolve();
    const { k } = similarQuerySchema(config.search).parse(req.query);
    const results = await engine.similarTo(req.params.id, k);
    res.json({ results });
  }));

  return router;
};
