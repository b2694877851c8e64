import { Router } from 'express';
import { z } from 'zod';
import { exportCatalog, EXPORT_CONTENT_TYPES } from '../../services/catalog-export';
import { validateRows } from '../../services/record-reader';
import { AppError, ErrorCode, asyncHandler } from '../../middleware/error-handler';
import type { ServicesResolver } from './services';

const ingestRequestSchema = z.object({
  records: z.array(z.unknown()).min(1).max(10_000)
});

const exportQuerySchema = z.object({
  format: z.enum(['csv', 'jsonl']).default('csv')
});

export const createCatalogRouter = (resolve: ServicesResolver): Router => {
  const router = Router();

  router.post('/ingest', asyncHandler(async (req, res) => {
    const { records } = ingestRequestSchema.parse(req.body);
    const { records: rawRecords, rejected } = validateRows(records, (index) => `records[${index}]`);
    const { pipeline } = await resolve();
    const summary = await pipeline.run(rawRecords, rejected);
    res.json(summary);
  }));

  router.get('/products/:id', asyncHandler(async (req, res) => {
    const { catalog } = await resolve();
    const product = await catalog.get(req.params.id);
    if (!product) {
      throw new AppError(ErrorCode.NOT_FOUND, `Product ${req.params.id} not found`, 404);
    }
    res.json(product);
  }));

  router.get('/export', asyncHandler(async (req, res) => {
    const { format } = exportQuerySchema.parse(req.query);
    const { catalog } = await resolve();
    const body = await exportCatalog(catalog, format);
    res.type(EXPORT_CONTENT_TYPES[format]).send(body);
  }));

  return router;
};
