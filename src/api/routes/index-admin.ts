import { Router } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import type { ServicesResolver } from './services';

export const createIndexRouter = (resolve: ServicesResolver): Router => {
  const router = Router();

  router.post('/rebuild', asyncHandler(async (_req, res) => {
    const { pipeline } = await resolve();
    const summary = await pipeline.rebuildIndex();
    res.json(summary);
  }));

  return router;
};
