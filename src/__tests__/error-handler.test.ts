import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import http from 'http';
import express from 'express';
import { z } from 'zod';
import { EncodingError, IndexCorruptionError } from '../core/errors';
import { AppError, ErrorCode, asyncHandler, errorHandler, notFoundHandler } from '../middleware/error-handler';
import { logger } from '../utils/logger';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
  statusCode: z.number(),
  details: z.unknown().optional(),
  path: z.string()
});

describe('errorHandler', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get('/timeout', asyncHandler(async () => {
      throw new EncodingError('Embedding timed out after 10ms', 'timeout', true);
    }));
    app.get('/provider', asyncHandler(async () => {
      throw new EncodingError('Embedding provider failed: connection refused', 'provider_error', true);
    }));
    app.get('/corrupt', asyncHandler(async () => {
      throw new IndexCorruptionError('Vector has 3 dimensions, index expects 4', 4, 3);
    }));
    app.get('/conflict', asyncHandler(async () => {
      throw new AppError(ErrorCode.INVALID_REQUEST, 'Already running', 409, { job: 'rebuild' });
    }));
    app.get('/crash', asyncHandler(async () => {
      throw new Error('unexpected');
    }));
    app.use(notFoundHandler);
    app.use(errorHandler);

    server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, resolve));
    const addr = server.address();
    const port = typeof addr === 'object' && addr !== null ? addr.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const get = async (path: string) => {
    const res = await fetch(`${baseUrl}${path}`);
    return { status: res.status, body: errorResponseSchema.parse(await res.json()) };
  };

  it('maps an embedding timeout to 503', async () => {
    const { status, body } = await get('/timeout');

    expect(status).toBe(503);
    expect(body).toMatchObject({
      error: 'timeout',
      statusCode: 503,
      path: '/timeout',
      details: { reason: 'timeout', retryable: true }
    });
  });

  it('maps other embedding failures to a dependency error', async () => {
    const { status, body } = await get('/provider');

    expect(status).toBe(503);
    expect(body.error).toBe('dependency_error');
  });

  it('maps index corruption to 500 with both dimensions', async () => {
    const { status, body } = await get('/corrupt');

    expect(status).toBe(500);
    expect(body.error).toBe('index_corruption');
    expect(body.details).toEqual({ expectedDimensions: 4, actualDimensions: 3 });
    expect(logger.error).toHaveBeenCalledWith('Server error', expect.objectContaining({ path: '/corrupt' }));
  });

  it('passes AppError codes and details through', async () => {
    const { status, body } = await get('/conflict');

    expect(status).toBe(409);
    expect(body).toMatchObject({ error: 'invalid_request', message: 'Already running', details: { job: 'rebuild' } });
  });

  it('reports an unexpected error as internal', async () => {
    const { status, body } = await get('/crash');

    expect(status).toBe(500);
    expect(body).toMatchObject({ error: 'internal_error', message: 'unexpected' });
  });

  it('answers unknown routes with 404', async () => {
    const { status, body } = await get('/missing');

    expect(status).toBe(404);
    expect(body.message).toBe('Route GET /missing not found');
  });
});
