import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { errorMeta, getRequestContext, logger, runWithContext, startSpan } from '../utils/logger';

const lines = (spy: { mock: { calls: unknown[][] } }): Array<Record<string, unknown>> =>
  spy.mock.calls.map(([line]) => z.record(z.unknown()).parse(JSON.parse(String(line))));

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one JSON line per message with the run context', async () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runWithContext({ runId: 'run-1' }, async () => {
      await Promise.resolve();
      logger.info('Records read', { records: 3 });
    });

    const [line] = lines(spy);
    expect(line).toMatchObject({ level: 'info', message: 'Records read', runId: 'run-1', records: 3 });
    expect(typeof line.timestamp).toBe('string');
  });

  it('sends errors to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Server error', { statusCode: 500 });

    expect(lines(spy)).toEqual([expect.objectContaining({ level: 'error', statusCode: 500 })]);
  });

  it('keeps context inside its run only', () => {
    runWithContext({ runId: 'inner' }, () => {
      expect(getRequestContext().runId).toBe('inner');
    });
    expect(getRequestContext().runId).toBeUndefined();
  });

  it('logs span duration at the requested level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const durationMs = startSpan('pipeline.store', 'info').end({ created: 2 });

    expect(durationMs).toBeGreaterThanOrEqual(0);
    expect(lines(spy).at(-1)).toMatchObject({
      level: 'info',
      message: 'Span ended: pipeline.store',
      span: 'pipeline.store',
      created: 2
    });
  });
});

describe('errorMeta', () => {
  it('describes errors and other thrown values', () => {
    expect(errorMeta(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(errorMeta('text')).toEqual({ error: 'text' });
  });
});
