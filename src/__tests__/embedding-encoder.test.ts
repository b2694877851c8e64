import { describe, it, expect, vi } from 'vitest';
import { EmbeddingEncoder, productText } from '../ai/embedding-encoder';
import { DeterministicEmbeddingProvider, tokenize } from '../ai/embedding-provider';
import { EncodingError } from '../core/errors';
import { ScriptedProvider } from './helpers/fixtures';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return { ...actual, logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } };
});

const fastRetries = { maxRetries: 2, retryBaseDelayMs: 1, timeoutMs: 1000 };

describe('EmbeddingEncoder', () => {
  it('caches vectors per text', async () => {
    const provider = new ScriptedProvider();
    const encoder = new EmbeddingEncoder(provider);

    const first = await encoder.encode('abc');
    const second = await encoder.encode('abc');

    expect(first).toEqual([3, 1, 0]);
    expect(second).toEqual([3, 1, 0]);
    expect(provider.calls).toEqual(['abc']);
    expect(encoder.stats()).toEqual({ modelVersion: 'scripted-v1', cacheSize: 1, hits: 1, misses: 1 });
  });

  it('hands out copies of cached vectors', async () => {
    const encoder = new EmbeddingEncoder(new ScriptedProvider());

    const first = await encoder.encode('abc');
    first[0] = 99;

    expect(await encoder.encode('abc')).toEqual([3, 1, 0]);
  });

  it('clears the cache when the model version changes', async () => {
    const provider = new ScriptedProvider();
    const encoder = new EmbeddingEncoder(provider);

    await encoder.encode('abc');
    provider.modelVersion = 'scripted-v2';
    await encoder.encode('abc');

    expect(provider.calls).toEqual(['abc', 'abc']);
    expect(encoder.modelVersion).toBe('scripted-v2');
  });

  it.each([null, undefined, '', '   ', '\n\t'])('rejects missing or blank text %j without calling the provider', async (text) => {
    const provider = new ScriptedProvider();
    const encoder = new EmbeddingEncoder(provider);

    const error = await encoder.encode(text).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({ reason: 'empty_text', retryable: false });
    expect(provider.calls).toEqual([]);
  });

  it('retries retryable provider failures', async () => {
    let failures = 2;
    const provider = new ScriptedProvider(3, async () => {
      if (failures > 0) {
        failures -= 1;
        throw new EncodingError('upstream busy', 'provider_error', true);
      }
      return [1, 0, 0];
    });
    const encoder = new EmbeddingEncoder(provider, fastRetries);

    await expect(encoder.encode('abc')).resolves.toEqual([1, 0, 0]);
    expect(provider.calls).toHaveLength(3);
  });

  it('gives up after the configured number of retries', async () => {
    const provider = new ScriptedProvider(3, async () => {
      throw new EncodingError('upstream down', 'provider_error', true);
    });
    const encoder = new EmbeddingEncoder(provider, fastRetries);

    await expect(encoder.encode('abc')).rejects.toMatchObject({ reason: 'provider_error', retryable: true });
    expect(provider.calls).toHaveLength(3);
  });

  it('wraps unexpected provider errors as retryable provider errors', async () => {
    const provider = new ScriptedProvider(3, async () => {
      throw new TypeError('fetch failed');
    });
    const encoder = new EmbeddingEncoder(provider, { ...fastRetries, maxRetries: 0 });

    const error = await encoder.encode('abc').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EncodingError);
    expect(error).toMatchObject({ reason: 'provider_error', retryable: true, message: 'Embedding provider failed: fetch failed' });
  });

  it('does not retry a vector of the wrong dimension', async () => {
    const provider = new ScriptedProvider(3, async () => [1, 0]);
    const encoder = new EmbeddingEncoder(provider, fastRetries);

    await expect(encoder.encode('abc')).rejects.toMatchObject({ reason: 'invalid_vector', retryable: false });
    expect(provider.calls).toHaveLength(1);
  });

  it('rejects non-finite vectors', async () => {
    const provider = new ScriptedProvider(3, async () => [1, Number.NaN, 0]);
    const encoder = new EmbeddingEncoder(provider, fastRetries);

    await expect(encoder.encode('abc')).rejects.toMatchObject({ reason: 'invalid_vector' });
  });

  it('times out a hanging provider call and aborts it', async () => {
    const provider = new ScriptedProvider(3, () => new Promise<number[]>(() => undefined));
    const encoder = new EmbeddingEncoder(provider, { timeoutMs: 20, maxRetries: 1, retryBaseDelayMs: 1 });

    await expect(encoder.encode('abc')).rejects.toMatchObject({ reason: 'timeout', retryable: true });
    expect(provider.calls).toHaveLength(2);
    expect(provider.signals.every((signal) => signal.aborted)).toBe(true);
    expect(encoder.stats().cacheSize).toBe(0);
  });

  it('settles each text of a batch on its own', async () => {
    const encoder = new EmbeddingEncoder(new ScriptedProvider(), { concurrency: 2 });

    const outcomes = await encoder.encodeBatch(['a', ' ', 'abcd']);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: [1, 1, 0] });
    expect(outcomes[2]).toEqual({ status: 'fulfilled', value: [4, 1, 0] });
  });
});

describe('DeterministicEmbeddingProvider', () => {
  it('produces unit-length vectors of the configured size', async () => {
    const provider = new DeterministicEmbeddingProvider(64);
    const [vector] = await provider.embed(["Huile d'olive vierge"]);

    expect(vector).toHaveLength(64);
    expect(Math.hypot(...vector)).toBeCloseTo(1, 10);
    expect(provider.modelVersion).toBe('hashed-bow-v1/64');
  });

  it('is deterministic and ignores accents and case', async () => {
    const provider = new DeterministicEmbeddingProvider(64);
    const [a, b] = await provider.embed(['Téléviseur LED', 'televiseur led']);
    expect(a).toEqual(b);
  });

  it('returns a zero vector for text without tokens', async () => {
    const provider = new DeterministicEmbeddingProvider(8);
    const [vector] = await provider.embed(['- !']);
    expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('tokenize / productText', () => {
  it('drops stop words and single characters', () => {
    expect(tokenize("Huile d'olive de la région")).toEqual(['huile', 'olive', 'region']);
  });

  it('joins name and description', () => {
    expect(productText({ name: 'Savon', description: 'Doux' })).toBe('Savon\nDoux');
    expect(productText({ name: 'Savon', description: '' })).toBe('Savon');
  });
});
