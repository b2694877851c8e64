import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  FileEmbeddingStore,
  InMemoryEmbeddingStore,
  RedisEmbeddingStore,
  type EmbeddingStore
} from '../services/embedding-store';
import type { EmbeddingVector } from '../types/catalog';
import { FakeRedis } from './helpers/fixtures';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return { ...actual, logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } };
});

const vectorFor = (productId: string, modelVersion = 'model-a', vector = [1, 0, 0]): EmbeddingVector => ({
  productId,
  modelVersion,
  vector,
  textHash: `hash-${productId}`
});

const collect = async (store: EmbeddingStore, modelVersion: string): Promise<string[]> => {
  const ids: string[] = [];
  for await (const entry of store.list(modelVersion)) {
    ids.push(entry.productId);
  }
  return ids.sort();
};

const contract = (name: string, create: () => Promise<EmbeddingStore>) => {
  describe(`${name} contract`, () => {
    let store: EmbeddingStore;

    beforeEach(async () => {
      store = await create();
    });

    it('keys vectors by product and model version', async () => {
      await store.put(vectorFor('prd_a'));
      await store.put(vectorFor('prd_a', 'model-b', [0, 1, 0]));

      expect(await store.get('prd_a', 'model-a')).toEqual(vectorFor('prd_a'));
      expect((await store.get('prd_a', 'model-b'))?.vector).toEqual([0, 1, 0]);
      expect(await store.get('prd_a', 'model-c')).toBeNull();
      expect(await store.size()).toBe(2);
    });

    it('replaces the vector for the same key', async () => {
      await store.put(vectorFor('prd_a'));
      await store.put(vectorFor('prd_a', 'model-a', [0, 0, 1]));

      expect((await store.get('prd_a', 'model-a'))?.vector).toEqual([0, 0, 1]);
      expect(await store.size()).toBe(1);
    });

    it('lists one model version only', async () => {
      await store.put(vectorFor('prd_a'));
      await store.put(vectorFor('prd_b'));
      await store.put(vectorFor('prd_c', 'model-b'));
      await store.put(vectorFor('prd_d', 'model-a-large'));

      expect(await collect(store, 'model-a')).toEqual(['prd_a', 'prd_b']);
      expect(await collect(store, 'model-b')).toEqual(['prd_c']);
      expect(await collect(store, 'model-z')).toEqual([]);
    });

    it('copies vectors in and out', async () => {
      const entry = vectorFor('prd_a');
      await store.put(entry);
      entry.vector[0] = 9;

      const stored = await store.get('prd_a', 'model-a');
      expect(stored?.vector).toEqual([1, 0, 0]);
    });
  });
};

contract('InMemoryEmbeddingStore', async () => new InMemoryEmbeddingStore());
contract('RedisEmbeddingStore', async () => new RedisEmbeddingStore(new FakeRedis()));

describe('FileEmbeddingStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shelfwise-embeddings-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  contract('FileEmbeddingStore', async () => new FileEmbeddingStore(path.join(dir, 'embeddings.jsonl')));

  it('reloads vectors and compacts superseded lines', async () => {
    const file = path.join(dir, 'embeddings.jsonl');
    const store = new FileEmbeddingStore(file);
    await store.put(vectorFor('prd_a'));
    await store.put(vectorFor('prd_a', 'model-a', [0, 1, 0]));
    await store.put(vectorFor('prd_b'));

    const reopened = new FileEmbeddingStore(file, { compactionRatio: 1 });
    expect((await reopened.get('prd_a', 'model-a'))?.vector).toEqual([0, 1, 0]);
    expect(await collect(reopened, 'model-a')).toEqual(['prd_a', 'prd_b']);

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
  });

  it('compacts superseded vectors when it is reopened', async () => {
    const file = path.join(dir, 'embeddings.jsonl');
    const store = new FileEmbeddingStore(file);
    for (const weight of [1, 2, 3]) {
      await store.put(vectorFor('prd_a', 'model-a', [weight, 0, 0]));
    }

    const reopened = new FileEmbeddingStore(file);
    expect((await reopened.get('prd_a', 'model-a'))?.vector).toEqual([3, 0, 0]);

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
  });
});

describe('RedisEmbeddingStore', () => {
  it('ignores entries that do not validate', async () => {
    const redis = new FakeRedis();
    const store = new RedisEmbeddingStore(redis);
    await store.put(vectorFor('prd_a'));
    redis.data.set('shelfwise:embedding:model-a:prd_bad', '{"productId":"prd_bad"}');

    expect(await collect(store, 'model-a')).toEqual(['prd_a']);
    expect(await store.get('prd_bad', 'model-a')).toBeNull();
  });
});
