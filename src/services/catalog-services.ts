import { join } from 'path';
import { EmbeddingEncoder } from '../ai/embedding-encoder';
import { DeterministicEmbeddingProvider, type EmbeddingProvider } from '../ai/embedding-provider';
import { OllamaEmbeddingProvider } from '../ai/ollama-embedding-provider';
import { SearchEngine } from '../ai/search-engine';
import { VectorIndex } from '../ai/vector-index';
import { loadCategoryVocabulary, type CategoryVocabulary } from '../config/categories';
import { config, type AppConfig } from '../config/env';
import { CatalogPipeline } from '../core/pipeline';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { FileCatalogStore, InMemoryCatalogStore, RedisCatalogStore, type CatalogStore } from './catalog-store';
import {
  FileEmbeddingStore,
  InMemoryEmbeddingStore,
  RedisEmbeddingStore,
  type EmbeddingStore
} from './embedding-store';
import { connectRedis, type RedisConnection, type RedisKeyValueClient } from './redis-client';

export interface CatalogServices {
  config: AppConfig;
  vocabulary: CategoryVocabulary;
  catalog: CatalogStore;
  embeddings: EmbeddingStore;
  encoder: EmbeddingEncoder;
  index: VectorIndex;
  engine: SearchEngine;
  pipeline: CatalogPipeline;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  provider?: EmbeddingProvider;
  vocabulary?: CategoryVocabulary;
  /** Used instead of connecting to `config.redis.url` when the backend is redis. */
  redisClient?: RedisKeyValueClient;
}

interface Stores {
  catalog: CatalogStore;
  embeddings: EmbeddingStore;
  connection: RedisConnection | null;
}

let services: Promise<CatalogServices> | null = null;

/**
 * Process-wide services built from `config`. Built once; a failed build is
 * retried on the next call.
 */
export const getCatalogServices = (): Promise<CatalogServices> => {
  if (!services) {
    services = createCatalogServices(config).catch((error: unknown) => {
      services = null;
      throw error;
    });
  }
  return services;
};

export const resetCatalogServices = async (): Promise<void> => {
  const current = services;
  services = null;
  if (current) {
    await (await current).close();
  }
};

/**
 * Wire stores, encoder, index, search engine and pipeline, then load the
 * stored vectors of the current model into the index.
 */
export const createCatalogServices = async (
  appConfig: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<CatalogServices> => {
  const vocabulary = overrides.vocabulary ?? (await loadCategoryVocabulary(appConfig.catalog.categoriesPath));
  const { catalog, embeddings, connection } = await createStores(appConfig, overrides.redisClient);
  const provider = overrides.provider ?? createEmbeddingProvider(appConfig);

  const encoder = new EmbeddingEncoder(provider, {
    timeoutMs: appConfig.embedding.timeoutMs,
    maxRetries: appConfig.embedding.maxRetries,
    retryBaseDelayMs: appConfig.embedding.retryBaseDelayMs,
    cacheMaxEntries: appConfig.embedding.cacheMaxEntries,
    concurrency: appConfig.pipeline.concurrency
  });
  const index = new VectorIndex(provider.dimensions);
  const engine = new SearchEngine(encoder, index, catalog, { overfetch: appConfig.search.overfetch });
  const pipeline = new CatalogPipeline({
    vocabulary,
    catalog,
    embeddings,
    encoder,
    index,
    concurrency: appConfig.pipeline.concurrency,
    lock: new KeyedLock()
  });

  const warm = await pipeline.rebuildIndex();
  logger.info('Catalog services ready', {
    store: appConfig.storage.backend,
    modelVersion: encoder.modelVersion,
    products: warm.products,
    indexed: index.size
  });

  return {
    config: appConfig,
    vocabulary,
    catalog,
    embeddings,
    encoder,
    index,
    engine,
    pipeline,
    close: async () => {
      if (connection) {
        await connection.close();
      }
    }
  };
};

const createStores = async (appConfig: AppConfig, redisClient?: RedisKeyValueClient): Promise<Stores> => {
  switch (appConfig.storage.backend) {
    case 'memory':
      return { catalog: new InMemoryCatalogStore(), embeddings: new InMemoryEmbeddingStore(), connection: null };
    case 'file': {
      const { dataDir } = appConfig.storage;
      return {
        catalog: new FileCatalogStore(join(dataDir, 'catalog.jsonl')),
        embeddings: new FileEmbeddingStore(join(dataDir, 'embeddings.jsonl')),
        connection: null
      };
    }
    case 'redis': {
      const connection = redisClient ? null : await connectRedis(appConfig.redis.url);
      const client = redisClient ?? connection?.client;
      if (!client) {
        throw new Error('Redis store selected but no client is available');
      }
      return {
        catalog: new RedisCatalogStore(client, appConfig.redis.keyPrefix),
        embeddings: new RedisEmbeddingStore(client, appConfig.redis.keyPrefix),
        connection
      };
    }
  }
};

const createEmbeddingProvider = (appConfig: AppConfig): EmbeddingProvider => {
  const { embedding } = appConfig;
  if (embedding.provider === 'ollama') {
    return new OllamaEmbeddingProvider({
      baseUrl: embedding.ollamaBaseUrl,
      model: embedding.model,
      dimensions: embedding.dimensions
    });
  }
  return new DeterministicEmbeddingProvider(embedding.dimensions);
};
