export type StoreBackend = 'file' | 'memory' | 'redis';
export type EmbeddingProviderName = 'deterministic' | 'ollama';

export interface AppConfig {
  port: number;
  storage: {
    backend: StoreBackend;
    dataDir: string;
  };
  redis: {
    url: string;
    keyPrefix: string;
  };
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    dimensions: number;
    ollamaBaseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    cacheMaxEntries: number;
  };
  pipeline: {
    concurrency: number;
  };
  search: {
    defaultK: number;
    maxK: number;
    overfetch: number;
  };
  catalog: {
    categoriesPath: string;
  };
  security: {
    /** `*` allows any origin. */
    allowedOrigins: string[];
    corsCredentials: boolean;
    maxRequestSize: string;
  };
}

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }

  if (value.toLowerCase() === 'true') {
    return true;
  }

  if (value.toLowerCase() === 'false') {
    return false;
  }

  return fallback;
};

const listFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  const items = (value ?? '').split(',').map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
};

const storeFromEnv = (value: string | undefined, fallback: StoreBackend): StoreBackend => {
  const normalized = value?.toLowerCase();
  if (normalized === 'file' || normalized === 'memory' || normalized === 'redis') {
    return normalized;
  }
  return fallback;
};

const embeddingProviderFromEnv = (
  value: string | undefined,
  fallback: EmbeddingProviderName
): EmbeddingProviderName => {
  const normalized = value?.toLowerCase();
  if (normalized === 'deterministic' || normalized === 'ollama') {
    return normalized;
  }
  return fallback;
};

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

/**
 * Build the configuration from an environment map. Exported so tests can
 * build a config without touching `process.env`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const embeddingProvider = embeddingProviderFromEnv(env.EMBEDDING_PROVIDER, 'deterministic');

  return {
    port: numberFromEnv(env.PORT, 5280),
    storage: {
      backend: storeFromEnv(env.SHELFWISE_STORE, env.NODE_ENV === 'test' ? 'memory' : 'file'),
      dataDir: env.SHELFWISE_DATA_DIR ?? './data'
    },
    redis: {
      url: env.REDIS_URL ?? 'redis://localhost:6379',
      keyPrefix: env.REDIS_KEY_PREFIX ?? 'shelfwise:'
    },
    embedding: {
      provider: embeddingProvider,
      model: env.EMBEDDING_MODEL ?? (embeddingProvider === 'ollama' ? 'nomic-embed-text' : 'hashed-bow'),
      dimensions: Math.max(1, numberFromEnv(env.EMBEDDING_DIMENSIONS, 256)),
      ollamaBaseUrl: env.OLLAMA_BASE_URL ?? 'http://127.0.0.1:11434',
      timeoutMs: numberFromEnv(env.EMBEDDING_TIMEOUT_MS, 10_000),
      maxRetries: Math.max(0, numberFromEnv(env.EMBEDDING_MAX_RETRIES, 3)),
      retryBaseDelayMs: numberFromEnv(env.EMBEDDING_RETRY_BASE_MS, 200),
      cacheMaxEntries: Math.max(1, numberFromEnv(env.EMBEDDING_CACHE_MAX, 2048))
    },
    pipeline: {
      concurrency: Math.max(1, numberFromEnv(env.PIPELINE_CONCURRENCY, 8))
    },
    search: {
      defaultK: Math.max(1, numberFromEnv(env.SEARCH_DEFAULT_K, 5)),
      maxK: Math.max(1, numberFromEnv(env.SEARCH_MAX_K, 50)),
      overfetch: clamp(numberFromEnv(env.SEARCH_OVERFETCH, 5), 3, 10)
    },
    catalog: {
      categoriesPath: env.CATEGORIES_PATH ?? './config/categories.yaml'
    },
    security: {
      allowedOrigins: listFromEnv(env.ALLOWED_ORIGINS, ['*']),
      corsCredentials: booleanFromEnv(env.CORS_CREDENTIALS, false),
      maxRequestSize: env.MAX_REQUEST_SIZE ?? '10mb'
    }
  };
};

export const config: AppConfig = loadConfig();
