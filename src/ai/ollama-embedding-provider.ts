/**
 * Ollama Embedding Provider
 *
 * Calls a local or remote Ollama server (`POST /api/embed`) to embed text.
 *
 * @module ai/ollama-embedding-provider
 */

import { z } from 'zod';
import { EncodingError } from '../core/errors';
import { logger } from '../utils/logger';
import type { EmbeddingProvider } from './embedding-provider';

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number()))
});

export interface OllamaEmbeddingOptions {
  baseUrl?: string;
  model?: string;
  dimensions: number;
  /** Replaces the global fetch (tests). */
  fetchImpl?: typeof fetch;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  readonly modelVersion: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaEmbeddingOptions) {
    this.baseUrl = (options.baseUrl ?? 'http://127.0.0.1:11434').replace(/\/+$/, '');
    this.model = options.model ?? 'nomic-embed-text';
    this.dimensions = options.dimensions;
    this.modelVersion = `ollama/${this.model}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embed(input: string[], signal?: AbortSignal): Promise<number[][]> {
    if (input.length === 0) {
      return [];
    }
    const startTime = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
        signal
      });
    } catch (error) {
      // Aborts are the caller's timeout; let the encoder classify them
      if (signal?.aborted) {
        throw error;
      }
      throw new EncodingError(
        `Ollama request failed: ${error instanceof Error ? error.message : String(error)}`,
        'provider_error',
        true,
        { cause: error }
      );
    }

    if (!response.ok) {
      const retryable = response.status >= 500 || response.status === 429;
      throw new EncodingError(`Ollama returned HTTP ${response.status}`, 'provider_error', retryable);
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.embeddings.length !== input.length) {
      throw new EncodingError('Ollama returned a malformed embedding response', 'invalid_vector', false);
    }

    logger.debug('Ollama embeddings computed', {
      model: this.model,
      count: input.length,
      durationMs: Date.now() - startTime
    });

    return parsed.data.embeddings;
  }
}
