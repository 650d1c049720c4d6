import { config } from '../config';
import { EmbedderError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { embeddingCacheKey, type EmbeddingCache } from '../utils/redis';
import type { Embedder } from './types';

/**
 * Embedder backed by the sentence-transformers worker.
 *
 * Strategy:
 * 1. Check the cache (content-hash key)
 * 2. On a miss, call the worker's `POST /embed`
 * 3. Store the vector for future hits
 *
 * Must use the same model as the ingestion side that embedded the chunks.
 */

export interface WorkerEmbedderOptions {
  workerUrl?: string;
  model?: string;
  timeoutMs?: number;
  cache?: EmbeddingCache;
  fetchImpl?: typeof fetch;
}

interface EmbedResponse {
  embedding: number[];
}

function isEmbedResponse(value: unknown): value is EmbedResponse {
  if (typeof value !== 'object' || value === null || !('embedding' in value)) return false;
  const { embedding } = value;
  return Array.isArray(embedding) && embedding.length > 0 && embedding.every((v) => typeof v === 'number');
}

export class WorkerEmbedder implements Embedder {
  private readonly workerUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly cache?: EmbeddingCache;
  private readonly fetchImpl: typeof fetch;
  /** One computation per key at a time; later callers share it. */
  private readonly inFlight = new Map<string, Promise<number[]>>();

  constructor(options: WorkerEmbedderOptions = {}) {
    this.workerUrl = options.workerUrl ?? config.embeddings.workerUrl;
    this.model = options.model ?? config.embeddings.model;
    this.timeoutMs = options.timeoutMs ?? config.embeddings.timeoutMs;
    this.cache = options.cache;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * The worker call is shared between concurrent callers of the same text,
   * so it is bounded by the timeout rather than by any one caller's signal.
   * Callers stop waiting through their own signal (see `raceAbort`).
   */
  async embed(text: string): Promise<number[]> {
    // Case is kept: the model embeds "Apple" and "apple" differently
    const normalized = text.trim();
    const key = embeddingCacheKey(this.model, normalized);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const computation = this.computeEmbedding(key, normalized).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, computation);
    return computation;
  }

  private async computeEmbedding(key: string, text: string): Promise<number[]> {
    if (this.cache) {
      try {
        const cached = await this.cache.get(key);
        if (cached) return cached;
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Embedding cache read failed, calling worker');
      }
    }

    const embedding = await this.callEmbeddingService(text);

    if (this.cache) {
      try {
        await this.cache.set(key, embedding);
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Embedding cache write failed');
      }
    }

    return embedding;
  }

  private async callEmbeddingService(text: string): Promise<number[]> {
    const url = `${this.workerUrl}/embed`;
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text, model: this.model }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw new Error(`Embedding service returned ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isEmbedResponse(data)) {
        throw new Error('Embedding service returned no embedding');
      }
      return data.embedding;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Embedding service call failed');
      throw new EmbedderError(errorMessage(error), error);
    }
  }
}
