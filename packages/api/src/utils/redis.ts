import { createHash } from 'node:crypto';
import Redis, { type RedisOptions } from 'ioredis';
import { EMBEDDING_CONFIG } from '@docqa/shared';
import { config } from '../config';
import { logger } from './logger';

/**
 * Redis client for caching query embeddings.
 *
 * Keys are content hashes, so concurrent runs may read freely; writes for a
 * key are collapsed to one in-flight computation by the embedder.
 */

const retryStrategy = (times: number) => Math.min(times * 50, 2000);

export function createRedisClient(): Redis {
  const options: RedisOptions = {
    retryStrategy,
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    lazyConnect: true,
  };

  // REDIS_URL wins over host/port when both are set
  const redis = config.redis.url
    ? new Redis(config.redis.url, options)
    : new Redis({
        ...options,
        host: config.redis.host,
        port: config.redis.port,
        password: config.redis.password,
      });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch {
    return false;
  }
}

export interface EmbeddingCache {
  get(key: string): Promise<number[] | null>;
  set(key: string, embedding: number[]): Promise<void>;
}

/**
 * Cache key for an embedding: SHA-256 over model and normalized text.
 */
export function embeddingCacheKey(model: string, text: string): string {
  const digest = createHash('sha256').update(`${model}\u0000${text}`).digest('hex');
  return `embed:${digest}`;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = EMBEDDING_CONFIG.CACHE_TTL
  ) {}

  async get(key: string): Promise<number[] | null> {
    const cached = await this.redis.get(key);
    if (!cached) return null;
    const parsed: unknown = JSON.parse(cached);
    return isNumberArray(parsed) ? parsed : null;
  }

  async set(key: string, embedding: number[]): Promise<void> {
    await this.redis.setex(key, this.ttlSeconds, JSON.stringify(embedding));
  }
}
