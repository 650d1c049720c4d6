import dotenv from 'dotenv';
import { EMBEDDING_CONFIG, LATENCY_BUDGETS, RAG_CONFIG } from '@docqa/shared';

dotenv.config();

function intEnv(name: string, fallback: number): number {
  return parseInt(process.env[name] || String(fallback), 10);
}

function floatEnv(name: string, fallback: number): number {
  return parseFloat(process.env[name] || String(fallback));
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

export const config = {
  // Server
  env: process.env.NODE_ENV || 'development',
  host: process.env.HOST || '0.0.0.0',
  port: intEnv('PORT', 3000),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:3001').split(','),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Database (chunks table with pgvector + tsvector columns)
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: intEnv('DB_PORT', 5432),
    database: process.env.DB_NAME || 'docqa',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
  },

  // Redis (embedding cache)
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: process.env.REDIS_HOST || 'localhost',
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  // Groq (relevance judge + answer grading)
  groq: {
    apiKey: process.env.GROQ_API_KEY || '',
    model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
  },

  // OpenAI (answer generation)
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  },

  // Embeddings (via Worker - sentence-transformers)
  embeddings: {
    workerUrl: process.env.WORKER_URL || 'http://localhost:8000',
    model: process.env.EMBEDDINGS_MODEL || EMBEDDING_CONFIG.MODEL,
    timeoutMs: intEnv('EMBEDDINGS_TIMEOUT_MS', 5000),
  },

  // RAG Configuration
  rag: {
    // Retrieval
    mode: process.env.RAG_RETRIEVAL_MODE || RAG_CONFIG.RETRIEVAL_MODE,
    topK: intEnv('RAG_TOP_K', RAG_CONFIG.TOP_K),
    topKKeyword: intEnv('RAG_TOP_K_KEYWORD', RAG_CONFIG.TOP_K_KEYWORD),
    topKVector: intEnv('RAG_TOP_K_VECTOR', RAG_CONFIG.TOP_K_VECTOR),
    mergeTopK: intEnv('RAG_MERGE_TOP_K', RAG_CONFIG.MERGE_TOP_K),
    rrfK: floatEnv('RAG_RRF_K', RAG_CONFIG.RRF_K),
    hybridAlpha: floatEnv('RAG_HYBRID_ALPHA', RAG_CONFIG.HYBRID_ALPHA),
    keywordProperties: (process.env.RAG_KEYWORD_PROPERTIES || RAG_CONFIG.KEYWORD_PROPERTIES.join(','))
      .split(',')
      .map((p) => p.trim())
      .filter(Boolean),
    backendTimeoutMs: intEnv('RAG_BACKEND_TIMEOUT_MS', RAG_CONFIG.BACKEND_TIMEOUT_MS),

    // Reranking
    rerankEnabled: boolEnv('RAG_RERANK_ENABLED', true),
    rerankCandidates: intEnv('RAG_RERANK_CANDIDATES', RAG_CONFIG.RERANK_CANDIDATES),
    rerankMaxConcurrency: intEnv('RAG_RERANK_MAX_CONCURRENCY', RAG_CONFIG.RERANK_MAX_CONCURRENCY),
    rerankBatchSize: intEnv('RAG_RERANK_BATCH_SIZE', RAG_CONFIG.RERANK_BATCH_SIZE),
    rerankCallTimeoutMs: intEnv('RAG_RERANK_CALL_TIMEOUT_MS', RAG_CONFIG.RERANK_CALL_TIMEOUT_MS),
    rerankStageTimeoutMs: intEnv('RAG_RERANK_STAGE_TIMEOUT_MS', RAG_CONFIG.RERANK_STAGE_TIMEOUT_MS),
    rerankExcerptChars: intEnv('RAG_RERANK_EXCERPT_CHARS', RAG_CONFIG.RERANK_EXCERPT_CHARS),

    // Generation
    maxContextChunks: intEnv('RAG_MAX_CONTEXT_CHUNKS', RAG_CONFIG.MAX_CONTEXT_CHUNKS),
    maxContextChars: intEnv('RAG_MAX_CONTEXT_CHARS', RAG_CONFIG.MAX_CONTEXT_CHARS),
    generationTimeoutMs: intEnv('RAG_GENERATION_TIMEOUT_MS', RAG_CONFIG.GENERATION_TIMEOUT_MS),
    citationPolicy: process.env.RAG_CITATION_POLICY || 'markers',

    // Latency budgets (ms)
    latencyBudgets: {
      encode: intEnv('LATENCY_ENCODE', LATENCY_BUDGETS.ENCODE),
      retrieval: intEnv('LATENCY_RETRIEVAL', LATENCY_BUDGETS.RETRIEVAL),
      reranking: intEnv('LATENCY_RERANKING', LATENCY_BUDGETS.RERANKING),
      synthesis: intEnv('LATENCY_SYNTHESIS', LATENCY_BUDGETS.SYNTHESIS),
      total: intEnv('LATENCY_TOTAL', LATENCY_BUDGETS.TOTAL),
    },
  },
} as const;

export type AppConfig = typeof config;
