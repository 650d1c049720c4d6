/**
 * Shared constants for docqa.
 */

export const LATENCY_BUDGETS = {
  ENCODE: 300, // ms
  RETRIEVAL: 200, // ms
  RERANKING: 500, // ms
  SYNTHESIS: 3000, // ms
  TOTAL: 5000, // ms
} as const;

export const RAG_CONFIG = {
  RETRIEVAL_MODE: 'fusion',
  TOP_K: 10,
  TOP_K_KEYWORD: 20,
  TOP_K_VECTOR: 20,
  MERGE_TOP_K: 10,
  RRF_K: 60,
  HYBRID_ALPHA: 0.5,
  KEYWORD_PROPERTIES: ['text', 'section_title', 'keywords'],
  BACKEND_TIMEOUT_MS: 5000,
  RERANK_CANDIDATES: 5,
  RERANK_MAX_CONCURRENCY: 4,
  RERANK_BATCH_SIZE: 1,
  RERANK_CALL_TIMEOUT_MS: 5000,
  RERANK_STAGE_TIMEOUT_MS: 15000,
  RERANK_EXCERPT_CHARS: 1200,
  MAX_CONTEXT_CHUNKS: 10,
  MAX_CONTEXT_CHARS: 24000,
  GENERATION_TIMEOUT_MS: 30000,
} as const;

/** Inclusive range a judge score must fall in to count as valid. */
export const JUDGE_SCORE_RANGE = { MIN: 0, MAX: 1 } as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'all-MiniLM-L6-v2',
  CACHE_TTL: 86400, // 24 hours
} as const;

export const REFUSAL_ANSWER = "I don't have enough information to answer this question.";
