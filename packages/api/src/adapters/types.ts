import type { Chunk, DocumentSummary } from '@docqa/shared';

/**
 * Contracts for the services the query pipeline consumes.
 *
 * Implementations must be safe to share between concurrent runs. Every
 * call takes an optional signal; honouring it is best-effort, the pipeline
 * never waits on an aborted call either way.
 */

export interface ScoredChunkId {
  chunkId: string;
  score: number;
}

export interface SearchFilters {
  documentId?: string;
}

/** Text properties a lexical query can target. */
export type KeywordProperty = 'text' | 'section_title' | 'keywords' | 'summary';

export const KEYWORD_PROPERTIES: readonly KeywordProperty[] = ['text', 'section_title', 'keywords', 'summary'];

export function isKeywordProperty(value: string): value is KeywordProperty {
  return KEYWORD_PROPERTIES.some((p) => p === value);
}

export interface SearchBackend {
  /** k-nearest neighbours by embedding similarity, best first. */
  vectorSearch(
    vector: number[],
    topK: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]>;

  /** BM25-style lexical search over the given properties, best first. */
  keywordSearch(
    text: string,
    properties: readonly KeywordProperty[],
    topK: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]>;

  /**
   * Native combined scoring. `alpha` weights the vector side (1 = vector only).
   * Absent when the store cannot score both in one query.
   */
  hybridSearch?(
    text: string,
    vector: number[],
    topK: number,
    alpha?: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]>;

  fetchChunk(chunkId: string, signal?: AbortSignal): Promise<Chunk | null>;

  /** Batched lookup; order of the result is not significant. */
  fetchChunks?(chunkIds: string[], signal?: AbortSignal): Promise<Chunk[]>;
}

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface JudgeInput {
  question: string;
  chunkText: string;
  summary: string;
  keywords: string[];
}

/**
 * Relevance judge. Responses are raw model output; parsing them is the
 * rerank stage's job.
 */
export interface Judge {
  score(input: JudgeInput, signal?: AbortSignal): Promise<string>;
  /** One call for several candidates; resolves to one raw response per input, in order. */
  scoreBatch?(inputs: JudgeInput[], signal?: AbortSignal): Promise<string[]>;
}

export interface GenerateOptions {
  /** Model to use for this call; the adapter's default when absent. */
  model?: string;
  signal?: AbortSignal;
}

export interface Generator {
  complete(question: string, orderedContext: Chunk[], options?: GenerateOptions): Promise<string>;
}

/** Source documents known to a store, with their chunk counts. */
export interface DocumentInventory {
  listDocuments(signal?: AbortSignal): Promise<DocumentSummary[]>;
}
