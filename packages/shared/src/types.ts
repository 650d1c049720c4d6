/**
 * Core types for docqa.
 * Shared across the API package and its HTTP clients.
 */

export type ElementType = 'narrative' | 'table' | 'title' | 'list' | 'other';

/**
 * One retrievable unit of document text.
 *
 * Chunks are written once by ingestion and never mutated afterwards.
 * `summary` and `keywords` come from the optional enrichment step and are
 * empty when that step has not run.
 */
export interface Chunk {
  id: string;
  text: string;
  documentId: string;
  pageStart: number | null;
  pageEnd: number | null;
  sectionTitle: string;
  elementType: ElementType;
  keywords: string[];
  summary: string;
  embedding?: number[];
}

export type RetrievalMode = 'vector' | 'keyword' | 'hybrid' | 'fusion';

export type CandidateSource = 'vector' | 'keyword';

export interface Query {
  text: string;
  vector: number[] | null;
}

export interface RetrievalCandidate {
  chunkId: string;
  score: number;
  rank: number; // 1-indexed within its sub-list
  sourceMode: CandidateSource;
}

export interface FusedResult {
  chunkId: string;
  fusedScore: number;
  chunk: Chunk;
}

export interface RerankedResult {
  chunkId: string;
  relevanceScore: number | null; // null = judge gave no usable score
  chunk: Chunk;
}

export type CitationSource = 'markers' | 'all-context';

export interface Answer {
  text: string;
  citations: string[];
  citationSource: CitationSource;
  refusalReason?: string;
}

export type PipelineStage = 'ENCODE' | 'RETRIEVE' | 'RERANK' | 'GENERATE' | 'DONE' | 'FAILED';

export type PipelineErrorKind =
  | 'BackendUnavailable'
  | 'EmbedderUnavailable'
  | 'GenerationServiceUnavailable'
  | 'Cancelled'
  | 'InvalidRequest';

export type Degradation = 'rerank-unavailable' | 'hybrid-fallback-to-fusion';

export interface StageTimings {
  encode: number;
  retrieval: number;
  reranking: number;
  synthesis: number;
  total: number;
}

export interface QueryRequest {
  question: string;
  options?: {
    mode?: RetrievalMode;
    topK?: number;
    documentId?: string;
    rerank?: boolean;
    candidateCount?: number;
    includeDebug?: boolean;
  };
}

export interface QuerySource {
  chunkId: string;
  documentId: string;
  pageStart: number | null;
  pageEnd: number | null;
  content: string;
  score: number | null;
}

export interface QueryResponse {
  requestId: string;
  question: string;
  answer: string;
  citations: string[];
  citationSource: CitationSource;
  refusalReason?: string;
  sources: QuerySource[];
  degraded: boolean;
  degradations: Degradation[];
  metadata: {
    mode: RetrievalMode;
    latency: StageTimings;
    chunksRetrieved: number;
    chunksReranked: number;
    chunksUsed: number;
    latencyBudgetViolations: string[];
  };
  debug?: QueryDebugInfo;
}

export interface QueryDebugInfo {
  stages: PipelineStage[];
  effectiveMode: RetrievalMode;
  candidates: RetrievalCandidate[];
  fused: Array<{ chunkId: string; fusedScore: number }>;
  reranked: Array<{ chunkId: string; relevanceScore: number | null }> | null;
}

export interface QueryFailureResponse {
  requestId: string;
  error: string;
  stage: PipelineStage;
  kind: PipelineErrorKind;
  partialRankingAvailable: boolean;
}

export interface DocumentSummary {
  documentId: string;
  chunkCount: number;
}

export interface GradeResult {
  result: string;
  isSame: boolean;
  reasoning: string | null;
}
