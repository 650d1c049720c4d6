import type {
  Chunk,
  Degradation,
  FusedResult,
  Query,
  RetrievalCandidate,
  RetrievalMode,
} from '@docqa/shared';
import type { Embedder, ScoredChunkId, SearchBackend } from '../adapters/types';
import type { Frozen, RetrievalConfig } from '../pipeline/config';
import { callWithDeadline } from '../utils/async';
import { EmbedderError, PipelineCancelledError, RetrievalError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Retrieval Engine
 *
 * Four modes over one search backend:
 * - vector:  kNN over chunk embeddings
 * - keyword: BM25-style lexical search over configured properties
 * - hybrid:  the backend's native combined scoring, or fusion when it has none
 * - fusion:  vector and keyword legs run concurrently, merged with
 *            Reciprocal Rank Fusion
 *
 * Stateless across calls. A backend failure fails the whole retrieval;
 * partial results are never returned.
 */

export interface RetrievalOutcome {
  fused: FusedResult[];
  /** Every (chunk, sub-list) contribution, in sub-list order. Empty for native hybrid. */
  candidates: RetrievalCandidate[];
  effectiveMode: RetrievalMode;
  degradations: Degradation[];
}

export interface RankedId {
  chunkId: string;
  fusedScore: number;
}

/** Keep the first occurrence of each chunk id. */
function dedupe(hits: ScoredChunkId[]): ScoredChunkId[] {
  const seen = new Set<string>();
  return hits.filter((hit) => {
    if (seen.has(hit.chunkId)) return false;
    seen.add(hit.chunkId);
    return true;
  });
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Reciprocal Rank Fusion over a vector list and a keyword list.
 *
 * A chunk at 1-indexed rank r in a list accrues 1 / (rrfK + r); a chunk in
 * both lists sums both. Sorted by score desc, then by the better vector
 * rank (absent ranks last), then by chunk id. Truncated to `limit`.
 */
export function reciprocalRankFusion(
  vectorHits: ScoredChunkId[],
  keywordHits: ScoredChunkId[],
  rrfK: number,
  limit: number
): RankedId[] {
  const scores = new Map<string, number>();
  const vectorRank = new Map<string, number>();

  dedupe(vectorHits).forEach((hit, idx) => {
    const rank = idx + 1;
    vectorRank.set(hit.chunkId, rank);
    scores.set(hit.chunkId, (scores.get(hit.chunkId) ?? 0) + 1 / (rrfK + rank));
  });

  dedupe(keywordHits).forEach((hit, idx) => {
    const rank = idx + 1;
    scores.set(hit.chunkId, (scores.get(hit.chunkId) ?? 0) + 1 / (rrfK + rank));
  });

  return Array.from(scores.entries())
    .map(([chunkId, fusedScore]) => ({ chunkId, fusedScore }))
    .sort(
      (a, b) =>
        b.fusedScore - a.fusedScore ||
        (vectorRank.get(a.chunkId) ?? Infinity) - (vectorRank.get(b.chunkId) ?? Infinity) ||
        compareIds(a.chunkId, b.chunkId)
    )
    .slice(0, Math.max(0, limit));
}

function toCandidates(hits: ScoredChunkId[], sourceMode: RetrievalCandidate['sourceMode']): RetrievalCandidate[] {
  return dedupe(hits).map((hit, idx) => ({
    chunkId: hit.chunkId,
    score: hit.score,
    rank: idx + 1,
    sourceMode,
  }));
}

function passThrough(hits: ScoredChunkId[], limit: number): RankedId[] {
  return dedupe(hits)
    .slice(0, limit)
    .map((hit) => ({ chunkId: hit.chunkId, fusedScore: hit.score }));
}

export class RetrievalEngine {
  constructor(
    private readonly backend: SearchBackend,
    private readonly embedder: Embedder
  ) {}

  async retrieve(
    query: Query,
    mode: RetrievalMode,
    cfg: Frozen<RetrievalConfig>,
    signal?: AbortSignal
  ): Promise<RetrievalOutcome> {
    const startTime = Date.now();
    const vector = mode === 'keyword' ? null : await this.resolveVector(query, cfg, signal);

    let outcome: Omit<RetrievalOutcome, 'fused'> & { ranked: RankedId[] };

    if (mode === 'keyword') {
      const hits = await this.keywordLeg(query.text, cfg.topK, cfg, signal);
      outcome = {
        ranked: passThrough(hits, cfg.topK),
        candidates: toCandidates(hits, 'keyword'),
        effectiveMode: 'keyword',
        degradations: [],
      };
    } else if (vector === null) {
      throw new EmbedderError(`mode ${mode} needs a query vector`);
    } else if (mode === 'vector') {
      const hits = await this.vectorLeg(vector, cfg.topK, cfg, signal);
      outcome = {
        ranked: passThrough(hits, cfg.topK),
        candidates: toCandidates(hits, 'vector'),
        effectiveMode: 'vector',
        degradations: [],
      };
    } else if (mode === 'hybrid' && this.backend.hybridSearch) {
      const hybrid = this.backend.hybridSearch.bind(this.backend);
      const hits = await this.backendCall(
        (s) => hybrid(query.text, vector, cfg.topK, cfg.hybridAlpha, cfg.filters, s),
        cfg,
        signal,
        'hybrid search'
      );
      outcome = {
        ranked: passThrough(hits, cfg.topK),
        candidates: [],
        effectiveMode: 'hybrid',
        degradations: [],
      };
    } else {
      if (mode === 'hybrid') {
        logger.warn('Backend has no native hybrid search, using fusion');
      }
      // Independent legs: run concurrently, join before merging
      const [vectorHits, keywordHits] = await Promise.all([
        this.vectorLeg(vector, cfg.vectorTopK, cfg, signal),
        this.keywordLeg(query.text, cfg.keywordTopK, cfg, signal),
      ]);
      outcome = {
        ranked: reciprocalRankFusion(vectorHits, keywordHits, cfg.rrfK, cfg.mergeTopK),
        candidates: [...toCandidates(vectorHits, 'vector'), ...toCandidates(keywordHits, 'keyword')],
        effectiveMode: 'fusion',
        degradations: mode === 'hybrid' ? ['hybrid-fallback-to-fusion'] : [],
      };
    }

    const fused = await this.hydrate(outcome.ranked, cfg, signal);

    logger.info(
      {
        latency: Date.now() - startTime,
        mode,
        effectiveMode: outcome.effectiveMode,
        candidates: outcome.candidates.length,
        resultsCount: fused.length,
        documentId: cfg.filters.documentId,
      },
      'Retrieval completed'
    );

    return {
      fused,
      candidates: outcome.candidates,
      effectiveMode: outcome.effectiveMode,
      degradations: outcome.degradations,
    };
  }

  private async resolveVector(
    query: Query,
    cfg: Frozen<RetrievalConfig>,
    signal?: AbortSignal
  ): Promise<number[]> {
    if (query.vector) return query.vector;
    try {
      return await callWithDeadline((s) => this.embedder.embed(query.text, s), {
        timeoutMs: cfg.backendTimeoutMs,
        signal,
        context: 'query embedding',
      });
    } catch (error) {
      if (error instanceof PipelineCancelledError || error instanceof EmbedderError) throw error;
      throw new EmbedderError(errorMessage(error), error);
    }
  }

  private vectorLeg(
    vector: number[],
    topK: number,
    cfg: Frozen<RetrievalConfig>,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    return this.backendCall(
      (s) => this.backend.vectorSearch(vector, topK, cfg.filters, s),
      cfg,
      signal,
      'vector search'
    );
  }

  private keywordLeg(
    text: string,
    topK: number,
    cfg: Frozen<RetrievalConfig>,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    return this.backendCall(
      (s) => this.backend.keywordSearch(text, cfg.keywordProperties, topK, cfg.filters, s),
      cfg,
      signal,
      'keyword search'
    );
  }

  /**
   * Attach chunk records, keeping ranked order. Ids the store no longer
   * knows are dropped.
   */
  private async hydrate(
    ranked: RankedId[],
    cfg: Frozen<RetrievalConfig>,
    signal?: AbortSignal
  ): Promise<FusedResult[]> {
    if (ranked.length === 0) return [];
    const ids = ranked.map((r) => r.chunkId);

    const chunks = await this.backendCall(
      async (s): Promise<Chunk[]> => {
        if (this.backend.fetchChunks) {
          return this.backend.fetchChunks(ids, s);
        }
        const found = await Promise.all(ids.map((id) => this.backend.fetchChunk(id, s)));
        return found.filter((c): c is Chunk => c !== null);
      },
      cfg,
      signal,
      'chunk lookup'
    );

    const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
    const fused: FusedResult[] = [];
    for (const { chunkId, fusedScore } of ranked) {
      const chunk = byId.get(chunkId);
      if (!chunk) {
        logger.warn({ chunkId }, 'Ranked chunk missing from store, dropping');
        continue;
      }
      fused.push({ chunkId, fusedScore, chunk });
    }
    return fused;
  }

  private async backendCall<T>(
    call: (signal: AbortSignal) => Promise<T>,
    cfg: Frozen<RetrievalConfig>,
    signal: AbortSignal | undefined,
    context: string
  ): Promise<T> {
    try {
      return await callWithDeadline(call, { timeoutMs: cfg.backendTimeoutMs, signal, context });
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      logger.error({ error: errorMessage(error), context }, 'Search backend call failed');
      throw new RetrievalError('BackendUnavailable', `${context}: ${errorMessage(error)}`, error);
    }
  }
}
