import {
  checkLatencyBudget,
  type Answer,
  type Chunk,
  type Degradation,
  type FusedResult,
  type PipelineStage,
  type Query,
  type RerankedResult,
  type RetrievalCandidate,
  type RetrievalMode,
  type StageTimings,
} from '@docqa/shared';
import type { Embedder } from '../adapters/types';
import type { RetrievalEngine } from '../services/retrieval';
import type { RerankStage } from '../services/reranking';
import type { GenerationStage } from '../services/synthesis';
import { callWithDeadline, raceAbort } from '../utils/async';
import {
  EmbedderError,
  GenerationError,
  PipelineCancelledError,
  PipelineError,
  RerankUnavailableError,
  RetrievalError,
  errorMessage,
} from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { FrozenPipelineConfig } from './config';

/**
 * Pipeline Controller
 *
 *   ENCODE -> RETRIEVE -> [RERANK] -> GENERATE -> DONE
 *                 \_________\____________\______-> FAILED
 *
 * One traversal per question. The state below belongs to that traversal
 * alone and is dropped when it ends. The RERANK edge exists only when
 * reranking is enabled; an unavailable judge sends the fused list on to
 * GENERATE and marks the run degraded.
 */

export interface PipelineState {
  query: Query;
  candidates: RetrievalCandidate[];
  fused: FusedResult[];
  reranked: RerankedResult[] | null;
  answer: Answer | null;
  stage: PipelineStage;
  error: PipelineError | null;
}

/** Chunk handed to generation, with the score that ranked it. */
export interface SupportingChunk {
  chunkId: string;
  score: number | null;
  chunk: Chunk;
}

interface RunReport {
  mode: RetrievalMode;
  effectiveMode: RetrievalMode;
  timings: StageTimings;
  budgetViolations: string[];
  degradations: Degradation[];
  visited: PipelineStage[];
  state: PipelineState;
}

export type PipelineOutcome =
  | (RunReport & {
      ok: true;
      answer: Answer;
      supporting: SupportingChunk[];
      degraded: boolean;
    })
  | (RunReport & {
      ok: false;
      error: PipelineError;
      /** Best ranking reached before the failure, if any. */
      partialRanking: SupportingChunk[] | null;
    });

export interface PipelineDeps {
  embedder: Embedder;
  retrieval: RetrievalEngine;
  rerank: RerankStage;
  generation: GenerationStage;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export function initialStage(cfg: FrozenPipelineConfig): PipelineStage {
  // Pure keyword retrieval never needs the query vector
  return cfg.retrieval.mode === 'keyword' ? 'RETRIEVE' : 'ENCODE';
}

/**
 * Success edges. FAILED is reachable from every working stage and is
 * decided by the caller, not here.
 */
export function nextStage(stage: PipelineStage, cfg: FrozenPipelineConfig): PipelineStage {
  switch (stage) {
    case 'ENCODE':
      return 'RETRIEVE';
    case 'RETRIEVE':
      return cfg.rerank.enabled ? 'RERANK' : 'GENERATE';
    case 'RERANK':
      return 'GENERATE';
    case 'GENERATE':
      return 'DONE';
    case 'DONE':
    case 'FAILED':
      return stage;
  }
}

function toSupporting(state: PipelineState): SupportingChunk[] {
  if (state.reranked) {
    return state.reranked.map((r) => ({ chunkId: r.chunkId, score: r.relevanceScore, chunk: r.chunk }));
  }
  return state.fused.map((f) => ({ chunkId: f.chunkId, score: f.fusedScore, chunk: f.chunk }));
}

function failureFor(stage: PipelineStage, error: unknown, hasPartialRanking: boolean): PipelineError {
  if (error instanceof PipelineError) return error;
  if (error instanceof PipelineCancelledError) {
    return new PipelineError(stage, 'Cancelled', error.message, hasPartialRanking, error);
  }
  if (error instanceof RetrievalError) {
    return new PipelineError(stage, 'BackendUnavailable', error.message, hasPartialRanking, error);
  }
  if (error instanceof EmbedderError) {
    return new PipelineError(stage, 'EmbedderUnavailable', error.message, hasPartialRanking, error);
  }
  if (error instanceof GenerationError) {
    return new PipelineError(stage, 'GenerationServiceUnavailable', error.message, hasPartialRanking, error);
  }
  const kind = stage === 'ENCODE' ? 'EmbedderUnavailable' : stage === 'GENERATE' ? 'GenerationServiceUnavailable' : 'BackendUnavailable';
  return new PipelineError(stage, kind, errorMessage(error), hasPartialRanking, error);
}

export class QueryPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.logger = deps.logger ?? rootLogger;
  }

  /**
   * Answer one question. Resolves on every path: failures come back as
   * `{ ok: false }` carrying a `PipelineError`, never as a rejection.
   */
  async runQuery(question: string, cfg: FrozenPipelineConfig, options: RunOptions = {}): Promise<PipelineOutcome> {
    const { signal } = options;
    const log = options.requestId ? this.logger.child({ requestId: options.requestId }) : this.logger;
    const runStart = Date.now();

    const state: PipelineState = {
      query: { text: question.trim(), vector: null },
      candidates: [],
      fused: [],
      reranked: null,
      answer: null,
      stage: initialStage(cfg),
      error: null,
    };
    const timings: StageTimings = { encode: 0, retrieval: 0, reranking: 0, synthesis: 0, total: 0 };
    const degradations: Degradation[] = [];
    const visited: PipelineStage[] = [];
    let effectiveMode: RetrievalMode = cfg.retrieval.mode;
    let retrieved = false;

    if (!state.query.text) {
      state.error = new PipelineError(state.stage, 'InvalidRequest', 'question must not be empty', false);
      state.stage = 'FAILED';
    }

    while (state.stage !== 'DONE' && state.stage !== 'FAILED') {
      const stage = state.stage;
      visited.push(stage);
      const stageStart = Date.now();

      try {
        if (signal?.aborted) throw new PipelineCancelledError();

        switch (stage) {
          case 'ENCODE': {
            state.query.vector = await callWithDeadline((s) => this.deps.embedder.embed(state.query.text, s), {
              timeoutMs: cfg.retrieval.backendTimeoutMs,
              signal,
              context: 'query embedding',
            }).catch((error: unknown) => {
              if (error instanceof PipelineCancelledError || error instanceof EmbedderError) throw error;
              throw new EmbedderError(errorMessage(error), error);
            });
            timings.encode = Date.now() - stageStart;
            break;
          }

          case 'RETRIEVE': {
            const outcome = await raceAbort(
              this.deps.retrieval.retrieve(state.query, cfg.retrieval.mode, cfg.retrieval, signal),
              signal
            );
            state.candidates = outcome.candidates;
            state.fused = outcome.fused;
            effectiveMode = outcome.effectiveMode;
            degradations.push(...outcome.degradations);
            retrieved = true;
            timings.retrieval = Date.now() - stageStart;
            break;
          }

          case 'RERANK': {
            try {
              const outcome = await raceAbort(
                this.deps.rerank.rerank(state.query.text, state.fused, cfg.rerank, signal),
                signal
              );
              state.reranked = outcome.results;
            } catch (error) {
              if (error instanceof PipelineCancelledError) throw error;
              // Degrade: generation gets the fused list unchanged
              degradations.push('rerank-unavailable');
              log.warn(
                { error: errorMessage(error), unavailable: error instanceof RerankUnavailableError },
                'Reranking unavailable, continuing with fused order'
              );
            }
            timings.reranking = Date.now() - stageStart;
            break;
          }

          case 'GENERATE': {
            const supporting = toSupporting(state).map((s) => s.chunk);
            state.answer = await raceAbort(
              this.deps.generation.generate(state.query.text, supporting, cfg.generation, signal),
              signal
            );
            timings.synthesis = Date.now() - stageStart;
            break;
          }
        }

        state.stage = nextStage(stage, cfg);
      } catch (error) {
        state.error = failureFor(stage, error, retrieved);
        state.stage = 'FAILED';
      }
    }

    timings.total = Date.now() - runStart;
    const budgetViolations = this.checkBudgets(timings, cfg, log);

    const report: RunReport = {
      mode: cfg.retrieval.mode,
      effectiveMode,
      timings,
      budgetViolations,
      degradations,
      visited,
      state,
    };

    if (state.stage === 'DONE' && state.answer) {
      log.info(
        {
          totalLatency: timings.total,
          visited,
          degradations,
          citations: state.answer.citations.length,
        },
        'Query run completed'
      );
      return {
        ...report,
        ok: true,
        answer: state.answer,
        supporting: toSupporting(state),
        degraded: degradations.length > 0,
      };
    }

    const error = state.error ?? new PipelineError(state.stage, 'BackendUnavailable', 'run ended without an answer', retrieved);
    state.answer = null;
    log.error(
      { stage: error.stage, kind: error.kind, error: error.message, totalLatency: timings.total },
      'Query run failed'
    );
    return {
      ...report,
      ok: false,
      error,
      partialRanking: retrieved ? toSupporting(state) : null,
    };
  }

  private checkBudgets(timings: StageTimings, cfg: FrozenPipelineConfig, log: Logger): string[] {
    const budgets = cfg.latencyBudgets;
    const checks: Array<[keyof StageTimings, number]> = [
      ['encode', budgets.encode],
      ['retrieval', budgets.retrieval],
      ['reranking', budgets.reranking],
      ['synthesis', budgets.synthesis],
      ['total', budgets.total],
    ];

    const violations: string[] = [];
    for (const [stage, budget] of checks) {
      const { exceeded, violation } = checkLatencyBudget(timings[stage], budget, stage);
      if (exceeded && violation) {
        violations.push(stage);
        log.warn({ violation }, 'Stage exceeded latency budget');
      }
    }
    return violations;
  }
}
