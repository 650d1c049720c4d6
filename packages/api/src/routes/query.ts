import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { QueryDebugInfo, QueryFailureResponse, QueryRequest, QueryResponse } from '@docqa/shared';
import type { PipelineOutcome, QueryPipeline } from '../pipeline/controller';
import {
  resolvePipelineConfig,
  type FrozenPipelineConfig,
  type PipelineConfigOverrides,
} from '../pipeline/config';
import type { QueryRunRecord, QueryRunStore } from '../repositories/queryRuns';
import { InvalidPipelineConfigError } from '../utils/errors';

const QueryRequestSchema = z.object({
  question: z.string().min(1).max(1000),
  options: z
    .object({
      mode: z.enum(['vector', 'keyword', 'hybrid', 'fusion']).optional(),
      topK: z.number().int().positive().max(100).optional(),
      documentId: z.string().min(1).optional(),
      rerank: z.boolean().optional(),
      candidateCount: z.number().int().positive().max(50).optional(),
      includeDebug: z.boolean().optional(),
    })
    .optional(),
}) satisfies z.ZodType<QueryRequest>;

type QueryRequestOptions = NonNullable<QueryRequest['options']>;

export interface QueryRouteOptions {
  pipeline: QueryPipeline;
  baseConfig: FrozenPipelineConfig;
  /** Run records; null disables persistence. */
  runs: QueryRunStore | null;
}

export function overridesFromRequest(options: QueryRequestOptions = {}): PipelineConfigOverrides {
  return {
    retrieval: {
      ...(options.mode ? { mode: options.mode } : {}),
      // topK bounds the final list in every mode, fusion included
      ...(options.topK ? { topK: options.topK, mergeTopK: options.topK } : {}),
      ...(options.documentId ? { filters: { documentId: options.documentId } } : {}),
    },
    rerank: {
      ...(options.rerank !== undefined ? { enabled: options.rerank } : {}),
      ...(options.candidateCount ? { candidateCount: options.candidateCount } : {}),
    },
  };
}

function debugInfo(outcome: PipelineOutcome): QueryDebugInfo {
  const { state } = outcome;
  return {
    stages: outcome.visited,
    effectiveMode: outcome.effectiveMode,
    candidates: state.candidates,
    fused: state.fused.map((f) => ({ chunkId: f.chunkId, fusedScore: f.fusedScore })),
    reranked: state.reranked
      ? state.reranked.map((r) => ({ chunkId: r.chunkId, relevanceScore: r.relevanceScore }))
      : null,
  };
}

export function runRecord(requestId: string, question: string, outcome: PipelineOutcome): QueryRunRecord {
  const { state } = outcome;
  const base = {
    requestId,
    question,
    mode: outcome.mode,
    degradations: [...outcome.degradations],
    latency: { ...outcome.timings },
    chunksRetrieved: state.fused.length,
    chunksReranked: state.reranked?.length ?? 0,
    latencyViolations: [...outcome.budgetViolations],
  };

  if (outcome.ok) {
    return {
      ...base,
      status: 'done',
      answer: outcome.answer.text,
      citations: outcome.answer.citations,
      failedStage: null,
      errorKind: null,
      chunksUsed: outcome.answer.citations.length,
    };
  }
  return {
    ...base,
    status: 'failed',
    answer: null,
    citations: [],
    failedStage: outcome.error.stage,
    errorKind: outcome.error.kind,
    chunksUsed: 0,
  };
}

/**
 * HTTP status for a failed run: 400 for a bad request, 499 when the client
 * went away, 503 for an unavailable dependency.
 */
function failureStatus(outcome: Extract<PipelineOutcome, { ok: false }>): number {
  switch (outcome.error.kind) {
    case 'InvalidRequest':
      return 400;
    case 'Cancelled':
      return 499;
    default:
      return 503;
  }
}

export const queryRoutes: FastifyPluginAsync<QueryRouteOptions> = async (fastify, opts) => {
  const { pipeline, baseConfig, runs } = opts;

  async function recordRun(record: QueryRunRecord): Promise<void> {
    if (!runs) return;
    try {
      await runs.insert(record);
    } catch (error) {
      // Non-critical: the answer is already computed
      fastify.log.error({ requestId: record.requestId, error }, 'Failed to store query run');
    }
  }

  function sendFailure(
    reply: FastifyReply,
    requestId: string,
    outcome: Extract<PipelineOutcome, { ok: false }>
  ): FastifyReply {
    const body: QueryFailureResponse = {
      requestId,
      error: outcome.error.message,
      stage: outcome.error.stage,
      kind: outcome.error.kind,
      partialRankingAvailable: outcome.error.hasPartialRanking,
    };
    return reply.code(failureStatus(outcome)).send(body);
  }

  /**
   * POST /api/v1/query
   * Answer one question: encode, retrieve, rerank, generate.
   */
  fastify.post('/', async (request, reply) => {
    const requestId = request.id;

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    const { question, options } = validation.data;

    let runConfig: FrozenPipelineConfig;
    try {
      runConfig = resolvePipelineConfig(overridesFromRequest(options), baseConfig);
    } catch (error) {
      if (error instanceof InvalidPipelineConfigError) {
        return reply.code(400).send({ error: 'Invalid options', details: error.issues });
      }
      throw error;
    }

    // A client that disconnects before the response is written cancels the run
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) controller.abort();
    };
    reply.raw.on('close', onClose);

    fastify.log.info({ requestId, question, mode: runConfig.retrieval.mode }, 'Processing query');

    let outcome: PipelineOutcome;
    try {
      outcome = await pipeline.runQuery(question, runConfig, { signal: controller.signal, requestId });
    } finally {
      reply.raw.off('close', onClose);
    }

    await recordRun(runRecord(requestId, question, outcome));

    if (!outcome.ok) {
      return sendFailure(reply, requestId, outcome);
    }

    const { answer } = outcome;
    const response: QueryResponse = {
      requestId,
      question,
      answer: answer.text,
      citations: answer.citations,
      citationSource: answer.citationSource,
      ...(answer.refusalReason ? { refusalReason: answer.refusalReason } : {}),
      sources: outcome.supporting.map((s) => ({
        chunkId: s.chunkId,
        documentId: s.chunk.documentId,
        pageStart: s.chunk.pageStart,
        pageEnd: s.chunk.pageEnd,
        content: s.chunk.text,
        score: s.score,
      })),
      degraded: outcome.degraded,
      degradations: outcome.degradations,
      metadata: {
        mode: outcome.effectiveMode,
        latency: outcome.timings,
        chunksRetrieved: outcome.state.fused.length,
        chunksReranked: outcome.state.reranked?.length ?? 0,
        chunksUsed: answer.citations.length,
        latencyBudgetViolations: outcome.budgetViolations,
      },
      ...(options?.includeDebug ? { debug: debugInfo(outcome) } : {}),
    };

    fastify.log.info(
      { requestId, totalLatency: outcome.timings.total, chunksUsed: answer.citations.length },
      'Query processed successfully'
    );

    return response;
  });
};
