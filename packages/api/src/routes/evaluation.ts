import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { FrozenPipelineConfig } from '../pipeline/config';
import type { QueryPipeline } from '../pipeline/controller';
import type { QueryRunStore } from '../repositories/queryRuns';
import { evaluateBatch, gradeAnswer } from '../services/evaluation';
import type { LLMClient } from '../utils/llm';
import { TimeoutError } from '../utils/errors';

/**
 * Evaluation Routes
 *
 * Endpoints:
 * - POST /api/v1/evaluation/grade - Grade a generated answer against a ground truth
 * - POST /api/v1/evaluation/batch - Answer and grade a question set, with overall accuracy
 * - GET /api/v1/evaluation/stats - Aggregates over stored query runs
 * - GET /api/v1/evaluation/:requestId - Stored record of one query run
 * - GET /api/v1/evaluation/recent - Most recent query runs
 */

const GradeRequestSchema = z.object({
  question: z.string().min(1).max(1000),
  groundTruth: z.string().min(1).max(5000),
  generatedAnswer: z.string().min(1).max(10000),
});

const BatchRequestSchema = z.object({
  items: z
    .array(
      z.object({
        question: z.string().min(1).max(1000),
        groundTruth: z.string().min(1).max(5000),
        documentId: z.string().min(1).optional(),
      })
    )
    .min(1)
    .max(100),
  concurrency: z.number().int().positive().max(16).optional(),
});

const RecentQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional().default(20),
  status: z.enum(['done', 'failed']).optional(),
});

export interface EvaluationRouteOptions {
  runs: QueryRunStore;
  /** Grading model; null leaves /grade and /batch unavailable. */
  grader: LLMClient | null;
  pipeline: QueryPipeline;
  baseConfig: FrozenPipelineConfig;
  gradeTimeoutMs?: number;
  /** Items of a batch in flight at once, unless the request asks for fewer or more. */
  batchConcurrency?: number;
}

export const evaluationRoutes: FastifyPluginAsync<EvaluationRouteOptions> = async (fastify, opts) => {
  const { runs, grader, pipeline, baseConfig } = opts;

  /**
   * POST /api/v1/evaluation/grade
   */
  fastify.post('/grade', async (request, reply) => {
    const validation = GradeRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    if (!grader) {
      return reply.code(503).send({ error: 'Grading model not configured' });
    }

    try {
      return await gradeAnswer(grader, validation.data, { timeoutMs: opts.gradeTimeoutMs });
    } catch (error) {
      fastify.log.error({ error }, 'Failed to grade answer');
      return reply.code(error instanceof TimeoutError ? 504 : 503).send({
        error: 'Failed to grade answer',
      });
    }
  });

  /**
   * POST /api/v1/evaluation/batch
   */
  fastify.post('/batch', async (request, reply) => {
    const validation = BatchRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    if (!grader) {
      return reply.code(503).send({ error: 'Grading model not configured' });
    }

    const { items, concurrency } = validation.data;
    fastify.log.info({ items: items.length }, 'Running batch evaluation');

    return evaluateBatch(pipeline, grader, items, baseConfig, {
      concurrency: concurrency ?? opts.batchConcurrency ?? 4,
      gradeTimeoutMs: opts.gradeTimeoutMs,
    });
  });

  /**
   * GET /api/v1/evaluation/stats
   */
  fastify.get('/stats', async (_request, reply) => {
    try {
      return await runs.stats();
    } catch (error) {
      fastify.log.error({ error }, 'Failed to fetch query run stats');
      return reply.code(500).send({
        error: 'Failed to fetch query run stats',
      });
    }
  });

  /**
   * GET /api/v1/evaluation/recent
   */
  fastify.get('/recent', async (request, reply) => {
    const validation = RecentQuerySchema.safeParse(request.query);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid query parameters',
        details: validation.error.issues,
      });
    }

    const { limit, status } = validation.data;

    try {
      const records = await runs.recent(limit, status);
      return {
        count: records.length,
        runs: records,
      };
    } catch (error) {
      fastify.log.error({ error }, 'Failed to fetch recent query runs');
      return reply.code(500).send({
        error: 'Failed to fetch recent query runs',
      });
    }
  });

  /**
   * GET /api/v1/evaluation/:requestId
   */
  fastify.get<{ Params: { requestId: string } }>('/:requestId', async (request, reply) => {
    const { requestId } = request.params;

    try {
      const record = await runs.getByRequestId(requestId);
      if (!record) {
        return reply.code(404).send({
          error: 'Query run not found',
          requestId,
        });
      }
      return record;
    } catch (error) {
      fastify.log.error({ error, requestId }, 'Failed to fetch query run');
      return reply.code(500).send({
        error: 'Failed to fetch query run',
      });
    }
  });
};
