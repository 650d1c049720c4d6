import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { generateRequestId } from '@docqa/shared';
import type { DocumentInventory } from './adapters/types';
import type { FrozenPipelineConfig } from './pipeline/config';
import type { QueryPipeline } from './pipeline/controller';
import type { QueryRunStore } from './repositories/queryRuns';
import { documentRoutes } from './routes/documents';
import { evaluationRoutes } from './routes/evaluation';
import { healthRoutes, type HealthCheck } from './routes/health';
import { queryRoutes } from './routes/query';
import type { LLMClient } from './utils/llm';
import { logger } from './utils/logger';

export interface ServerDeps {
  pipeline: QueryPipeline;
  baseConfig: FrozenPipelineConfig;
  inventory: DocumentInventory;
  runs: QueryRunStore;
  grader: LLMClient | null;
  healthChecks?: Record<string, HealthCheck>;
  corsOrigins?: string[];
  version?: string;
}

/**
 * Assemble the HTTP server. Nothing listens until the caller does.
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { level: logger.level },
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => generateRequestId(),
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: deps.corsOrigins ?? true,
    credentials: true,
  });

  await fastify.register(healthRoutes, {
    prefix: '/health',
    version: deps.version ?? '0.1.0',
    checks: deps.healthChecks ?? {},
  });
  await fastify.register(queryRoutes, {
    prefix: '/api/v1/query',
    pipeline: deps.pipeline,
    baseConfig: deps.baseConfig,
    runs: deps.runs,
  });
  await fastify.register(documentRoutes, {
    prefix: '/api/v1/documents',
    inventory: deps.inventory,
  });
  await fastify.register(evaluationRoutes, {
    prefix: '/api/v1/evaluation',
    runs: deps.runs,
    grader: deps.grader,
    pipeline: deps.pipeline,
    baseConfig: deps.baseConfig,
    gradeTimeoutMs: deps.baseConfig.generation.timeoutMs,
  });

  return fastify;
}
