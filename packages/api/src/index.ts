import { config } from './config';
import { CircuitBreakerJudge } from './adapters/circuitBreakerJudge';
import { LlmJudge } from './adapters/llmJudge';
import { OpenAIGenerator } from './adapters/openaiGenerator';
import { PostgresSearchBackend } from './adapters/postgresBackend';
import { WorkerEmbedder } from './adapters/workerEmbedder';
import { defaultPipelineConfig } from './pipeline/config';
import { QueryPipeline } from './pipeline/controller';
import { QueryRunRepository } from './repositories/queryRuns';
import { buildServer } from './server';
import { RerankStage } from './services/reranking';
import { RetrievalEngine } from './services/retrieval';
import { GenerationStage } from './services/synthesis';
import { checkDatabaseHealth, closeDatabase, sql } from './utils/db';
import { GroqClient } from './utils/llm';
import { logger } from './utils/logger';
import { RedisEmbeddingCache, checkRedisHealth, createRedisClient } from './utils/redis';

async function start() {
  // Validates every RAG_* setting before anything connects
  const baseConfig = defaultPipelineConfig();

  if (!config.groq.apiKey) {
    throw new Error(
      'GROQ_API_KEY is not set. Please configure it in .env file. ' +
      'Get free tier at: https://console.groq.com'
    );
  }
  if (!config.openai.apiKey) {
    throw new Error('OPENAI_API_KEY is not set. Please configure it in .env file.');
  }

  const redis = createRedisClient();
  const backend = new PostgresSearchBackend(sql);
  const embedder = new WorkerEmbedder({ cache: new RedisEmbeddingCache(redis) });
  const llm = new GroqClient();
  const judge = new CircuitBreakerJudge(new LlmJudge(llm));
  const generator = new OpenAIGenerator();

  const pipeline = new QueryPipeline({
    embedder,
    retrieval: new RetrievalEngine(backend, embedder),
    rerank: new RerankStage(judge),
    generation: new GenerationStage(generator),
  });

  const fastify = await buildServer({
    pipeline,
    baseConfig,
    inventory: backend,
    runs: new QueryRunRepository(sql),
    grader: llm,
    corsOrigins: [...config.corsOrigins],
    healthChecks: {
      database: () => checkDatabaseHealth(sql),
      redis: () => checkRedisHealth(redis),
    },
  });

  logger.info(
    { mode: baseConfig.retrieval.mode, rerank: baseConfig.rerank.enabled, judgeModel: llm.getModel() },
    'Pipeline configured'
  );

  await fastify.listen({
    port: config.port,
    host: config.host,
  });

  logger.info(`API server running at http://${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await fastify.close();
    await redis.quit();
    await closeDatabase();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

start().catch((err) => {
  logger.error(err, 'Failed to start server');
  process.exit(1);
});
