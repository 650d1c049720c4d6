import { z } from 'zod';
import { config, type AppConfig } from '../config';
import { KEYWORD_PROPERTIES, isKeywordProperty, type KeywordProperty } from '../adapters/types';
import { InvalidPipelineConfigError } from '../utils/errors';

/**
 * Per-run pipeline configuration.
 *
 * Built from environment defaults plus per-request overrides, validated
 * once, then frozen: a run never sees its configuration change.
 */

const positiveInt = z.number().int().positive();

const keywordPropertySchema = z.custom<KeywordProperty>(
  (value) => typeof value === 'string' && isKeywordProperty(value),
  { message: `keyword property must be one of ${KEYWORD_PROPERTIES.join(', ')}` }
);

export const PipelineConfigSchema = z.object({
  retrieval: z.object({
    mode: z.enum(['vector', 'keyword', 'hybrid', 'fusion']),
    topK: positiveInt,
    vectorTopK: positiveInt,
    keywordTopK: positiveInt,
    mergeTopK: positiveInt,
    rrfK: z.number().positive(),
    hybridAlpha: z.number().min(0).max(1),
    keywordProperties: z.array(keywordPropertySchema).min(1),
    backendTimeoutMs: positiveInt,
    filters: z.object({ documentId: z.string().min(1).optional() }),
  }),
  rerank: z.object({
    enabled: z.boolean(),
    candidateCount: positiveInt,
    maxConcurrency: positiveInt,
    batchSize: positiveInt,
    callTimeoutMs: positiveInt,
    stageTimeoutMs: positiveInt,
    excerptMaxChars: positiveInt,
  }),
  generation: z.object({
    model: z.string().min(1),
    maxContextChunks: positiveInt,
    maxContextChars: positiveInt,
    timeoutMs: positiveInt,
    citationPolicy: z.enum(['markers', 'all-context']),
  }),
  latencyBudgets: z.object({
    encode: positiveInt,
    retrieval: positiveInt,
    reranking: positiveInt,
    synthesis: positiveInt,
    total: positiveInt,
  }),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RetrievalConfig = PipelineConfig['retrieval'];
export type RerankConfig = PipelineConfig['rerank'];
export type GenerationConfig = PipelineConfig['generation'];

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

export type Frozen<T> = T extends (infer U)[]
  ? ReadonlyArray<Frozen<U>>
  : T extends object
    ? { readonly [K in keyof T]: Frozen<T[K]> }
    : T;

export type FrozenPipelineConfig = Frozen<PipelineConfig>;

function deepFreeze<T>(value: T): Frozen<T>;
function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function validate(candidate: unknown): FrozenPipelineConfig {
  const result = PipelineConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidPipelineConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return deepFreeze(result.data);
}

/**
 * Pipeline configuration from the environment (see `config.rag`).
 */
export function defaultPipelineConfig(env: Pick<AppConfig, 'rag' | 'openai'> = config): FrozenPipelineConfig {
  const { rag } = env;
  return validate({
    retrieval: {
      mode: rag.mode,
      topK: rag.topK,
      vectorTopK: rag.topKVector,
      keywordTopK: rag.topKKeyword,
      mergeTopK: rag.mergeTopK,
      rrfK: rag.rrfK,
      hybridAlpha: rag.hybridAlpha,
      keywordProperties: [...rag.keywordProperties],
      backendTimeoutMs: rag.backendTimeoutMs,
      filters: {},
    },
    rerank: {
      enabled: rag.rerankEnabled,
      candidateCount: rag.rerankCandidates,
      maxConcurrency: rag.rerankMaxConcurrency,
      batchSize: rag.rerankBatchSize,
      callTimeoutMs: rag.rerankCallTimeoutMs,
      stageTimeoutMs: rag.rerankStageTimeoutMs,
      excerptMaxChars: rag.rerankExcerptChars,
    },
    generation: {
      model: env.openai.model,
      maxContextChunks: rag.maxContextChunks,
      maxContextChars: rag.maxContextChars,
      timeoutMs: rag.generationTimeoutMs,
      citationPolicy: rag.citationPolicy,
    },
    latencyBudgets: { ...rag.latencyBudgets },
  });
}

/**
 * Merge overrides section by section onto a base configuration and validate.
 * @throws InvalidPipelineConfigError
 */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
  base: FrozenPipelineConfig = defaultPipelineConfig()
): FrozenPipelineConfig {
  return validate({
    retrieval: {
      ...base.retrieval,
      ...overrides.retrieval,
      filters: { ...base.retrieval.filters, ...overrides.retrieval?.filters },
    },
    rerank: { ...base.rerank, ...overrides.rerank },
    generation: { ...base.generation, ...overrides.generation },
    latencyBudgets: { ...base.latencyBudgets, ...overrides.latencyBudgets },
  });
}
