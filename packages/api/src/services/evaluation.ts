import { z } from 'zod';
import type { GradeResult } from '@docqa/shared';
import type { QueryPipeline } from '../pipeline/controller';
import { resolvePipelineConfig, type FrozenPipelineConfig } from '../pipeline/config';
import type { LLMClient } from '../utils/llm';
import { runWithConcurrency, withTimeout } from '../utils/async';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Answer grading.
 *
 * An LLM compares a generated answer against a ground truth and answers
 * "true" or "false" with a short reasoning. `isSame` is true only when the
 * first word of `result` is "true".
 */

const GradeResponseSchema = z.object({
  result: z.string(),
  reasoning: z.string().nullish(),
});

export interface GradeInput {
  question: string;
  groundTruth: string;
  generatedAnswer: string;
}

export interface GradeOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function buildGradePrompt(input: GradeInput): string {
  return `You are grading a question-answering system. Decide whether the generated answer conveys the same answer as the ground truth. Ignore wording, formatting and rounding differences that do not change the meaning.

Respond with ONLY a JSON object: {"result": "true" | "false", "reasoning": "<one sentence>"}

Question: ${input.question}

Ground truth: ${input.groundTruth}

Generated answer: ${input.generatedAnswer}`;
}

/**
 * Read the grader's JSON reply. A reply that is not the expected object is
 * graded as not the same, with the raw text kept as the result.
 */
export function parseGradeResponse(raw: string): GradeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { result: raw.trim(), isSame: false, reasoning: null };
  }

  const validation = GradeResponseSchema.safeParse(parsed);
  if (!validation.success) {
    return { result: raw.trim(), isSame: false, reasoning: null };
  }

  const result = validation.data.result.trim();
  const first = result.split(/\s+/)[0]?.toLowerCase() ?? '';
  return {
    result,
    isSame: first === 'true',
    reasoning: validation.data.reasoning ?? null,
  };
}

export async function gradeAnswer(llm: LLMClient, input: GradeInput, options: GradeOptions = {}): Promise<GradeResult> {
  const startTime = Date.now();

  const raw = await withTimeout(
    llm.generate(buildGradePrompt(input), {
      temperature: 0,
      maxTokens: 200,
      jsonMode: true,
      signal: options.signal,
    }),
    options.timeoutMs,
    'answer grading'
  );

  const grade = parseGradeResponse(raw);
  logger.info({ latency: Date.now() - startTime, isSame: grade.isSame }, 'Answer graded');
  return grade;
}

export interface BatchItem {
  question: string;
  groundTruth: string;
  /** Restrict retrieval to one source document. */
  documentId?: string;
}

export interface BatchItemResult {
  question: string;
  groundTruth: string;
  answer: string | null;
  citations: string[];
  grade: GradeResult | null;
  /** Why the item has no grade: a failed run or a failed grading call. */
  error: string | null;
}

export interface BatchEvaluation {
  total: number;
  correct: number;
  errors: number;
  /** correct / total; items that errored count as wrong. */
  accuracy: number;
  items: BatchItemResult[];
}

export interface BatchOptions {
  concurrency: number;
  gradeTimeoutMs?: number;
}

/**
 * Answer each question through the pipeline and grade it against its
 * ground truth, at most `concurrency` items at a time. One item failing
 * never stops the others.
 */
export async function evaluateBatch(
  pipeline: QueryPipeline,
  grader: LLMClient,
  items: BatchItem[],
  baseConfig: FrozenPipelineConfig,
  options: BatchOptions
): Promise<BatchEvaluation> {
  const startTime = Date.now();

  const evaluateItem = async (item: BatchItem): Promise<BatchItemResult> => {
    const result: BatchItemResult = {
      question: item.question,
      groundTruth: item.groundTruth,
      answer: null,
      citations: [],
      grade: null,
      error: null,
    };

    const cfg = item.documentId
      ? resolvePipelineConfig({ retrieval: { filters: { documentId: item.documentId } } }, baseConfig)
      : baseConfig;
    const outcome = await pipeline.runQuery(item.question, cfg);
    if (!outcome.ok) {
      return { ...result, error: `${outcome.error.stage}/${outcome.error.kind}: ${outcome.error.message}` };
    }

    const answered = { ...result, answer: outcome.answer.text, citations: outcome.answer.citations };
    try {
      const grade = await gradeAnswer(
        grader,
        { question: item.question, groundTruth: item.groundTruth, generatedAnswer: outcome.answer.text },
        { timeoutMs: options.gradeTimeoutMs }
      );
      return { ...answered, grade };
    } catch (error) {
      return { ...answered, error: `grading: ${errorMessage(error)}` };
    }
  };

  const results = await runWithConcurrency(items, options.concurrency, evaluateItem);

  const correct = results.filter((r) => r.grade?.isSame === true).length;
  const errors = results.filter((r) => r.error !== null).length;
  const evaluation: BatchEvaluation = {
    total: results.length,
    correct,
    errors,
    accuracy: results.length > 0 ? correct / results.length : 0,
    items: results,
  };

  logger.info(
    { latency: Date.now() - startTime, total: evaluation.total, correct, errors },
    'Batch evaluation completed'
  );
  return evaluation;
}
