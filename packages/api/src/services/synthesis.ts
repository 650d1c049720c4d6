import { REFUSAL_ANSWER, type Answer, type Chunk } from '@docqa/shared';
import type { Generator } from '../adapters/types';
import type { Frozen, GenerationConfig } from '../pipeline/config';
import { callWithDeadline } from '../utils/async';
import { GenerationError, PipelineCancelledError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Answer Synthesis Service
 *
 * Generates a grounded answer from ranked chunks and attributes it.
 *
 * Citation policy (`citationPolicy`):
 * - 'markers': chunks whose [n] marker appears in the answer, in order of
 *   first appearance. An answer with no valid marker cites every context
 *   chunk and says so through `citationSource: 'all-context'`.
 * - 'all-context': every context chunk, always.
 *
 * A refusal cites nothing.
 */

const REFUSAL_PHRASES = [
  "don't have enough information",
  'insufficient information',
  'cannot answer',
  'not enough context',
  'unable to answer',
];

/**
 * Check if answer is a refusal.
 */
export function checkIfRefusal(answer: string): boolean {
  const lowerAnswer = answer.toLowerCase();
  return REFUSAL_PHRASES.some((phrase) => lowerAnswer.includes(phrase));
}

/**
 * Bounded context in incoming rank order: at most `maxContextChunks`
 * chunks and `maxContextChars` characters of text. The first chunk is kept
 * even when it alone exceeds the budget (its text is cut to fit).
 */
export function assembleContext(chunks: readonly Chunk[], cfg: Frozen<GenerationConfig>): Chunk[] {
  const context: Chunk[] = [];
  let used = 0;

  for (const chunk of chunks.slice(0, cfg.maxContextChunks)) {
    const size = chunk.text.length;
    if (context.length === 0 && size > cfg.maxContextChars) {
      context.push({ ...chunk, text: chunk.text.slice(0, cfg.maxContextChars) });
      break;
    }
    if (used + size > cfg.maxContextChars) break;
    context.push(chunk);
    used += size;
  }

  return context;
}

/**
 * 1-based context positions referenced as [n] in the answer, in order of
 * first appearance. `[1, 3]` and `[1][3]` both count.
 */
export function extractCitationMarkers(answer: string, contextSize: number): number[] {
  const positions: number[] = [];
  for (const group of answer.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of group[1].split(',')) {
      const n = parseInt(part.trim(), 10);
      if (n >= 1 && n <= contextSize && !positions.includes(n)) {
        positions.push(n);
      }
    }
  }
  return positions;
}

export function attributeAnswer(
  text: string,
  context: Chunk[],
  policy: GenerationConfig['citationPolicy']
): Answer {
  if (checkIfRefusal(text)) {
    return { text, citations: [], citationSource: 'markers', refusalReason: 'Insufficient context' };
  }

  const allContext = context.map((c) => c.id);
  if (policy === 'all-context') {
    return { text, citations: allContext, citationSource: 'all-context' };
  }

  const markers = extractCitationMarkers(text, context.length);
  if (markers.length === 0) {
    return { text, citations: allContext, citationSource: 'all-context' };
  }
  return { text, citations: markers.map((n) => context[n - 1].id), citationSource: 'markers' };
}

export class GenerationStage {
  constructor(private readonly generator: Generator) {}

  /**
   * @throws GenerationError when the generator fails, times out or returns nothing
   */
  async generate(
    question: string,
    supporting: readonly Chunk[],
    cfg: Frozen<GenerationConfig>,
    signal?: AbortSignal
  ): Promise<Answer> {
    const startTime = Date.now();

    if (supporting.length === 0) {
      logger.warn('No supporting chunks, answering with a refusal');
      return {
        text: REFUSAL_ANSWER,
        citations: [],
        citationSource: 'markers',
        refusalReason: 'No supporting context',
      };
    }

    const context = assembleContext(supporting, cfg);

    let text: string;
    try {
      text = await callWithDeadline(
        (s) => this.generator.complete(question, context, { model: cfg.model, signal: s }),
        { timeoutMs: cfg.timeoutMs, signal, context: 'answer generation' }
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError) throw error;
      logger.error({ error: errorMessage(error) }, 'Answer synthesis failed');
      throw new GenerationError('ServiceUnavailable', errorMessage(error), error);
    }

    if (!text.trim()) {
      throw new GenerationError('ServiceUnavailable', 'generator returned an empty answer');
    }

    const answer = attributeAnswer(text.trim(), context, cfg.citationPolicy);

    logger.info(
      {
        latency: Date.now() - startTime,
        chunksUsed: context.length,
        citations: answer.citations.length,
        citationSource: answer.citationSource,
        refused: answer.refusalReason !== undefined,
      },
      'Answer synthesis completed'
    );

    return answer;
  }
}
