import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';
import type { Judge, JudgeInput } from './types';

/**
 * LLM relevance judge.
 *
 * Renders the scoring prompt and returns the model's raw text. The model is
 * asked for a number in 0.0-1.0 but nothing here trusts that it complies.
 */

export interface LlmJudgeOptions {
  temperature?: number;
  maxTokens?: number;
}

function describeCandidate(input: JudgeInput): string {
  return [
    `Summary: ${input.summary}`,
    `Keywords: ${input.keywords.join(', ')}`,
    `Excerpt: ${input.chunkText}`,
  ].join('\n');
}

export function buildJudgePrompt(input: JudgeInput): string {
  return `You are a relevance scoring system. Given a question and one text chunk, score how useful the chunk is for answering the question (0.0-1.0).

Respond with ONLY a JSON object: {"score": <number>}

Question: ${input.question}

Chunk:
${describeCandidate(input)}

Score:`;
}

export function buildBatchJudgePrompt(inputs: JudgeInput[]): string {
  const question = inputs[0]?.question ?? '';
  const chunksText = inputs
    .map((input, idx) => `[Chunk ${idx + 1}]\n${describeCandidate(input)}`)
    .join('\n\n');

  return `You are a relevance scoring system. Given a question and text chunks, score each chunk's relevance to the question (0.0-1.0).

Respond with ONLY a JSON array of numbers (one score per chunk, in order):
[score1, score2, ...]

Question: ${question}

Chunks:
${chunksText}

Scores:`;
}

/**
 * Split a batch response into one raw string per candidate.
 * Entries the model left out come back empty, which the parser treats as unscored.
 */
export function splitBatchResponse(responseText: string, count: number): string[] {
  const match = responseText.match(/\[[^\[\]]*\]/);
  let entries: unknown[] = [];
  if (match) {
    try {
      const parsed: unknown = JSON.parse(match[0]);
      if (Array.isArray(parsed)) entries = parsed;
    } catch {
      entries = [];
    }
  }
  if (entries.length === 0) {
    logger.warn({ responseText }, 'Failed to parse batch scores');
  }
  return Array.from({ length: count }, (_, idx) => (idx < entries.length ? JSON.stringify(entries[idx]) : ''));
}

export class LlmJudge implements Judge {
  constructor(
    private readonly llm: LLMClient,
    private readonly options: LlmJudgeOptions = {}
  ) {}

  async score(input: JudgeInput, signal?: AbortSignal): Promise<string> {
    return this.llm.generate(buildJudgePrompt(input), {
      temperature: this.options.temperature ?? 0,
      maxTokens: this.options.maxTokens ?? 20,
      signal,
    });
  }

  async scoreBatch(inputs: JudgeInput[], signal?: AbortSignal): Promise<string[]> {
    if (inputs.length === 0) return [];
    const responseText = await this.llm.generate(buildBatchJudgePrompt(inputs), {
      temperature: this.options.temperature ?? 0,
      maxTokens: this.options.maxTokens ?? 100,
      signal,
    });
    return splitBatchResponse(responseText, inputs.length);
  }
}
