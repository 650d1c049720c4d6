import OpenAI from 'openai';
import type { Chunk } from '@docqa/shared';
import { config } from '../config';
import { logger } from '../utils/logger';
import type { GenerateOptions, Generator } from './types';

/**
 * Answer generator on the OpenAI chat API.
 *
 * STRICT GROUNDING POLICY:
 * - Answer ONLY from provided context
 * - Refuse when context is insufficient
 * - Cite context blocks by their [n] marker
 */

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  client?: OpenAI;
}

/**
 * System prompt enforcing strict grounding.
 */
export function buildSystemPrompt(): string {
  return `You are a precise question-answering system. Your job is to answer questions using ONLY the provided context.

STRICT RULES:
1. Answer ONLY using information from the provided context
2. If the context does not contain enough information to answer, respond with: "I don't have enough information to answer this question."
3. Do NOT use external knowledge or make assumptions
4. Cite the context blocks you used by their number (e.g., "According to [1]...")
5. Be concise but complete

Your goal is CORRECTNESS, not fluency. If unsure, refuse to answer.`;
}

function locator(chunk: Chunk): string {
  const parts = [chunk.documentId];
  if (chunk.pageStart !== null) {
    parts.push(
      chunk.pageEnd !== null && chunk.pageEnd !== chunk.pageStart
        ? `pp. ${chunk.pageStart}-${chunk.pageEnd}`
        : `p. ${chunk.pageStart}`
    );
  }
  if (chunk.sectionTitle) parts.push(chunk.sectionTitle);
  return parts.join(', ');
}

/**
 * Numbered context blocks, in the order given.
 */
export function buildContext(chunks: Chunk[]): string {
  return chunks.map((chunk, idx) => `[${idx + 1}] (${locator(chunk)})\n${chunk.text.trim()}`).join('\n\n');
}

export function buildUserPrompt(question: string, chunks: Chunk[]): string {
  return `Context:
${buildContext(chunks)}

Question: ${question}

Answer (using ONLY the context above):`;
}

export class OpenAIGenerator implements Generator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIGeneratorOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey ?? config.openai.apiKey, maxRetries: 0 });
    this.model = options.model ?? config.openai.model;
    this.temperature = options.temperature ?? 0.1; // Low temperature for consistency
    this.maxTokens = options.maxTokens ?? 500;
  }

  async complete(question: string, orderedContext: Chunk[], options: GenerateOptions = {}): Promise<string> {
    const startTime = Date.now();
    const model = options.model ?? this.model;

    const response = await this.client.chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: buildSystemPrompt() },
          { role: 'user', content: buildUserPrompt(question, orderedContext) },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      },
      { signal: options.signal }
    );

    const answer = response.choices[0]?.message?.content?.trim() || '';
    logger.debug({ latency: Date.now() - startTime, model }, 'OpenAI completion finished');
    return answer;
  }
}
