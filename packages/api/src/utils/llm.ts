import Groq from 'groq-sdk';
import { config } from '../config';
import { logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for prompt-in, text-out LLM calls.
 * The relevance judge and the answer grader both sit on top of it.
 */

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LLMClient {
  generate(prompt: string, options?: LLMOptions): Promise<string>;
}

export interface GroqClientOptions {
  apiKey?: string;
  model?: string;
}

/**
 * GroqClient Implementation
 *
 * Uses the Groq inference API; the model comes from GROQ_MODEL.
 */
export class GroqClient implements LLMClient {
  private client: Groq;
  private model: string;

  constructor(options: GroqClientOptions = {}) {
    const apiKey = options.apiKey ?? config.groq.apiKey;

    if (!apiKey || apiKey.trim() === '') {
      throw new Error(
        'GROQ_API_KEY is not configured. ' +
        'Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }

    this.client = new Groq({
      apiKey,
      // Retries are the caller's decision
      maxRetries: 0,
    });

    this.model = options.model ?? config.groq.model;

    logger.info({ model: this.model }, 'GroqClient initialized');
  }

  /**
   * Generate a single completion.
   */
  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 500,
          ...(options.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal: options.signal }
      );

      const result = response.choices[0]?.message?.content?.trim() || '';
      const latency = Date.now() - startTime;

      logger.debug({ latency, model: this.model }, 'LLM generation completed');

      return result;
    } catch (error) {
      logger.error({ error }, 'LLM generation failed');
      throw error;
    }
  }

  getModel(): string {
    return this.model;
  }
}
