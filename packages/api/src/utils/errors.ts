/**
 * Typed errors for the query pipeline.
 *
 * Stage services throw these; the pipeline controller maps them onto a
 * `PipelineError` and the FAILED state. Only `RerankUnavailableError`
 * is recoverable at run level.
 */

import type { PipelineErrorKind, PipelineStage } from '@docqa/shared';

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export abstract class DocqaError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export class TimeoutError extends DocqaError {
  readonly code = 'TIMEOUT';
  readonly retryable = true;

  constructor(readonly timeoutMs: number, context?: string) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class PipelineCancelledError extends DocqaError {
  readonly code = 'CANCELLED';
  readonly retryable = false;

  constructor(message = 'Query run was cancelled') {
    super(message);
    this.name = 'PipelineCancelledError';
  }
}

export type RetrievalErrorKind = 'BackendUnavailable';

export class RetrievalError extends DocqaError {
  readonly code = 'RETRIEVAL_ERROR';
  // Retried by the caller if desired, never internally
  readonly retryable = true;

  constructor(
    readonly kind: RetrievalErrorKind,
    message: string,
    readonly cause?: unknown
  ) {
    super(`Retrieval failed (${kind}): ${message}`);
    this.name = 'RetrievalError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { kind: this.kind } };
  }
}

export class EmbedderError extends DocqaError {
  readonly code = 'EMBEDDER_UNAVAILABLE';
  readonly retryable = true;

  constructor(message: string, readonly cause?: unknown) {
    super(`Embedding failed: ${message}`);
    this.name = 'EmbedderError';
  }
}

export class RerankUnavailableError extends DocqaError {
  readonly code = 'RERANK_UNAVAILABLE';
  readonly retryable = true;

  constructor(readonly attempted: number, message = 'every judge call failed') {
    super(`Rerank unavailable after ${attempted} judge call(s): ${message}`);
    this.name = 'RerankUnavailableError';
  }
}

export type GenerationErrorKind = 'ServiceUnavailable';

export class GenerationError extends DocqaError {
  readonly code = 'GENERATION_ERROR';
  readonly retryable = true;

  constructor(
    readonly kind: GenerationErrorKind,
    message: string,
    readonly cause?: unknown
  ) {
    super(`Generation failed (${kind}): ${message}`);
    this.name = 'GenerationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { kind: this.kind } };
  }
}

export class InvalidPipelineConfigError extends DocqaError {
  readonly code = 'INVALID_CONFIG';
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
    this.name = 'InvalidPipelineConfigError';
  }
}

/**
 * Error surfaced to callers of `runQuery` for a FAILED run.
 */
export class PipelineError extends DocqaError {
  readonly code = 'PIPELINE_FAILED';
  readonly retryable: boolean;

  constructor(
    readonly stage: PipelineStage,
    readonly kind: PipelineErrorKind,
    message: string,
    readonly hasPartialRanking: boolean,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
    this.retryable = kind !== 'Cancelled' && kind !== 'InvalidRequest';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { stage: this.stage, kind: this.kind, hasPartialRanking: this.hasPartialRanking },
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
