import { JUDGE_SCORE_RANGE, type FusedResult, type RerankedResult } from '@docqa/shared';
import type { Judge, JudgeInput } from '../adapters/types';
import type { Frozen, RerankConfig } from '../pipeline/config';
import { callWithDeadline, runWithConcurrency } from '../utils/async';
import { PipelineCancelledError, RerankUnavailableError, TimeoutError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Rerank Stage
 *
 * Precision filter after recall-focused retrieval: an LLM judge scores a
 * bounded prefix of the fused list and the prefix is reordered by score.
 *
 * The judge is an unreliable oracle. A response that does not parse into a
 * score in range leaves that candidate unscored; unscored candidates follow
 * the scored ones in their retrieval order. Only when every judge call fails
 * at service level does the stage give up (`RerankUnavailableError`).
 */

export type ParsedScore = { kind: 'scored'; score: number } | { kind: 'unparseable'; raw: string };

type CandidateVerdict = ParsedScore | { kind: 'failed'; reason: string };

export interface RerankOutcome {
  results: RerankedResult[];
  scored: number;
  unparseable: number;
  failed: number;
}

const NUMBER = String.raw`[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?`;
const BARE_NUMBER = new RegExp(`^${NUMBER}$`);
const SCORE_LINE = new RegExp(`(?:^|\\n)\\s*"?score"?\\s*[:=]\\s*(${NUMBER})\\s*(?:$|\\n)`, 'i');

function inRange(value: number): boolean {
  return Number.isFinite(value) && value >= JUDGE_SCORE_RANGE.MIN && value <= JUDGE_SCORE_RANGE.MAX;
}

function numericField(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'object' && value !== null && 'score' in value && typeof value.score === 'number') {
    return value.score;
  }
  return null;
}

/**
 * Parse a raw judge response.
 *
 * Accepted shapes: a bare number, JSON `{"score": n}`, or a line `score: n`.
 * The number must lie within JUDGE_SCORE_RANGE. Anything else, including
 * prose that merely contains a number, is unparseable.
 */
export function parseJudgeScore(raw: string): ParsedScore {
  const text = raw.trim();
  const unparseable: ParsedScore = { kind: 'unparseable', raw };
  if (!text) return unparseable;

  if (BARE_NUMBER.test(text)) {
    const value = Number(text);
    return inRange(value) ? { kind: 'scored', score: value } : unparseable;
  }

  if (text.startsWith('{')) {
    try {
      const value = numericField(JSON.parse(text));
      return value !== null && inRange(value) ? { kind: 'scored', score: value } : unparseable;
    } catch {
      return unparseable;
    }
  }

  const line = text.match(SCORE_LINE);
  if (line) {
    const value = Number(line[1]);
    return inRange(value) ? { kind: 'scored', score: value } : unparseable;
  }

  return unparseable;
}

function truncate(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length <= maxChars ? trimmed : `${trimmed.slice(0, maxChars).trimEnd()}...`;
}

export function buildJudgeInput(question: string, candidate: FusedResult, excerptMaxChars: number): JudgeInput {
  const { chunk } = candidate;
  return {
    question,
    chunkText: truncate(chunk.text ?? '', excerptMaxChars),
    // Enrichment is optional; missing fields go to the judge empty
    summary: chunk.summary ?? '',
    keywords: chunk.keywords ?? [],
  };
}

/**
 * Scored first (score desc, ties by original position), then everything
 * else in original position.
 */
export function orderByVerdicts(candidates: FusedResult[], verdicts: CandidateVerdict[]): RerankedResult[] {
  const indexed = candidates.map((candidate, idx) => ({ candidate, idx, verdict: verdicts[idx] }));

  const scored = indexed
    .flatMap(({ candidate, idx, verdict }) =>
      verdict?.kind === 'scored' ? [{ candidate, idx, score: verdict.score }] : []
    )
    .sort((a, b) => b.score - a.score || a.idx - b.idx);

  const unscored = indexed.filter(({ verdict }) => verdict?.kind !== 'scored');

  return [
    ...scored.map(({ candidate, score }) => ({
      chunkId: candidate.chunkId,
      relevanceScore: score,
      chunk: candidate.chunk,
    })),
    ...unscored.map(({ candidate }) => ({
      chunkId: candidate.chunkId,
      relevanceScore: null,
      chunk: candidate.chunk,
    })),
  ];
}

function chunked<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class RerankStage {
  constructor(private readonly judge: Judge) {}

  async rerank(
    question: string,
    fused: FusedResult[],
    cfg: Frozen<RerankConfig>,
    signal?: AbortSignal
  ): Promise<RerankOutcome> {
    const startTime = Date.now();
    const candidates = fused.slice(0, cfg.candidateCount);

    if (candidates.length === 0) {
      return { results: [], scored: 0, unparseable: 0, failed: 0 };
    }

    const inputs = candidates.map((c) => buildJudgeInput(question, c, cfg.excerptMaxChars));
    const verdicts = await this.collectVerdicts(inputs, cfg, signal);

    const counts = { scored: 0, unparseable: 0, failed: 0 };
    for (const verdict of verdicts) counts[verdict.kind]++;

    if (counts.failed === verdicts.length) {
      const firstFailure = verdicts.find((v): v is { kind: 'failed'; reason: string } => v.kind === 'failed');
      logger.warn({ attempted: verdicts.length, reason: firstFailure?.reason }, 'All judge calls failed');
      throw new RerankUnavailableError(verdicts.length, firstFailure?.reason);
    }

    const results = orderByVerdicts(candidates, verdicts);

    if (counts.unparseable > 0) {
      logger.warn({ unparseable: counts.unparseable }, 'Judge returned unparseable scores, kept in retrieval order');
    }
    logger.info(
      { latency: Date.now() - startTime, inputCount: candidates.length, outputCount: results.length, ...counts },
      'Reranking completed'
    );

    return { results, ...counts };
  }

  /**
   * One verdict per input, in input order. Calls are bounded individually
   * and, through a stage-wide signal, collectively.
   */
  private async collectVerdicts(
    inputs: JudgeInput[],
    cfg: Frozen<RerankConfig>,
    signal?: AbortSignal
  ): Promise<CandidateVerdict[]> {
    const stage = new AbortController();
    const stageTimer = setTimeout(
      () => stage.abort(new TimeoutError(cfg.stageTimeoutMs, 'rerank stage')),
      cfg.stageTimeoutMs
    );
    const forward = () => stage.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });

    const { judge } = this;
    const scoreBatch = judge.scoreBatch?.bind(judge);

    const call = async (batch: JudgeInput[]): Promise<CandidateVerdict[]> => {
      try {
        const raws = await callWithDeadline(
          (s) => (scoreBatch && batch.length > 1 ? scoreBatch(batch, s) : Promise.all(batch.map((i) => judge.score(i, s)))),
          { timeoutMs: cfg.callTimeoutMs, signal: stage.signal, context: 'judge call' }
        );
        return batch.map((_, idx) => parseJudgeScore(raws[idx] ?? ''));
      } catch (error) {
        if (signal?.aborted) throw new PipelineCancelledError();
        const reason = stage.signal.aborted ? 'rerank stage timed out' : errorMessage(error);
        return batch.map(() => ({ kind: 'failed' as const, reason }));
      }
    };

    try {
      const batchSize = scoreBatch ? cfg.batchSize : 1;
      const results = await runWithConcurrency(chunked(inputs, batchSize), cfg.maxConcurrency, call);
      return results.flat();
    } finally {
      clearTimeout(stageTimer);
      signal?.removeEventListener('abort', forward);
    }
  }
}
