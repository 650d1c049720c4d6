/**
 * Query Pipeline Controller Tests
 *
 * Full runs over the in-memory backend with stubbed model adapters.
 */

import { describe, expect, it } from 'vitest';
import type { Embedder, Generator, Judge, SearchBackend } from '../adapters/types';
import { InMemorySearchBackend } from '../adapters/memoryBackend';
import { resolvePipelineConfig, type PipelineConfigOverrides } from '../pipeline/config';
import { QueryPipeline, initialStage, nextStage } from '../pipeline/controller';
import { RerankStage } from '../services/reranking';
import { RetrievalEngine } from '../services/retrieval';
import { GenerationStage } from '../services/synthesis';
import {
  FailingBackend,
  FailingEmbedder,
  FusionOnlyBackend,
  HangingBackend,
  HangingJudge,
  StubEmbedder,
  StubGenerator,
  TableJudge,
  corpus,
  largeCorpus,
} from './fixtures';

interface Parts {
  backend?: SearchBackend;
  embedder?: Embedder;
  judge?: Judge;
  generator?: Generator;
}

function buildPipeline<G extends Generator = StubGenerator>(parts: Parts & { generator?: G } = {}) {
  const backend = parts.backend ?? new InMemorySearchBackend(corpus());
  const embedder = parts.embedder ?? new StubEmbedder();
  const judge =
    parts.judge ??
    new TableJudge({
      'revenue grew in fiscal 2023': '0.4',
      'revenue guidance for next year': '0.9',
    });
  const generator = parts.generator ?? new StubGenerator('Guidance points up [1].');

  const pipeline = new QueryPipeline({
    embedder,
    retrieval: new RetrievalEngine(backend, embedder),
    rerank: new RerankStage(judge),
    generation: new GenerationStage(generator),
  });
  return { pipeline, embedder, generator };
}

const config = (overrides: PipelineConfigOverrides = {}) => resolvePipelineConfig(overrides);

describe('stage transitions', () => {
  it('skips ENCODE for keyword retrieval', () => {
    expect(initialStage(config({ retrieval: { mode: 'keyword' } }))).toBe('RETRIEVE');
    expect(initialStage(config({ retrieval: { mode: 'fusion' } }))).toBe('ENCODE');
  });

  it('takes the RERANK edge only when reranking is enabled', () => {
    expect(nextStage('RETRIEVE', config({ rerank: { enabled: true } }))).toBe('RERANK');
    expect(nextStage('RETRIEVE', config({ rerank: { enabled: false } }))).toBe('GENERATE');
    expect(nextStage('RERANK', config())).toBe('GENERATE');
    expect(nextStage('GENERATE', config())).toBe('DONE');
  });

  it('keeps terminal stages terminal', () => {
    expect(nextStage('DONE', config())).toBe('DONE');
    expect(nextStage('FAILED', config())).toBe('FAILED');
  });
});

describe('QueryPipeline.runQuery', () => {
  it('answers from the reranked list and cites by marker', async () => {
    const { pipeline, generator } = buildPipeline();

    const outcome = await pipeline.runQuery('revenue', config({ rerank: { enabled: true } }));

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.visited).toEqual(['ENCODE', 'RETRIEVE', 'RERANK', 'GENERATE']);
    expect(outcome.supporting.map((s) => s.chunkId)).toEqual(['c3', 'c1', 'c2', 'c4']);
    expect(outcome.supporting.map((s) => s.score)).toEqual([0.9, 0.4, 0, 0]);
    expect(generator.calls[0].context.map((c) => c.id)).toEqual(['c3', 'c1', 'c2', 'c4']);
    expect(outcome.answer).toEqual({
      text: 'Guidance points up [1].',
      citations: ['c3'],
      citationSource: 'markers',
    });
    expect(outcome.degraded).toBe(false);
    expect(outcome.state.stage).toBe('DONE');
  });

  it('continues with the fused order when the judge is unavailable', async () => {
    const judge = new TableJudge({
      'revenue grew in fiscal 2023': new Error('judge down'),
      'operating costs and expenses': new Error('judge down'),
      'revenue guidance for next year': new Error('judge down'),
      'employee headcount by region': new Error('judge down'),
    });
    const { pipeline, generator } = buildPipeline({ judge });

    const outcome = await pipeline.runQuery('revenue', config({ rerank: { enabled: true } }));

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.degraded).toBe(true);
    expect(outcome.degradations).toEqual(['rerank-unavailable']);
    expect(outcome.state.reranked).toBeNull();
    expect(generator.calls[0].context.map((c) => c.id)).toEqual(['c1', 'c3', 'c2', 'c4']);
  });

  it('fuses, reranks a prefix and cites within it over a larger store', async () => {
    const backend = new InMemorySearchBackend(largeCorpus(14));
    const { pipeline } = buildPipeline({
      backend,
      judge: new TableJudge({}),
      generator: new StubGenerator('See [1] and [2].'),
    });

    const outcome = await pipeline.runQuery(
      'revenue',
      config({
        retrieval: { mode: 'fusion', vectorTopK: 20, keywordTopK: 20, mergeTopK: 10, rrfK: 60 },
        rerank: { enabled: true, candidateCount: 5 },
      })
    );

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.state.fused).toHaveLength(10);
    const rerankedIds = (outcome.state.reranked ?? []).map((r) => r.chunkId);
    expect(rerankedIds).toEqual(outcome.state.fused.slice(0, 5).map((f) => f.chunkId));
    expect(outcome.answer.citations).toEqual(rerankedIds.slice(0, 2));
    expect(outcome.answer.citations.every((id) => rerankedIds.includes(id))).toBe(true);
  });

  it('reaches DONE in fused order when no judge response parses', async () => {
    const judge = new TableJudge({
      'revenue grew in fiscal 2023': 'quite relevant',
      'operating costs and expenses': 'unsure',
      'revenue guidance for next year': 'relevant, maybe',
      'employee headcount by region': '',
    });
    const { pipeline } = buildPipeline({ judge });

    const outcome = await pipeline.runQuery('revenue', config({ rerank: { enabled: true } }));

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.state.stage).toBe('DONE');
    expect(outcome.degraded).toBe(false);
    expect(outcome.state.reranked?.map((r) => r.chunkId)).toEqual(['c1', 'c3', 'c2', 'c4']);
    expect(outcome.state.reranked?.every((r) => r.relevanceScore === null)).toBe(true);
  });

  it('goes straight from RETRIEVE to GENERATE with reranking disabled', async () => {
    const { pipeline } = buildPipeline();

    const outcome = await pipeline.runQuery('revenue', config({ rerank: { enabled: false } }));

    expect(outcome.visited).toEqual(['ENCODE', 'RETRIEVE', 'GENERATE']);
    expect(outcome.state.reranked).toBeNull();
  });

  it('never embeds the question in keyword mode', async () => {
    const embedder = new StubEmbedder();
    const { pipeline } = buildPipeline({ embedder });

    const outcome = await pipeline.runQuery('revenue', config({ retrieval: { mode: 'keyword' } }));

    expect(outcome.ok).toBe(true);
    expect(outcome.visited[0]).toBe('RETRIEVE');
    expect(embedder.calls).toBe(0);
  });

  it('reports the fallback when hybrid mode runs as fusion', async () => {
    const backend = new FusionOnlyBackend(new InMemorySearchBackend(corpus()));
    const { pipeline } = buildPipeline({ backend });

    const outcome = await pipeline.runQuery('revenue', config({ retrieval: { mode: 'hybrid' } }));

    expect(outcome.ok).toBe(true);
    expect(outcome.effectiveMode).toBe('fusion');
    expect(outcome.degradations).toContain('hybrid-fallback-to-fusion');
  });

  it('fails in RETRIEVE with BackendUnavailable when the store is down', async () => {
    const { pipeline, generator } = buildPipeline({ backend: new FailingBackend() });

    const outcome = await pipeline.runQuery('revenue', config());

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.stage).toBe('RETRIEVE');
    expect(outcome.error.kind).toBe('BackendUnavailable');
    expect(outcome.error.hasPartialRanking).toBe(false);
    expect(outcome.partialRanking).toBeNull();
    expect(outcome.state.stage).toBe('FAILED');
    expect(outcome.state.answer).toBeNull();
    expect(generator.calls).toHaveLength(0);
  });

  it('fails in RETRIEVE with BackendUnavailable when the store stops answering', async () => {
    const { pipeline, generator } = buildPipeline({ backend: new HangingBackend() });

    const outcome = await pipeline.runQuery('revenue', config({ retrieval: { backendTimeoutMs: 20 } }));

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.stage).toBe('RETRIEVE');
    expect(outcome.error.kind).toBe('BackendUnavailable');
    expect(outcome.state.answer).toBeNull();
    expect(generator.calls).toHaveLength(0);
  });

  it('fails in ENCODE with EmbedderUnavailable when the embedder is down', async () => {
    const { pipeline } = buildPipeline({ embedder: new FailingEmbedder() });

    const outcome = await pipeline.runQuery('revenue', config());

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.stage).toBe('ENCODE');
    expect(outcome.error.kind).toBe('EmbedderUnavailable');
    expect(outcome.error.message).toBe('Embedding failed: embedding worker down');
  });

  it('keeps the ranking reached before a generation failure', async () => {
    const generator: Generator = {
      async complete() {
        throw new Error('provider overloaded');
      },
    };
    const { pipeline } = buildPipeline({ generator });

    const outcome = await pipeline.runQuery('revenue', config({ rerank: { enabled: true } }));

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.stage).toBe('GENERATE');
    expect(outcome.error.kind).toBe('GenerationServiceUnavailable');
    expect(outcome.error.hasPartialRanking).toBe(true);
    expect(outcome.partialRanking?.map((s) => s.chunkId)).toEqual(['c3', 'c1', 'c2', 'c4']);
  });

  it('rejects an empty question without visiting any stage', async () => {
    const { pipeline } = buildPipeline();

    const outcome = await pipeline.runQuery('   ', config());

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('InvalidRequest');
    expect(outcome.visited).toEqual([]);
  });

  it('fails as Cancelled when the signal is aborted before the run', async () => {
    const { pipeline, embedder } = buildPipeline();
    const controller = new AbortController();
    controller.abort();

    const outcome = await pipeline.runQuery('revenue', config(), { signal: controller.signal });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('Cancelled');
    expect(outcome.error.stage).toBe('ENCODE');
    expect(embedder instanceof StubEmbedder && embedder.calls).toBe(0);
  });

  it('stops a run mid-rerank when the caller cancels', async () => {
    const { pipeline, generator } = buildPipeline({ judge: new HangingJudge() });
    const controller = new AbortController();

    const pending = pipeline.runQuery('revenue', config({ rerank: { enabled: true, callTimeoutMs: 10_000 } }), {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 10);
    const outcome = await pending;

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.kind).toBe('Cancelled');
    expect(outcome.error.stage).toBe('RERANK');
    expect(outcome.error.hasPartialRanking).toBe(true);
    expect(generator.calls).toHaveLength(0);
  });

  it('records stages that exceed their latency budget', async () => {
    const generator: Generator = {
      async complete() {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return 'Revenue grew [1].';
      },
    };
    const { pipeline } = buildPipeline({ generator });

    const outcome = await pipeline.runQuery(
      'revenue',
      config({ latencyBudgets: { synthesis: 1, total: 60_000 } })
    );

    expect(outcome.budgetViolations).toContain('synthesis');
    expect(outcome.budgetViolations).not.toContain('total');
  });
});
