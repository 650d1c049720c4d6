/**
 * Retrieval Engine Unit Tests
 */

import { describe, expect, it } from 'vitest';
import { InMemorySearchBackend } from '../adapters/memoryBackend';
import { resolvePipelineConfig } from '../pipeline/config';
import { RetrievalEngine, reciprocalRankFusion } from '../services/retrieval';
import { PipelineCancelledError, RetrievalError } from '../utils/errors';
import { FailingBackend, FusionOnlyBackend, StubEmbedder, corpus } from './fixtures';

const hits = (...ids: string[]) => ids.map((chunkId, idx) => ({ chunkId, score: 1 - idx * 0.1 }));

function retrievalConfig(overrides: Parameters<typeof resolvePipelineConfig>[0] = {}) {
  return resolvePipelineConfig(overrides).retrieval;
}

describe('reciprocalRankFusion', () => {
  it('sums 1 / (rrfK + rank) across both lists', () => {
    const fused = reciprocalRankFusion(hits('a', 'b', 'c'), hits('c', 'd', 'a'), 60, 10);

    const a = fused.find((r) => r.chunkId === 'a');
    expect(a?.fusedScore).toBeCloseTo(1 / 61 + 1 / 63, 12);
    const d = fused.find((r) => r.chunkId === 'd');
    expect(d?.fusedScore).toBeCloseTo(1 / 62, 12);
  });

  it('breaks score ties by vector rank, with vector-absent chunks last', () => {
    const fused = reciprocalRankFusion(hits('a', 'b', 'c'), hits('c', 'd', 'a'), 60, 10);

    // a and c tie (1/61 + 1/63); b and d tie (1/62)
    expect(fused.map((r) => r.chunkId)).toEqual(['a', 'c', 'b', 'd']);
  });

  it('truncates to the merge limit', () => {
    const fused = reciprocalRankFusion(hits('a', 'b', 'c'), hits('c', 'd', 'a'), 60, 2);
    expect(fused.map((r) => r.chunkId)).toEqual(['a', 'c']);
  });

  it('counts only the first occurrence of a chunk within one list', () => {
    const fused = reciprocalRankFusion(hits('a', 'a', 'b'), [], 60, 10);

    expect(fused).toEqual([
      { chunkId: 'a', fusedScore: 1 / 61 },
      { chunkId: 'b', fusedScore: 1 / 62 },
    ]);
  });

  it('returns an empty list when both inputs are empty', () => {
    expect(reciprocalRankFusion([], [], 60, 10)).toEqual([]);
  });
});

describe('RetrievalEngine', () => {
  const query = { text: 'revenue', vector: [1, 0, 0] };

  it('fuses vector and keyword legs in fusion mode', async () => {
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), new StubEmbedder());

    const outcome = await engine.retrieve(query, 'fusion', retrievalConfig());

    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c1', 'c3', 'c2', 'c4']);
    expect(outcome.fused[0].fusedScore).toBeCloseTo(2 / 61, 12);
    expect(outcome.candidates).toHaveLength(6);
    expect(outcome.candidates.filter((c) => c.sourceMode === 'keyword').map((c) => c.rank)).toEqual([1, 2]);
    expect(outcome.effectiveMode).toBe('fusion');
    expect(outcome.degradations).toEqual([]);
  });

  it('passes keyword results through without embedding the query', async () => {
    const embedder = new StubEmbedder();
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), embedder);

    const outcome = await engine.retrieve({ text: 'revenue', vector: null }, 'keyword', retrievalConfig());

    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c1', 'c3']);
    expect(embedder.calls).toBe(0);
  });

  it('embeds the query when no vector is supplied', async () => {
    const embedder = new StubEmbedder([1, 0, 0]);
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), embedder);

    const outcome = await engine.retrieve({ text: 'revenue', vector: null }, 'vector', retrievalConfig({ retrieval: { topK: 2 } }));

    expect(embedder.calls).toBe(1);
    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c1', 'c3']);
    expect(outcome.fused[0].fusedScore).toBe(1);
  });

  it('uses native hybrid scoring when the backend has it', async () => {
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), new StubEmbedder());

    const outcome = await engine.retrieve(query, 'hybrid', retrievalConfig());

    expect(outcome.effectiveMode).toBe('hybrid');
    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c1', 'c3']);
    expect(outcome.fused[1].fusedScore).toBeCloseTo(0.9, 12);
    expect(outcome.candidates).toEqual([]);
  });

  it('falls back to fusion for hybrid mode on a backend without native hybrid', async () => {
    const backend = new FusionOnlyBackend(new InMemorySearchBackend(corpus()));
    const engine = new RetrievalEngine(backend, new StubEmbedder());

    const outcome = await engine.retrieve(query, 'hybrid', retrievalConfig());

    expect(outcome.effectiveMode).toBe('fusion');
    expect(outcome.degradations).toEqual(['hybrid-fallback-to-fusion']);
    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c1', 'c3', 'c2', 'c4']);
  });

  it('restricts every leg to the requested document', async () => {
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), new StubEmbedder());

    const outcome = await engine.retrieve(
      query,
      'fusion',
      retrievalConfig({ retrieval: { filters: { documentId: 'doc-b' } } })
    );

    expect(outcome.fused.map((r) => r.chunkId)).toEqual(['c3']);
  });

  it('fails with BackendUnavailable when the store is down', async () => {
    const engine = new RetrievalEngine(new FailingBackend(), new StubEmbedder());

    const error = await engine.retrieve(query, 'fusion', retrievalConfig()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error instanceof RetrievalError && error.kind).toBe('BackendUnavailable');
  });

  it('stops with a cancellation when the signal is already aborted', async () => {
    const engine = new RetrievalEngine(new InMemorySearchBackend(corpus()), new StubEmbedder());
    const controller = new AbortController();
    controller.abort();

    await expect(engine.retrieve(query, 'vector', retrievalConfig(), controller.signal)).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
  });
});
