/**
 * Shared test fixtures: a small chunk corpus and in-process adapter stubs.
 */

import type { Chunk } from '@docqa/shared';
import type {
  Embedder,
  GenerateOptions,
  Generator,
  Judge,
  JudgeInput,
  ScoredChunkId,
  SearchBackend,
  SearchFilters,
  KeywordProperty,
} from '../adapters/types';
import { InMemorySearchBackend } from '../adapters/memoryBackend';
import type { QueryRunRecord, QueryRunStats, QueryRunStatus, QueryRunStore } from '../repositories/queryRuns';
import type { LLMClient, LLMOptions } from '../utils/llm';

export function makeChunk(overrides: Partial<Chunk> & { id: string }): Chunk {
  return {
    text: `text of ${overrides.id}`,
    documentId: 'doc-a',
    pageStart: 1,
    pageEnd: 1,
    sectionTitle: '',
    elementType: 'narrative',
    keywords: [],
    summary: '',
    ...overrides,
  };
}

/**
 * Four chunks. For the question "revenue" with query vector [1, 0, 0]:
 * vector order c1, c3, c2, c4; keyword order c1, c3.
 */
export function corpus(): Chunk[] {
  return [
    makeChunk({ id: 'c1', text: 'revenue grew in fiscal 2023', embedding: [1, 0, 0] }),
    makeChunk({ id: 'c2', text: 'operating costs and expenses', embedding: [0, 1, 0] }),
    makeChunk({ id: 'c3', documentId: 'doc-b', text: 'revenue guidance for next year', embedding: [0.8, 0.6, 0] }),
    makeChunk({ id: 'c4', text: 'employee headcount by region', embedding: [0, 0, 1] }),
  ];
}

export class StubEmbedder implements Embedder {
  calls = 0;

  constructor(private readonly vector: number[] = [1, 0, 0]) {}

  async embed(): Promise<number[]> {
    this.calls++;
    return this.vector;
  }
}

export class FailingEmbedder implements Embedder {
  async embed(): Promise<number[]> {
    throw new Error('embedding worker down');
  }
}

/** Backend without native hybrid search. */
export class FusionOnlyBackend implements SearchBackend {
  constructor(private readonly inner: InMemorySearchBackend) {}

  vectorSearch(vector: number[], topK: number, filters?: SearchFilters): Promise<ScoredChunkId[]> {
    return this.inner.vectorSearch(vector, topK, filters);
  }

  keywordSearch(
    text: string,
    properties: readonly KeywordProperty[],
    topK: number,
    filters?: SearchFilters
  ): Promise<ScoredChunkId[]> {
    return this.inner.keywordSearch(text, properties, topK, filters);
  }

  fetchChunk(chunkId: string): Promise<Chunk | null> {
    return this.inner.fetchChunk(chunkId);
  }
}

export class FailingBackend implements SearchBackend {
  async vectorSearch(): Promise<ScoredChunkId[]> {
    throw new Error('connection refused');
  }

  async keywordSearch(): Promise<ScoredChunkId[]> {
    throw new Error('connection refused');
  }

  async fetchChunk(): Promise<Chunk | null> {
    throw new Error('connection refused');
  }
}

/** Backend whose searches never answer; only their signal ends them. */
export class HangingBackend implements SearchBackend {
  private hang<T>(signal?: AbortSignal): Promise<T> {
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }

  vectorSearch(
    _vector: number[],
    _topK: number,
    _filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    return this.hang(signal);
  }

  keywordSearch(
    _text: string,
    _properties: readonly KeywordProperty[],
    _topK: number,
    _filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    return this.hang(signal);
  }

  fetchChunk(_chunkId: string, signal?: AbortSignal): Promise<Chunk | null> {
    return this.hang(signal);
  }
}

/** `count` revenue chunks k00, k01, ... whose vector similarity to [1, 0, 0] falls with the index. */
export function largeCorpus(count: number): Chunk[] {
  return Array.from({ length: count }, (_, i) => {
    const id = `k${String(i).padStart(2, '0')}`;
    return makeChunk({ id, text: `revenue note ${id}`, embedding: [1, i / 10, 0] });
  });
}

/** Judge answering from a per-chunk-text table; unknown texts get "0". */
export class TableJudge implements Judge {
  readonly inputs: JudgeInput[] = [];

  constructor(private readonly responses: Record<string, string | Error>) {}

  async score(input: JudgeInput): Promise<string> {
    this.inputs.push(input);
    const response = this.responses[input.chunkText];
    if (response instanceof Error) throw response;
    return response ?? '0';
  }
}

/** Judge whose calls never settle until their signal aborts. */
export class HangingJudge implements Judge {
  calls = 0;

  score(_input: JudgeInput, signal?: AbortSignal): Promise<string> {
    this.calls++;
    return new Promise((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

export class StubGenerator implements Generator {
  readonly calls: Array<{ question: string; context: Chunk[]; options?: GenerateOptions }> = [];

  constructor(private readonly reply: string | ((context: Chunk[]) => string)) {}

  async complete(question: string, orderedContext: Chunk[], options?: GenerateOptions): Promise<string> {
    this.calls.push({ question, context: orderedContext, options });
    return typeof this.reply === 'string' ? this.reply : this.reply(orderedContext);
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class RecordingLLM implements LLMClient {
  readonly prompts: string[] = [];
  readonly options: LLMOptions[] = [];

  constructor(private readonly reply: string) {}

  async generate(prompt: string, options: LLMOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    return this.reply;
  }
}

/** Run store kept in an array, newest last. */
export class MemoryRunStore implements QueryRunStore {
  readonly records: QueryRunRecord[] = [];

  async insert(record: QueryRunRecord): Promise<void> {
    this.records.push(record);
  }

  async getByRequestId(requestId: string): Promise<QueryRunRecord | null> {
    return this.records.find((r) => r.requestId === requestId) ?? null;
  }

  async recent(limit: number, status?: QueryRunStatus): Promise<QueryRunRecord[]> {
    return this.records
      .filter((r) => !status || r.status === status)
      .reverse()
      .slice(0, limit);
  }

  async stats(): Promise<QueryRunStats> {
    const { records } = this;
    const avg = (pick: (r: QueryRunRecord) => number) =>
      records.length > 0 ? records.reduce((sum, r) => sum + pick(r), 0) / records.length : 0;
    const violationsByBudget: Record<string, number> = {};
    for (const budget of records.flatMap((r) => r.latencyViolations)) {
      violationsByBudget[budget] = (violationsByBudget[budget] ?? 0) + 1;
    }

    return {
      totalRuns: records.length,
      byStatus: {
        done: records.filter((r) => r.status === 'done').length,
        failed: records.filter((r) => r.status === 'failed').length,
      },
      avgLatency: {
        total: avg((r) => r.latency.total),
        encode: avg((r) => r.latency.encode),
        retrieval: avg((r) => r.latency.retrieval),
        reranking: avg((r) => r.latency.reranking),
        synthesis: avg((r) => r.latency.synthesis),
      },
      avgChunks: {
        retrieved: avg((r) => r.chunksRetrieved),
        reranked: avg((r) => r.chunksReranked),
        used: avg((r) => r.chunksUsed),
      },
      degradedRuns: records.filter((r) => r.degradations.length > 0).length,
      runsWithViolations: records.filter((r) => r.latencyViolations.length > 0).length,
      violationsByBudget,
    };
  }
}
