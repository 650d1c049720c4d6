import type { PipelineErrorKind, PipelineStage, RetrievalMode, StageTimings } from '@docqa/shared';
import { sql as defaultSql, type Sql } from '../utils/db';

/**
 * Query run records.
 *
 * One row per HTTP query run in `query_runs` (db/schema.sql), successful or
 * not. The evaluation routes read them back.
 */

export type QueryRunStatus = 'done' | 'failed';

export interface QueryRunRecord {
  requestId: string;
  question: string;
  mode: RetrievalMode;
  status: QueryRunStatus;
  answer: string | null;
  citations: string[];
  failedStage: PipelineStage | null;
  errorKind: PipelineErrorKind | null;
  degradations: string[];
  latency: StageTimings;
  chunksRetrieved: number;
  chunksReranked: number;
  chunksUsed: number;
  latencyViolations: string[];
  createdAt?: string;
}

/** Aggregates over every stored run. Averages are 0 when there are no runs. */
export interface QueryRunStats {
  totalRuns: number;
  byStatus: Record<QueryRunStatus, number>;
  avgLatency: StageTimings;
  avgChunks: { retrieved: number; reranked: number; used: number };
  degradedRuns: number;
  runsWithViolations: number;
  /** Budget name -> number of runs that exceeded it. */
  violationsByBudget: Record<string, number>;
}

export interface QueryRunStore {
  insert(record: QueryRunRecord): Promise<void>;
  getByRequestId(requestId: string): Promise<QueryRunRecord | null>;
  recent(limit: number, status?: QueryRunStatus): Promise<QueryRunRecord[]>;
  stats(): Promise<QueryRunStats>;
}

interface QueryRunRow {
  request_id: string;
  question: string;
  mode: RetrievalMode;
  status: QueryRunStatus;
  answer: string | null;
  citations: string[];
  failed_stage: PipelineStage | null;
  error_kind: PipelineErrorKind | null;
  degradations: string[];
  latency_total: number;
  latency_encode: number;
  latency_retrieval: number;
  latency_reranking: number;
  latency_synthesis: number;
  chunks_retrieved: number;
  chunks_reranked: number;
  chunks_used: number;
  latency_violations: string[];
  created_at: Date;
}

interface QueryRunStatsRow {
  total_runs: number;
  done_runs: number;
  failed_runs: number;
  avg_latency_total: number;
  avg_latency_encode: number;
  avg_latency_retrieval: number;
  avg_latency_reranking: number;
  avg_latency_synthesis: number;
  avg_chunks_retrieved: number;
  avg_chunks_reranked: number;
  avg_chunks_used: number;
  degraded_runs: number;
  runs_with_violations: number;
}

function recordFromRow(row: QueryRunRow): QueryRunRecord {
  return {
    requestId: row.request_id,
    question: row.question,
    mode: row.mode,
    status: row.status,
    answer: row.answer,
    citations: row.citations,
    failedStage: row.failed_stage,
    errorKind: row.error_kind,
    degradations: row.degradations,
    latency: {
      total: row.latency_total,
      encode: row.latency_encode,
      retrieval: row.latency_retrieval,
      reranking: row.latency_reranking,
      synthesis: row.latency_synthesis,
    },
    chunksRetrieved: row.chunks_retrieved,
    chunksReranked: row.chunks_reranked,
    chunksUsed: row.chunks_used,
    latencyViolations: row.latency_violations,
    createdAt: row.created_at.toISOString(),
  };
}

export class QueryRunRepository implements QueryRunStore {
  constructor(private readonly sql: Sql = defaultSql) {}

  async insert(record: QueryRunRecord): Promise<void> {
    await this.sql`
      INSERT INTO query_runs (
        request_id,
        question,
        mode,
        status,
        answer,
        citations,
        failed_stage,
        error_kind,
        degradations,
        latency_total,
        latency_encode,
        latency_retrieval,
        latency_reranking,
        latency_synthesis,
        chunks_retrieved,
        chunks_reranked,
        chunks_used,
        latency_violations
      ) VALUES (
        ${record.requestId},
        ${record.question},
        ${record.mode},
        ${record.status},
        ${record.answer},
        ${JSON.stringify(record.citations)}::jsonb,
        ${record.failedStage},
        ${record.errorKind},
        ${JSON.stringify(record.degradations)}::jsonb,
        ${record.latency.total},
        ${record.latency.encode},
        ${record.latency.retrieval},
        ${record.latency.reranking},
        ${record.latency.synthesis},
        ${record.chunksRetrieved},
        ${record.chunksReranked},
        ${record.chunksUsed},
        ${JSON.stringify(record.latencyViolations)}::jsonb
      )
      ON CONFLICT (request_id) DO NOTHING
    `;
  }

  async getByRequestId(requestId: string): Promise<QueryRunRecord | null> {
    const rows = await this.sql<QueryRunRow[]>`
      SELECT *
      FROM query_runs
      WHERE request_id = ${requestId}
      LIMIT 1
    `;
    return rows[0] ? recordFromRow(rows[0]) : null;
  }

  async recent(limit: number, status?: QueryRunStatus): Promise<QueryRunRecord[]> {
    const rows = await this.sql<QueryRunRow[]>`
      SELECT *
      FROM query_runs
      WHERE 1=1
        ${status ? this.sql`AND status = ${status}` : this.sql``}
      ORDER BY created_at DESC
      LIMIT ${limit}
    `;
    return rows.map(recordFromRow);
  }

  async stats(): Promise<QueryRunStats> {
    const [overall] = await this.sql<QueryRunStatsRow[]>`
      SELECT
        COUNT(*)::int AS total_runs,
        COUNT(*) FILTER (WHERE status = 'done')::int AS done_runs,
        COUNT(*) FILTER (WHERE status = 'failed')::int AS failed_runs,
        COALESCE(AVG(latency_total), 0)::float8 AS avg_latency_total,
        COALESCE(AVG(latency_encode), 0)::float8 AS avg_latency_encode,
        COALESCE(AVG(latency_retrieval), 0)::float8 AS avg_latency_retrieval,
        COALESCE(AVG(latency_reranking), 0)::float8 AS avg_latency_reranking,
        COALESCE(AVG(latency_synthesis), 0)::float8 AS avg_latency_synthesis,
        COALESCE(AVG(chunks_retrieved), 0)::float8 AS avg_chunks_retrieved,
        COALESCE(AVG(chunks_reranked), 0)::float8 AS avg_chunks_reranked,
        COALESCE(AVG(chunks_used), 0)::float8 AS avg_chunks_used,
        COUNT(*) FILTER (WHERE degradations != '[]'::jsonb)::int AS degraded_runs,
        COUNT(*) FILTER (WHERE latency_violations != '[]'::jsonb)::int AS runs_with_violations
      FROM query_runs
    `;

    const budgets = await this.sql<Array<{ budget: string; runs: number }>>`
      SELECT budget, COUNT(*)::int AS runs
      FROM query_runs, jsonb_array_elements_text(latency_violations) AS budget
      GROUP BY budget
    `;

    return {
      totalRuns: overall?.total_runs ?? 0,
      byStatus: { done: overall?.done_runs ?? 0, failed: overall?.failed_runs ?? 0 },
      avgLatency: {
        total: overall?.avg_latency_total ?? 0,
        encode: overall?.avg_latency_encode ?? 0,
        retrieval: overall?.avg_latency_retrieval ?? 0,
        reranking: overall?.avg_latency_reranking ?? 0,
        synthesis: overall?.avg_latency_synthesis ?? 0,
      },
      avgChunks: {
        retrieved: overall?.avg_chunks_retrieved ?? 0,
        reranked: overall?.avg_chunks_reranked ?? 0,
        used: overall?.avg_chunks_used ?? 0,
      },
      degradedRuns: overall?.degraded_runs ?? 0,
      runsWithViolations: overall?.runs_with_violations ?? 0,
      violationsByBudget: Object.fromEntries(budgets.map((b) => [b.budget, b.runs])),
    };
  }
}
