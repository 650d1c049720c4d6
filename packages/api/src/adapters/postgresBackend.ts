import type { Chunk, DocumentSummary, ElementType } from '@docqa/shared';
import { sql as defaultSql, type Sql } from '../utils/db';
import type {
  DocumentInventory,
  KeywordProperty,
  ScoredChunkId,
  SearchBackend,
  SearchFilters,
} from './types';

/**
 * PostgreSQL search backend.
 *
 * - Keyword search: full-text `tsvector` columns ranked with ts_rank_cd (BM25-style)
 * - Vector search: pgvector cosine distance (`<=>`, lower = more similar)
 * - Hybrid: both legs in one statement, max-normalized and blended by alpha
 *
 * Table layout lives in db/schema.sql.
 */

interface ChunkRow {
  id: string;
  document_id: string;
  text: string;
  section_title: string | null;
  element_type: string | null;
  page_start: number | null;
  page_end: number | null;
  keywords: string[] | null;
  summary: string | null;
}

interface ScoreRow {
  chunk_id: string;
  score: number;
}

const TSVECTOR_COLUMNS: Record<KeywordProperty, string> = {
  text: 'text_tsv',
  section_title: 'section_title_tsv',
  keywords: 'keywords_tsv',
  summary: 'summary_tsv',
};

const ELEMENT_TYPES: readonly ElementType[] = ['narrative', 'table', 'title', 'list', 'other'];

function toElementType(value: string | null): ElementType {
  return ELEMENT_TYPES.find((t) => t === value) ?? 'other';
}

export function chunkFromRow(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    text: row.text,
    sectionTitle: row.section_title ?? '',
    elementType: toElementType(row.element_type),
    pageStart: row.page_start,
    pageEnd: row.page_end,
    keywords: row.keywords ?? [],
    summary: row.summary ?? '',
  };
}

/** Format an embedding as a pgvector literal. */
function vectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}

/**
 * Run a pending postgres.js query, cancelling it server-side if the signal aborts.
 */
async function cancellable<T>(query: Promise<T> & { cancel(): unknown }, signal?: AbortSignal): Promise<T> {
  if (!signal) return query;
  const onAbort = () => {
    query.cancel();
  };
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    return await query;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

export class PostgresSearchBackend implements SearchBackend, DocumentInventory {
  constructor(private readonly sql: Sql = defaultSql) {}

  private documentFilter(filters?: SearchFilters) {
    return filters?.documentId ? this.sql`AND document_id = ${filters.documentId}` : this.sql``;
  }

  private tsvectorExpression(properties: readonly KeywordProperty[]) {
    const columns: readonly KeywordProperty[] = properties.length > 0 ? properties : ['text'];
    return columns
      .map((p) => this.sql`coalesce(${this.sql(TSVECTOR_COLUMNS[p])}, ''::tsvector)`)
      .reduce((acc, col) => this.sql`${acc} || ${col}`);
  }

  async vectorSearch(
    vector: number[],
    topK: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    const literal = vectorLiteral(vector);
    const rows = await cancellable(
      this.sql<ScoreRow[]>`
        SELECT
          id AS chunk_id,
          1 - (embedding <=> ${literal}::vector) AS score
        FROM chunks
        WHERE embedding IS NOT NULL
          ${this.documentFilter(filters)}
        ORDER BY embedding <=> ${literal}::vector, id
        LIMIT ${topK}
      `,
      signal
    );
    return rows.map((row) => ({ chunkId: row.chunk_id, score: Number(row.score) }));
  }

  async keywordSearch(
    text: string,
    properties: readonly KeywordProperty[],
    topK: number,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    const document = this.tsvectorExpression(properties);
    const rows = await cancellable(
      this.sql<ScoreRow[]>`
        SELECT
          id AS chunk_id,
          ts_rank_cd(${document}, plainto_tsquery('english', ${text})) AS score
        FROM chunks
        WHERE (${document}) @@ plainto_tsquery('english', ${text})
          ${this.documentFilter(filters)}
        ORDER BY score DESC, id
        LIMIT ${topK}
      `,
      signal
    );
    return rows.map((row) => ({ chunkId: row.chunk_id, score: Number(row.score) }));
  }

  async hybridSearch(
    text: string,
    vector: number[],
    topK: number,
    alpha = 0.5,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<ScoredChunkId[]> {
    const literal = vectorLiteral(vector);
    const document = this.tsvectorExpression(['text', 'section_title', 'keywords']);
    // Each leg over-fetches so the blend can promote chunks found by one leg only
    const legLimit = topK * 2;

    const rows = await cancellable(
      this.sql<ScoreRow[]>`
        WITH vec AS (
          SELECT id, 1 - (embedding <=> ${literal}::vector) AS vscore
          FROM chunks
          WHERE embedding IS NOT NULL
            ${this.documentFilter(filters)}
          ORDER BY embedding <=> ${literal}::vector
          LIMIT ${legLimit}
        ),
        kw AS (
          SELECT id, ts_rank_cd(${document}, plainto_tsquery('english', ${text})) AS kscore
          FROM chunks
          WHERE (${document}) @@ plainto_tsquery('english', ${text})
            ${this.documentFilter(filters)}
          ORDER BY kscore DESC
          LIMIT ${legLimit}
        ),
        joined AS (
          SELECT
            coalesce(vec.id, kw.id) AS id,
            greatest(coalesce(vec.vscore, 0), 0) AS vscore,
            coalesce(kw.kscore, 0) AS kscore
          FROM vec FULL OUTER JOIN kw ON vec.id = kw.id
        )
        SELECT
          id AS chunk_id,
          ${alpha}::float8 * coalesce(vscore / nullif(max(vscore) OVER (), 0), 0)
            + (1 - ${alpha}::float8) * coalesce(kscore / nullif(max(kscore) OVER (), 0), 0) AS score
        FROM joined
        ORDER BY score DESC, id
        LIMIT ${topK}
      `,
      signal
    );
    return rows.map((row) => ({ chunkId: row.chunk_id, score: Number(row.score) }));
  }

  async fetchChunk(chunkId: string, signal?: AbortSignal): Promise<Chunk | null> {
    const [chunk] = await this.fetchChunks([chunkId], signal);
    return chunk ?? null;
  }

  async fetchChunks(chunkIds: string[], signal?: AbortSignal): Promise<Chunk[]> {
    if (chunkIds.length === 0) return [];
    const rows = await cancellable(
      this.sql<ChunkRow[]>`
        SELECT id, document_id, text, section_title, element_type,
               page_start, page_end, keywords, summary
        FROM chunks
        WHERE id IN ${this.sql(chunkIds)}
      `,
      signal
    );
    return rows.map(chunkFromRow);
  }

  async listDocuments(signal?: AbortSignal): Promise<DocumentSummary[]> {
    const rows = await cancellable(
      this.sql<Array<{ document_id: string; chunk_count: number }>>`
        SELECT document_id, count(*)::int AS chunk_count
        FROM chunks
        GROUP BY document_id
        ORDER BY document_id
      `,
      signal
    );
    return rows.map((row) => ({ documentId: row.document_id, chunkCount: row.chunk_count }));
  }
}
