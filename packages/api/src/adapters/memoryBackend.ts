/**
 * In-process search backend.
 *
 * Keeps chunks in memory and answers vector (cosine), keyword (BM25) and
 * hybrid queries over them. Used for local runs without PostgreSQL and as
 * the stand-in store in tests.
 */

import { cosineSimilarity, normalizeByMax, type Chunk, type DocumentSummary } from '@docqa/shared';
import type { DocumentInventory, KeywordProperty, ScoredChunkId, SearchBackend, SearchFilters } from './types';

/** BM25 parameters */
const BM25_K1 = 1.2;
const BM25_B = 0.75;

interface FieldEntry {
  terms: Map<string, number>; // term -> frequency
  length: number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .split(/\s+/)
    .filter((t) => t.length > 1);
}

function propertyText(chunk: Chunk, property: KeywordProperty): string {
  switch (property) {
    case 'text':
      return chunk.text;
    case 'section_title':
      return chunk.sectionTitle;
    case 'keywords':
      return chunk.keywords.join(' ');
    case 'summary':
      return chunk.summary;
  }
}

export class InMemorySearchBackend implements SearchBackend, DocumentInventory {
  private readonly chunks = new Map<string, Chunk>();

  constructor(chunks: Chunk[] = []) {
    this.addChunks(chunks);
  }

  addChunks(chunks: Chunk[]): void {
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  get size(): number {
    return this.chunks.size;
  }

  async vectorSearch(vector: number[], topK: number, filters?: SearchFilters): Promise<ScoredChunkId[]> {
    const scored: ScoredChunkId[] = [];
    for (const chunk of this.candidates(filters)) {
      if (!chunk.embedding) continue;
      scored.push({ chunkId: chunk.id, score: cosineSimilarity(vector, chunk.embedding) });
    }
    return sortAndLimit(scored, topK);
  }

  async keywordSearch(
    text: string,
    properties: readonly KeywordProperty[],
    topK: number,
    filters?: SearchFilters
  ): Promise<ScoredChunkId[]> {
    return sortAndLimit(this.bm25(text, properties, filters), topK);
  }

  async hybridSearch(
    text: string,
    vector: number[],
    topK: number,
    alpha = 0.5,
    filters?: SearchFilters
  ): Promise<ScoredChunkId[]> {
    const pool = this.candidates(filters);
    const vectorScores = pool.map((c) => (c.embedding ? Math.max(0, cosineSimilarity(vector, c.embedding)) : 0));
    const keywordById = new Map(this.bm25(text, ['text', 'section_title', 'keywords'], filters).map((h) => [h.chunkId, h.score]));
    const keywordScores = normalizeByMax(pool.map((c) => keywordById.get(c.id) ?? 0));
    const normalizedVector = normalizeByMax(vectorScores);

    const scored = pool
      .map((chunk, i) => ({
        chunkId: chunk.id,
        score: alpha * normalizedVector[i] + (1 - alpha) * keywordScores[i],
      }))
      .filter((h) => h.score > 0);

    return sortAndLimit(scored, topK);
  }

  async fetchChunk(chunkId: string): Promise<Chunk | null> {
    return this.chunks.get(chunkId) ?? null;
  }

  async fetchChunks(chunkIds: string[]): Promise<Chunk[]> {
    const found: Chunk[] = [];
    for (const id of chunkIds) {
      const chunk = this.chunks.get(id);
      if (chunk) found.push(chunk);
    }
    return found;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const counts = new Map<string, number>();
    for (const chunk of this.chunks.values()) {
      counts.set(chunk.documentId, (counts.get(chunk.documentId) ?? 0) + 1);
    }
    return Array.from(counts.entries())
      .map(([documentId, chunkCount]) => ({ documentId, chunkCount }))
      .sort((a, b) => a.documentId.localeCompare(b.documentId));
  }

  private candidates(filters?: SearchFilters): Chunk[] {
    const all = Array.from(this.chunks.values());
    if (!filters?.documentId) return all;
    return all.filter((c) => c.documentId === filters.documentId);
  }

  /**
   * BM25 over the concatenation of the requested properties.
   * Statistics are computed over the filtered pool.
   */
  private bm25(text: string, properties: readonly KeywordProperty[], filters?: SearchFilters): ScoredChunkId[] {
    const pool = this.candidates(filters);
    if (pool.length === 0) return [];

    const entries = new Map<string, FieldEntry>();
    const docFreq = new Map<string, number>();
    let totalLength = 0;

    for (const chunk of pool) {
      const terms = tokenize(properties.map((p) => propertyText(chunk, p)).join(' '));
      const tf = new Map<string, number>();
      for (const term of terms) {
        tf.set(term, (tf.get(term) ?? 0) + 1);
      }
      for (const term of tf.keys()) {
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
      entries.set(chunk.id, { terms: tf, length: terms.length });
      totalLength += terms.length;
    }

    const avgLength = totalLength / pool.length || 1;
    const queryTerms = Array.from(new Set(tokenize(text)));
    const scores = new Map<string, number>();

    for (const term of queryTerms) {
      const df = docFreq.get(term);
      if (!df) continue;
      const idf = Math.log(1 + (pool.length - df + 0.5) / (df + 0.5));

      for (const [chunkId, entry] of entries) {
        const tf = entry.terms.get(term);
        if (!tf) continue;
        const denominator = tf + BM25_K1 * (1 - BM25_B + BM25_B * (entry.length / avgLength));
        const score = idf * ((tf * (BM25_K1 + 1)) / denominator);
        scores.set(chunkId, (scores.get(chunkId) ?? 0) + score);
      }
    }

    return Array.from(scores.entries()).map(([chunkId, score]) => ({ chunkId, score }));
  }
}

function sortAndLimit(hits: ScoredChunkId[], topK: number): ScoredChunkId[] {
  return hits
    .sort((a, b) => b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0))
    .slice(0, Math.max(0, topK));
}
