// PgVectorIndex - chunk store and cosine search on PostgreSQL with pgvector
// Schema lives in db/migrations/001_document_chunks.sql

import type { Chunk, ChunkFilter } from '../types/chunk.js';
import type { IndexedChunk, VectorIndex, VectorMatch } from '../types/collaborators.js';
import { inTransaction, query, toVectorLiteral } from '../db/pg-client.js';

interface WhereClause {
  sql: string;
  params: unknown[];
}

/** SQL conditions for a metadata filter; `first` is the index of the first placeholder */
export function filterToSql(filter: ChunkFilter, first: number): WhereClause {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const next = (value: unknown) => {
    params.push(value);
    return `$${first + params.length - 1}`;
  };

  if (filter.documentIds?.length) {
    conditions.push(`document_id = ANY(${next([...filter.documentIds])})`);
  }
  if (filter.statementTypes?.length) {
    conditions.push(`statement_type = ANY(${next([...filter.statementTypes])})`);
  }
  if (filter.chunkKinds?.length) {
    conditions.push(`kind = ANY(${next([...filter.chunkKinds])})`);
  }
  const range = filter.fiscalYearRange;
  if (range && (range.from !== undefined || range.to !== undefined)) {
    const bounds: string[] = [];
    if (range.from !== undefined) bounds.push(`y >= ${next(range.from)}`);
    if (range.to !== undefined) bounds.push(`y <= ${next(range.to)}`);
    conditions.push(`EXISTS (SELECT 1 FROM unnest(fiscal_years) AS y WHERE ${bounds.join(' AND ')})`);
  }

  return { sql: conditions.length > 0 ? conditions.join(' AND ') : 'TRUE', params };
}

export class PgVectorIndex implements VectorIndex {
  readonly backend = 'postgres';

  /** The whole batch commits or none of it does */
  async upsert(entries: readonly IndexedChunk[]): Promise<void> {
    if (entries.length === 0) return;
    await inTransaction(async run => {
      for (const { chunk, embedding } of entries) {
        await run(
          `INSERT INTO document_chunks
            (id, document_id, ordinal, kind, statement_type, fiscal_years, page_start, page_end, chunk, embedding)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::vector)
           ON CONFLICT (id) DO UPDATE SET
             ordinal = EXCLUDED.ordinal,
             kind = EXCLUDED.kind,
             statement_type = EXCLUDED.statement_type,
             fiscal_years = EXCLUDED.fiscal_years,
             page_start = EXCLUDED.page_start,
             page_end = EXCLUDED.page_end,
             chunk = EXCLUDED.chunk,
             embedding = EXCLUDED.embedding`,
          [
            chunk.id,
            chunk.documentId,
            chunk.ordinal,
            chunk.kind,
            chunk.metadata.statementType,
            [...chunk.metadata.fiscalYears],
            chunk.metadata.pageStart,
            chunk.metadata.pageEnd,
            JSON.stringify(chunk),
            toVectorLiteral(embedding),
          ],
        );
      }
    });
  }

  async deleteDocument(documentId: string, keep: readonly string[] = []): Promise<number> {
    const result = await query(
      'DELETE FROM document_chunks WHERE document_id = $1 AND NOT (id = ANY($2))',
      [documentId, [...keep]],
    );
    return result.rowCount ?? 0;
  }

  async query(embedding: Float32Array, filter: ChunkFilter, topK: number): Promise<VectorMatch[]> {
    const where = filterToSql(filter, 3);
    const { rows } = await query<{ id: string; similarity: number }>(
      `SELECT id, 1 - (embedding <=> $1::vector) AS similarity
       FROM document_chunks
       WHERE ${where.sql}
       ORDER BY embedding <=> $1::vector, id
       LIMIT $2`,
      [toVectorLiteral(embedding), topK, ...where.params],
    );
    return rows.map(r => ({ chunkId: r.id, score: Number(r.similarity) }));
  }

  async getChunks(ids: readonly string[]): Promise<Chunk[]> {
    if (ids.length === 0) return [];
    const { rows } = await query<{ id: string; chunk: Chunk }>(
      'SELECT id, chunk FROM document_chunks WHERE id = ANY($1)',
      [[...ids]],
    );
    const byId = new Map(rows.map(r => [r.id, r.chunk]));
    return ids.flatMap(id => {
      const chunk = byId.get(id);
      return chunk ? [chunk] : [];
    });
  }

  async fiscalYears(documentIds?: readonly string[]): Promise<number[]> {
    const scoped = documentIds !== undefined && documentIds.length > 0;
    const { rows } = await query<{ year: number }>(
      `SELECT DISTINCT unnest(fiscal_years) AS year
       FROM document_chunks
       ${scoped ? 'WHERE document_id = ANY($1)' : ''}
       ORDER BY year`,
      scoped ? [[...documentIds]] : [],
    );
    return rows.map(r => Number(r.year));
  }
}
