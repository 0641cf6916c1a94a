// Metadata filter evaluation shared by the vector index backends

import type { Chunk, ChunkFilter, FiscalYearRange } from '../types/chunk.js';

export function yearInRange(year: number, range: FiscalYearRange): boolean {
  if (range.from !== undefined && year < range.from) return false;
  if (range.to !== undefined && year > range.to) return false;
  return true;
}

/**
 * Conjunction over chunk metadata. A fiscal range matches when any of the
 * chunk's years falls inside it; chunks without years never match a range.
 */
export function matchesFilter(chunk: Chunk, filter: ChunkFilter): boolean {
  const { metadata } = chunk;
  if (filter.documentIds?.length && !filter.documentIds.includes(chunk.documentId)) return false;
  if (filter.statementTypes?.length && !filter.statementTypes.includes(metadata.statementType)) return false;
  if (filter.chunkKinds?.length && !filter.chunkKinds.includes(chunk.kind)) return false;
  const range = filter.fiscalYearRange;
  if (range && (range.from !== undefined || range.to !== undefined)) {
    if (!metadata.fiscalYears.some(year => yearInRange(year, range))) return false;
  }
  return true;
}

/** Compact description for logs and caveats */
export function describeFilter(filter: ChunkFilter): string {
  const parts: string[] = [];
  const range = filter.fiscalYearRange;
  if (range && (range.from !== undefined || range.to !== undefined)) {
    parts.push(`years ${range.from ?? '..'}-${range.to ?? '..'}`);
  }
  if (filter.statementTypes?.length) parts.push(`statements ${filter.statementTypes.join(',')}`);
  if (filter.chunkKinds?.length) parts.push(`kinds ${filter.chunkKinds.join(',')}`);
  if (filter.documentIds?.length) parts.push(`documents ${filter.documentIds.join(',')}`);
  return parts.length > 0 ? parts.join('; ') : 'no filters';
}
