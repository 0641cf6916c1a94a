// Semantic Chunker
// Walks the unit stream between boundaries and emits bounded, metadata-tagged chunks.
// Statement changes and table edges always close a chunk; tables split only on row groups.

import { createHash } from 'node:crypto';
import type { Boundary, ExtractedDocument, StatementType } from '../types/document.js';
import type { Chunk, ChunkBounds, ChunkContent, ChunkKind, TableBlock } from '../types/chunk.js';
import { contentUnits, isLabelOnlyRow, type ContentUnit, type TableUnit, type TextUnit } from './content-units.js';
import { CLOSING_KINDS } from './boundary-detector.js';
import { TERMINAL_PUNCTUATION } from './headings.js';
import { estimateTokens, normalizeLabel, splitSentences } from '../utils/text.js';
import { extractFiscalPeriods, fiscalYearsOf } from '../utils/fiscal-period.js';

export const DEFAULT_CHUNK_BOUNDS: ChunkBounds = { lower: 200, upper: 500 };

/** Chunk under construction, before ordinals and ids are assigned */
interface Draft {
  content: ChunkContent[];
  kind: ChunkKind;
  statementType: StatementType;
  /** Statement section the draft belongs to; merges never cross sections */
  segment: number;
  pageStart: number;
  pageEnd: number;
  boundaryIds: string[];
}

interface Piece {
  text: string;
  pageStart: number;
  pageEnd: number;
  /** Headings and paragraph ends render on their own line */
  lineBreak: boolean;
}

/** Lines of the paragraph being read, which may run onto later pages */
interface OpenParagraph {
  lines: Array<{ text: string; page: number }>;
}

interface OpenTable {
  unit: TableUnit;
  rows: Array<{ cells: string[]; page: number }>;
  pageStart: number;
  boundaryIds: string[];
}

export function renderRow(row: readonly string[]): string {
  return row.join(' | ').replace(/(?:\s*\|\s*)+$/, '');
}

export function renderContent(content: readonly ChunkContent[]): string {
  return content
    .map(block =>
      block.type === 'text'
        ? block.text
        : [...block.headerRows, ...block.rows].map(renderRow).join('\n'),
    )
    .join('\n\n');
}

function renderPieces(pieces: readonly Piece[]): string {
  let out = '';
  pieces.forEach((piece, i) => {
    out += piece.text;
    if (i < pieces.length - 1) out += piece.lineBreak ? '\n' : ' ';
  });
  return out;
}

function isTotalRow(row: readonly string[]): boolean {
  return normalizeLabel(row[0] ?? '').startsWith('total');
}

/**
 * Row groups: a section row (label only) opens a group and a "Total ..." row
 * closes one. Rows are never split.
 */
export function rowGroups<T extends { cells: readonly string[] }>(rows: readonly T[]): T[][] {
  const groups: T[][] = [];
  let current: T[] = [];
  for (const row of rows) {
    if (isLabelOnlyRow(row.cells) && current.length > 0) {
      groups.push(current);
      current = [];
    }
    current.push(row);
    if (isTotalRow(row.cells)) {
      groups.push(current);
      current = [];
    }
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

function validateBounds(bounds: ChunkBounds): void {
  if (!Number.isInteger(bounds.lower) || !Number.isInteger(bounds.upper) || bounds.lower < 1 || bounds.upper < bounds.lower) {
    throw new RangeError(`Invalid chunk bounds [${bounds.lower}, ${bounds.upper}]`);
  }
}

class ChunkAssembler {
  readonly drafts: Draft[] = [];
  private pieces: Piece[] = [];
  private narrativeBoundaryIds: string[] = [];
  private table: OpenTable | undefined;
  private paragraph: OpenParagraph | undefined;
  statementType: StatementType = 'unclassified';
  segment = 0;

  constructor(private readonly bounds: ChunkBounds) {}

  /** Boundary ids seen since the last unit; attached to whatever is built next */
  attachBoundary(id: string): void {
    if (this.table) this.table.boundaryIds.push(id);
    else this.narrativeBoundaryIds.push(id);
  }

  addLine(unit: TextUnit): void {
    this.closeTable();
    if (unit.heading) {
      this.flushParagraph();
      this.addSentence({ text: unit.text, pageStart: unit.page, pageEnd: unit.page, lineBreak: true });
      return;
    }
    if (!this.paragraph) this.paragraph = { lines: [] };
    this.paragraph.lines.push({ text: unit.text, page: unit.page });
    if (TERMINAL_PUNCTUATION.test(unit.text)) this.flushParagraph();
  }

  addTable(unit: TableUnit): void {
    this.closeNarrative();
    let table = this.table;
    if (!(unit.continuation && table && table.unit.tableIndex === unit.tableIndex)) {
      this.closeTable();
      table = { unit, rows: [], pageStart: unit.page, boundaryIds: [...this.narrativeBoundaryIds] };
      this.table = table;
      this.narrativeBoundaryIds = [];
    }
    for (const cells of unit.bodyRows) table.rows.push({ cells, page: unit.page });
  }

  /** Close everything open; called at closing boundaries and at the end */
  close(): void {
    this.closeNarrative();
    this.closeTable();
  }

  /**
   * Split the paragraph into sentences, each spanning the pages of the lines
   * it was read from. Lines are whitespace-normalized, so sentences are
   * consecutive slices of the joined text separated by one space.
   */
  private flushParagraph(): void {
    if (!this.paragraph) return;
    const { lines } = this.paragraph;
    this.paragraph = undefined;

    const lineStarts: number[] = [];
    let length = 0;
    for (const line of lines) {
      lineStarts.push(length);
      length += line.text.length + 1;
    }
    const pageAt = (position: number) => {
      let i = lineStarts.length - 1;
      while (i > 0 && lineStarts[i] > position) i--;
      return lines[i].page;
    };

    const sentences = splitSentences(lines.map(l => l.text).join(' '));
    let cursor = 0;
    sentences.forEach((sentence, i) => {
      const pageStart = pageAt(cursor);
      const pageEnd = pageAt(cursor + sentence.length - 1);
      cursor += sentence.length + 1;
      this.addSentence({ text: sentence, pageStart, pageEnd, lineBreak: i === sentences.length - 1 });
    });
  }

  private addSentence(piece: Piece): void {
    if (this.pieces.length > 0) {
      const grown = estimateTokens(renderPieces([...this.pieces, piece]));
      if (grown > this.bounds.upper) this.emitNarrative();
    }
    this.pieces.push(piece);
  }

  private closeNarrative(): void {
    this.flushParagraph();
    this.emitNarrative();
  }

  private emitNarrative(): void {
    if (this.pieces.length === 0) return;
    this.drafts.push({
      content: [{ type: 'text', text: renderPieces(this.pieces) }],
      kind: 'narrative',
      statementType: this.statementType,
      segment: this.segment,
      pageStart: Math.min(...this.pieces.map(p => p.pageStart)),
      pageEnd: Math.max(...this.pieces.map(p => p.pageEnd)),
      boundaryIds: this.narrativeBoundaryIds,
    });
    this.pieces = [];
    this.narrativeBoundaryIds = [];
  }

  private closeTable(): void {
    const table = this.table;
    if (!table) return;
    this.table = undefined;

    const headerRows = table.unit.headerRows.length > 0
      ? table.unit.headerRows
      : table.rows.slice(0, 1).map(r => r.cells);
    const bodyRows = table.unit.headerRows.length > 0 ? table.rows : table.rows.slice(1);

    const emit = (rows: Array<{ cells: string[]; page: number }>) => {
      const block: TableBlock = {
        type: 'table',
        tableIndex: table.unit.tableIndex,
        headerRows,
        rows: rows.map(r => r.cells),
      };
      const pages = rows.length > 0 ? rows.map(r => r.page) : [table.pageStart];
      this.drafts.push({
        content: [block],
        kind: 'tabular',
        statementType: this.statementType,
        segment: this.segment,
        pageStart: Math.min(...pages),
        pageEnd: Math.max(...pages),
        boundaryIds: table.boundaryIds,
      });
    };

    const tokensOf = (rows: ReadonlyArray<{ cells: string[] }>) =>
      estimateTokens([...headerRows, ...rows.map(r => r.cells)].map(renderRow).join('\n'));

    if (bodyRows.length === 0 || tokensOf(bodyRows) <= this.bounds.upper) {
      emit(bodyRows);
      return;
    }

    let packed: Array<{ cells: string[]; page: number }> = [];
    for (const group of rowGroups(bodyRows)) {
      if (packed.length > 0 && tokensOf([...packed, ...group]) > this.bounds.upper) {
        emit(packed);
        packed = [];
      }
      packed.push(...group);
    }
    if (packed.length > 0) emit(packed);
  }
}

function mergeDrafts(a: Draft, b: Draft): Draft {
  return {
    content: [...a.content, ...b.content],
    kind: a.kind === b.kind ? a.kind : 'mixed',
    statementType: a.statementType,
    segment: a.segment,
    pageStart: Math.min(a.pageStart, b.pageStart),
    pageEnd: Math.max(a.pageEnd, b.pageEnd),
    boundaryIds: [...a.boundaryIds, ...b.boundaryIds],
  };
}

const tokensOfDraft = (draft: Draft) => estimateTokens(renderContent(draft.content));

/**
 * Merge chunks below `lower` into a neighbour inside one statement section,
 * capped at `upper`: first into the successor, then whatever is still short
 * (the end of a section) into its predecessor.
 */
function mergeShort(drafts: readonly Draft[], bounds: ChunkBounds): Draft[] {
  const forward: Draft[] = [];
  let current: Draft | undefined;
  for (const draft of drafts) {
    if (!current) {
      current = draft;
      continue;
    }
    if (tokensOfDraft(current) < bounds.lower && current.segment === draft.segment) {
      const merged = mergeDrafts(current, draft);
      if (tokensOfDraft(merged) <= bounds.upper) {
        current = merged;
        continue;
      }
    }
    forward.push(current);
    current = draft;
  }
  if (current) forward.push(current);

  const out: Draft[] = [];
  for (const draft of forward) {
    const previous = out[out.length - 1];
    if (previous && previous.segment === draft.segment && tokensOfDraft(draft) < bounds.lower) {
      const merged = mergeDrafts(previous, draft);
      if (tokensOfDraft(merged) <= bounds.upper) {
        out[out.length - 1] = merged;
        continue;
      }
    }
    out.push(draft);
  }
  return out;
}

function chunkPeriods(content: readonly ChunkContent[], declared: readonly string[]): string[] {
  const sources = content.flatMap(block =>
    block.type === 'text' ? [block.text] : block.headerRows.map(row => row.join(' ')),
  );
  const found = [...new Set(sources.flatMap(extractFiscalPeriods))];
  return found.length > 0 ? found : [...declared];
}

export function chunkId(documentId: string, ordinal: number, text: string): string {
  const hash = createHash('sha256').update(text).digest('hex').slice(0, 12);
  return `${documentId}:${String(ordinal).padStart(4, '0')}:${hash}`;
}

/**
 * Chunk one document along its boundaries. Boundaries must belong to the
 * document and be ordered by (page, offset), as produced by detectBoundaries.
 */
export function chunkDocument(
  document: ExtractedDocument,
  boundaries: readonly Boundary[],
  bounds: ChunkBounds = DEFAULT_CHUNK_BOUNDS,
  units: ContentUnit[] = contentUnits(document),
): Chunk[] {
  validateBounds(bounds);
  const ordered = [...boundaries].sort((a, b) => a.page - b.page || a.offset - b.offset);
  const assembler = new ChunkAssembler(bounds);
  let next = 0;

  const consumeUpTo = (page: number, offset: number) => {
    while (next < ordered.length) {
      const b = ordered[next];
      if (b.page > page || (b.page === page && b.offset > offset)) break;
      next++;
      if (CLOSING_KINDS.has(b.kind)) assembler.close();
      if (b.kind === 'statement-change') {
        assembler.segment++;
        assembler.statementType = b.statementType ?? 'unclassified';
      }
      assembler.attachBoundary(b.id);
    }
  };

  for (const unit of units) {
    consumeUpTo(unit.page, unit.offset);
    if (unit.kind === 'text') assembler.addLine(unit);
    else assembler.addTable(unit);
  }
  consumeUpTo(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY);
  assembler.close();

  const declared = document.fiscalPeriods ?? [];
  return mergeShort(assembler.drafts, bounds).map((draft, ordinal) => {
    const text = renderContent(draft.content);
    const fiscalPeriods = chunkPeriods(draft.content, declared);
    const table = draft.content.find((block): block is TableBlock => block.type === 'table');
    return {
      id: chunkId(document.documentId, ordinal, text),
      documentId: document.documentId,
      ordinal,
      kind: draft.kind,
      content: draft.content,
      text,
      tokens: estimateTokens(text),
      metadata: {
        fiscalPeriods,
        fiscalYears: fiscalYearsOf(fiscalPeriods),
        statementType: draft.statementType,
        pageStart: draft.pageStart,
        pageEnd: draft.pageEnd,
        sourceBoundaryIds: [...new Set(draft.boundaryIds)],
        ...(table ? { tableIndex: table.tableIndex } : {}),
      },
    };
  });
}
