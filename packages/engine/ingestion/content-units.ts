// Flatten extracted pages into the ordered unit stream walked by the detector and the chunker

import type { ExtractedDocument, ExtractedPage, TableRegion } from '../types/document.js';
import { LEXICON, type Lexicon } from '../config/lexicon.js';
import { isAmountCell } from '../utils/financial-parser.js';
import { normalizeLabel } from '../utils/text.js';
import { isTitleLine, TERMINAL_PUNCTUATION } from './headings.js';

export interface TextUnit {
  readonly kind: 'text';
  readonly page: number;
  readonly offset: number;
  readonly text: string;
  /** Title line opening a paragraph; a wrapped line inside a sentence never is one */
  readonly heading: boolean;
}

export interface TableUnit {
  readonly kind: 'table';
  readonly page: number;
  readonly offset: number;
  readonly region: TableRegion;
  /** Logical table index; a region continuing the previous page's table shares it */
  readonly tableIndex: number;
  readonly continuation: boolean;
  readonly headerRows: string[][];
  readonly bodyRows: string[][];
}

export type ContentUnit = TextUnit | TableUnit;

/** Cell grid as string rows ordered by column */
export function tableRows(region: TableRegion): string[][] {
  return region.rows.map(row =>
    [...row].sort((a, b) => a.column - b.column).map(cell => cell.text.trim()),
  );
}

/** A section row: a label in the first cell and nothing else */
export function isLabelOnlyRow(row: readonly string[]): boolean {
  return row.length > 0 && row[0] !== '' && row.slice(1).every(cell => cell === '');
}

/**
 * Header rows: the reported count when extraction gives one, otherwise the
 * leading rows without an amount cell (at least one). A section row after the
 * first header row belongs to the body.
 */
export function headerRowCount(region: TableRegion, rows: string[][]): number {
  if (region.headerRowCount !== undefined) {
    return Math.min(Math.max(region.headerRowCount, 1), rows.length);
  }
  let count = 0;
  while (
    count < rows.length - 1 &&
    !rows[count].some(isAmountCell) &&
    !(count > 0 && isLabelOnlyRow(rows[count]))
  ) count++;
  return Math.max(1, Math.min(count, rows.length));
}

function headerKey(rows: readonly string[][]): string {
  return rows.map(r => r.map(normalizeLabel).join('|')).join('\n');
}

interface RawUnit {
  offset: number;
  text?: string;
  /** First line of a span or the first after a blank line */
  blockStart?: boolean;
  region?: TableRegion;
}

function pageUnits(page: ExtractedPage): RawUnit[] {
  const units: RawUnit[] = [];
  for (const span of page.spans) {
    let lineStart = 0;
    let blockStart = true;
    for (const line of span.text.split('\n')) {
      const text = line.trim().replace(/\s+/g, ' ');
      if (text) {
        units.push({ offset: span.offset + lineStart, text, blockStart });
        blockStart = false;
      } else {
        blockStart = true;
      }
      lineStart += line.length + 1;
    }
  }
  for (const region of page.tables) {
    if (region.rows.length > 0) units.push({ offset: region.offset, region });
  }
  return units.sort((a, b) => a.offset - b.offset);
}

/**
 * Units in reading order: pages ascending, then offset. A text line is a
 * heading only when it opens a paragraph: first in its span, after a blank
 * line, or after a line that ended its sentence. A table region that
 * opens a page continues the previous page's table when extraction flags it or
 * when it repeats the same header rows; repeated headers are then dropped.
 */
export function contentUnits(document: ExtractedDocument, lexicon: Lexicon = LEXICON): ContentUnit[] {
  const units: ContentUnit[] = [];
  const pages = [...document.pages].sort((a, b) => a.pageNumber - b.pageNumber);
  let nextTableIndex = 0;
  // whether the previous line finished its paragraph
  let closed = true;

  for (const page of pages) {
    const raw = pageUnits(page);
    raw.forEach((item, position) => {
      if (item.text !== undefined) {
        const heading = (closed || item.blockStart === true) && isTitleLine(item.text, lexicon);
        closed = heading || TERMINAL_PUNCTUATION.test(item.text);
        units.push({ kind: 'text', page: page.pageNumber, offset: item.offset, text: item.text, heading });
        return;
      }
      if (!item.region) return;
      closed = true;

      const rows = tableRows(item.region);
      let headerCount = headerRowCount(item.region, rows);
      const previous = units[units.length - 1];
      const openTable =
        position === 0 && previous?.kind === 'table' && previous.page < page.pageNumber ? previous : undefined;

      let continuation = false;
      if (openTable) {
        const sameHeader = headerKey(rows.slice(0, headerCount)) === headerKey(openTable.headerRows);
        continuation = item.region.continuesPrevious === true || sameHeader;
        if (continuation && !sameHeader) headerCount = Math.min(item.region.headerRowCount ?? 0, rows.length);
      }

      const tableIndex = continuation && openTable ? openTable.tableIndex : nextTableIndex++;
      const headerRows = continuation && openTable ? openTable.headerRows : rows.slice(0, headerCount);
      units.push({
        kind: 'table',
        page: page.pageNumber,
        offset: item.offset,
        region: item.region,
        tableIndex,
        continuation,
        headerRows,
        bodyRows: rows.slice(headerCount),
      });
    });
  }
  return units;
}
