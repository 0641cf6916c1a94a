// Section Boundary Detector
// Finds statement changes, table extents, section headings and page breaks in one document.
// Fails soft: a document without structural cues becomes one section split only by page breaks.

import type { Boundary, BoundaryDetection, BoundaryKind, ExtractedDocument, StatementType } from '../types/document.js';
import { LEXICON, type Lexicon } from '../config/lexicon.js';
import { contentUnits, type ContentUnit } from './content-units.js';
import { statementTitle } from './headings.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('BoundaryDetector');

/** Collision priority at one position, highest first */
export const BOUNDARY_PRIORITY: Record<BoundaryKind, number> = {
  'statement-change': 5,
  'table-start': 4,
  'table-end': 3,
  'section-heading': 2,
  'page-break': 1,
};

/** Kinds that close the chunk being built */
export const CLOSING_KINDS: ReadonlySet<BoundaryKind> = new Set(['statement-change', 'table-start', 'table-end']);

interface Candidate {
  page: number;
  offset: number;
  kind: BoundaryKind;
  statementType?: StatementType;
  label?: string;
}

function positionKey(page: number, offset: number): string {
  return `${page}:${offset}`;
}

export interface BoundaryDetectorOptions {
  lexicon?: Lexicon;
  /** Precomputed unit stream for the same document */
  units?: ContentUnit[];
}

/**
 * Detect the ordered boundary sequence of one document. Output is strictly
 * increasing by (page, offset) with at most one boundary per position.
 */
export function detectBoundaries(
  document: ExtractedDocument,
  options: BoundaryDetectorOptions = {},
): BoundaryDetection {
  const lexicon = options.lexicon ?? LEXICON;
  const units = options.units ?? contentUnits(document, lexicon);
  const candidates = new Map<string, Candidate>();

  const propose = (candidate: Candidate) => {
    const key = positionKey(candidate.page, candidate.offset);
    const existing = candidates.get(key);
    if (!existing || BOUNDARY_PRIORITY[candidate.kind] > BOUNDARY_PRIORITY[existing.kind]) {
      candidates.set(key, candidate);
    }
  };

  const pages = [...document.pages].map(p => p.pageNumber).sort((a, b) => a - b);
  for (const page of pages.slice(1)) {
    propose({ page, offset: 0, kind: 'page-break' });
  }

  let currentStatement: StatementType | undefined;
  let openTable: number | undefined;

  units.forEach((unit, i) => {
    if (openTable !== undefined && !(unit.kind === 'table' && unit.continuation && unit.tableIndex === openTable)) {
      propose({ page: unit.page, offset: unit.offset, kind: 'table-end' });
      openTable = undefined;
    }

    if (unit.kind === 'table') {
      if (!unit.continuation || openTable === undefined) {
        propose({ page: unit.page, offset: unit.offset, kind: 'table-start', label: `table ${unit.tableIndex}` });
      }
      openTable = unit.tableIndex;
      if (i === units.length - 1) {
        propose({ page: unit.page, offset: unit.offset + 1, kind: 'table-end' });
      }
      return;
    }

    if (!unit.heading) return;
    const statementType = statementTitle(unit.text, lexicon);
    if (statementType && statementType !== currentStatement) {
      currentStatement = statementType;
      propose({ page: unit.page, offset: unit.offset, kind: 'statement-change', statementType, label: unit.text });
    } else {
      propose({ page: unit.page, offset: unit.offset, kind: 'section-heading', label: unit.text });
    }
  });

  const ordered = [...candidates.values()].sort((a, b) => a.page - b.page || a.offset - b.offset);
  const boundaries: Boundary[] = ordered.map((c, n) => ({
    id: `${document.documentId}#b${String(n).padStart(4, '0')}`,
    documentId: document.documentId,
    page: c.page,
    offset: c.offset,
    kind: c.kind,
    ...(c.statementType ? { statementType: c.statementType } : {}),
    ...(c.label ? { label: c.label } : {}),
  }));

  const degraded = !boundaries.some(b => b.kind !== 'page-break');
  log.debug('Boundaries detected', {
    documentId: document.documentId,
    count: boundaries.length,
    degraded,
  });
  return { boundaries, degraded };
}
