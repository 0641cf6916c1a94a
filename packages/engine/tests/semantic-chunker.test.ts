// Tests for the semantic chunker

import { describe, it, expect } from 'vitest';
import type { ExtractedDocument, ExtractedPage } from '../types/document.js';
import type { Chunk, ChunkBounds } from '../types/chunk.js';
import { detectBoundaries } from '../ingestion/boundary-detector.js';
import { chunkDocument, renderRow, rowGroups } from '../ingestion/semantic-chunker.js';
import { estimateTokens, splitSentences } from '../utils/text.js';
import { annualReport, page, table } from './fixtures.js';

function chunk(doc: ExtractedDocument, bounds = { lower: 1, upper: 500 }) {
  return chunkDocument(doc, detectBoundaries(doc).boundaries, bounds);
}

function balanceSheet(): ExtractedDocument {
  return {
    documentId: 'bs',
    pages: [
      page('bs', 1, [[0, 'Consolidated Balance Sheet']], [
        table(30, [
          ['Item', '2023'],
          ['Current assets', ''],
          ['Cash', '100'],
          ['Receivables', '200'],
          ['Total current assets', '300'],
          ['Non-current assets', ''],
          ['Property', '400'],
          ['Total non-current assets', '400'],
        ]),
      ]),
    ],
  };
}

describe('chunkDocument', () => {
  it('closes chunks at statement changes and table edges', () => {
    const chunks = chunk(annualReport());

    expect(chunks.map(c => c.kind)).toEqual(['narrative', 'tabular', 'narrative']);
    expect(chunks.map(c => c.metadata.statementType)).toEqual(['income_statement', 'income_statement', 'risk_management']);
    expect(chunks.map(c => c.ordinal)).toEqual([0, 1, 2]);
  });

  it('renders table chunks with their header rows', () => {
    const [, tabular] = chunk(annualReport());

    expect(tabular.text).toBe('USD millions | 2023 | 2022\nRevenue | 1,200 | 1,000\nNet income | 150 | 120');
    expect(tabular.metadata.fiscalPeriods).toEqual(['FY2023', 'FY2022']);
    expect(tabular.metadata.fiscalYears).toEqual([2022, 2023]);
    expect(tabular.metadata.sourceBoundaryIds).toEqual(['annual-2023#b0001']);
  });

  it('falls back to the declared periods when a chunk names none', () => {
    const chunks = chunk(annualReport());

    expect(chunks[0].metadata.fiscalPeriods).toEqual(['FY2023']);
    expect(chunks[2].metadata.fiscalYears).toEqual([2023]);
  });

  it('puts headings on their own line above the paragraph', () => {
    const risk = chunk(annualReport())[2];

    expect(risk.text).toBe(
      'Risk Management\nThe group is exposed to credit risk on its loan book. Liquidity risk is managed by the treasury function.',
    );
    expect(risk.metadata.pageStart).toBe(2);
    expect(risk.metadata.pageEnd).toBe(2);
  });

  it('keeps a statement name wrapped inside a sentence in the same paragraph', () => {
    const doc: ExtractedDocument = {
      documentId: 'wrap',
      pages: [page('wrap', 1, [[0, [
        'Consolidated Income Statement',
        'Revenue grew strongly this year as noted in the',
        'Consolidated Balance Sheet and the',
        'accompanying notes to the accounts.',
      ].join('\n')]])],
    };
    const chunks = chunk(doc);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].metadata.statementType).toBe('income_statement');
    expect(chunks[0].text).toBe(
      'Consolidated Income Statement\n' +
        'Revenue grew strongly this year as noted in the Consolidated Balance Sheet and the accompanying notes to the accounts.',
    );
  });

  it('spans every page a paragraph runs across', () => {
    const doc: ExtractedDocument = {
      documentId: 'memo',
      pages: [
        page('memo', 1, [[0, 'The group refinanced its revolving credit facility during the year and extended']]),
        page('memo', 2, [[0, 'its maturity to 2028.']]),
      ],
    };
    const chunks = chunk(doc);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe(
      'The group refinanced its revolving credit facility during the year and extended its maturity to 2028.',
    );
    expect(chunks[0].metadata.pageStart).toBe(1);
    expect(chunks[0].metadata.pageEnd).toBe(2);
  });

  it('records the table index on chunks that hold a table', () => {
    const chunks = chunk(annualReport());
    expect(chunks.map(c => c.metadata.tableIndex)).toEqual([undefined, 0, undefined]);

    const [mixed] = chunk(annualReport(), { lower: 200, upper: 500 });
    expect(mixed.kind).toBe('mixed');
    expect(mixed.metadata.tableIndex).toBe(0);
  });

  it('derives ids from document, ordinal and content', () => {
    const chunks = chunk(annualReport());

    expect(chunks[1].id).toMatch(/^annual-2023:0001:[0-9a-f]{12}$/);
    expect(new Set(chunks.map(c => c.id)).size).toBe(chunks.length);
  });

  it('is deterministic for the same input', () => {
    expect(chunk(annualReport())).toEqual(chunk(annualReport()));
  });

  it('merges a short chunk into its successor within one statement only', () => {
    const chunks = chunk(annualReport(), { lower: 200, upper: 500 });

    expect(chunks).toHaveLength(2);
    expect(chunks[0].kind).toBe('mixed');
    expect(chunks[0].metadata.statementType).toBe('income_statement');
    expect(chunks[0].text).toBe(
      'Consolidated Income Statement\n\nUSD millions | 2023 | 2022\nRevenue | 1,200 | 1,000\nNet income | 150 | 120',
    );
    expect(chunks[0].metadata.sourceBoundaryIds).toEqual(['annual-2023#b0000', 'annual-2023#b0001']);
    expect(chunks[1].metadata.statementType).toBe('risk_management');
  });

  it('splits an oversized table on row groups and repeats the header in each part', () => {
    const chunks = chunk(balanceSheet(), { lower: 1, upper: 25 });
    const tables = chunks.filter(c => c.kind === 'tabular');

    expect(tables).toHaveLength(2);
    expect(tables.map(t => t.tokens)).toEqual([21, 19]);
    expect(tables[0].content).toEqual([{
      type: 'table',
      tableIndex: 0,
      headerRows: [['Item', '2023']],
      rows: [['Current assets', ''], ['Cash', '100'], ['Receivables', '200'], ['Total current assets', '300']],
    }]);
    expect(tables[1].content).toEqual([{
      type: 'table',
      tableIndex: 0,
      headerRows: [['Item', '2023']],
      rows: [['Non-current assets', ''], ['Property', '400'], ['Total non-current assets', '400']],
    }]);
  });

  it('keeps a table that continues across a page break in one chunk', () => {
    const doc: ExtractedDocument = {
      documentId: 'cf',
      pages: [
        page('cf', 1, [[0, 'Statement of Cash Flows']], [
          table(30, [['', '2023', '2022'], ['Net cash from operating activities', '500', '450']]),
        ]),
        page('cf', 2, [], [table(0, [['', '2023', '2022'], ['Capital expenditure', '(120)', '(100)']])]),
      ],
    };
    const [, tabular] = chunk(doc);

    expect(tabular.metadata.pageStart).toBe(1);
    expect(tabular.metadata.pageEnd).toBe(2);
    expect(tabular.metadata.statementType).toBe('cash_flow');
    expect(tabular.metadata.sourceBoundaryIds).toEqual(['cf#b0001', 'cf#b0002']);
    expect(tabular.text).toBe(' | 2023 | 2022\nNet cash from operating activities | 500 | 450\nCapital expenditure | (120) | (100)');
  });

  it('never lets a chunk run across a statement change', () => {
    const continued = (label: string, a: string, b: string) =>
      [table(0, [[label, a, b]], { continuesPrevious: true })];
    const doc: ExtractedDocument = {
      documentId: 'ar',
      pages: [
        page('ar', 1, [[0, 'Consolidated Income Statement'], [40, 'Revenue and profit are reported below.']]),
        page('ar', 2, [], [table(0, [['USD millions', '2023', '2022'], ['Revenue', '1,200', '1,000']])]),
        page('ar', 3, [], continued('Cost of sales', '(700)', '(600)')),
        page('ar', 4, [], continued('Operating expenses', '(300)', '(250)')),
        page('ar', 5, [], continued('Net income', '150', '120')),
        page('ar', 6, [[0, 'Statement of Cash Flows'], [30, 'Cash generated from operations rose in the year.']]),
      ],
    };
    const chunks = chunk(doc, { lower: 200, upper: 500 });

    expect(chunks.every(c => c.metadata.pageEnd < 6 || c.metadata.pageStart >= 6)).toBe(true);
    expect(chunks[chunks.length - 1].metadata.pageStart).toBe(6);
    expect(chunks[chunks.length - 1].metadata.statementType).toBe('cash_flow');
  });

  it('splits narrative at sentence boundaries and keeps an oversized sentence whole', () => {
    const doc: ExtractedDocument = {
      documentId: 'memo',
      pages: [page('memo', 1, [[0, 'Revenue grew strongly across all regions. Costs were flat.']])],
    };
    const chunks = chunk(doc, { lower: 1, upper: 5 });

    expect(chunks.map(c => c.text)).toEqual(['Revenue grew strongly across all regions.', 'Costs were flat.']);
    expect(chunks.every(c => c.metadata.statementType === 'unclassified')).toBe(true);
  });

  it('rejects bounds where upper is below lower', () => {
    expect(() => chunkDocument(annualReport(), [], { lower: 10, upper: 5 })).toThrow(RangeError);
  });
});

interface SectionPlan {
  title: string;
  sentences: number;
  longSentence?: boolean;
  table?: { headerRows: string[][]; groups: number; rowsPerGroup: number; continues?: boolean };
}

interface GeneratedReport {
  document: ExtractedDocument;
  /** Header rows by logical table index */
  headers: Map<number, string[][]>;
}

const YEARS_HEADER = [['USD millions', '2023', '2022']];
const TWO_ROW_HEADER = [['', 'Group', 'Group'], ['USD millions', '2023', '2022']];

function groupRows(section: number, first: number, count: number, rowsPerGroup: number): string[][] {
  const rows: string[][] = [];
  for (let g = first; g < first + count; g++) {
    rows.push([`Segment ${section}-${g}`, '', '']);
    for (let r = 0; r < rowsPerGroup; r++) {
      rows.push([`Segment ${section}-${g} line item ${r}`, `${100 + r},${200 + g}`, `${90 + r},${100 + g}`]);
    }
    rows.push([`Total segment ${section}-${g}`, `${500 + g},000`, `${400 + g},000`]);
  }
  return rows;
}

function generateReport(documentId: string, sections: SectionPlan[]): GeneratedReport {
  const pages: ExtractedPage[] = [];
  const headers = new Map<number, string[][]>();
  sections.forEach((plan, s) => {
    const sentences = Array.from({ length: plan.sentences }, (_, n) =>
      `${plan.title} commentary point ${n} notes that margins moved by ${n + 2} percent during the year.`,
    );
    if (plan.longSentence) {
      sentences.push(
        'The board considered funding, pricing, hedging, capital allocation, dividend policy, ' +
          'customer concentration, supplier resilience, regulatory change, currency exposure, ' +
          'interest rate movements, pension obligations and the refinancing calendar before approving the plan.',
      );
    }
    const text = [plan.title, sentences.join(' ')].join('\n');
    if (plan.table) {
      const { headerRows, groups, rowsPerGroup, continues } = plan.table;
      headers.set(headers.size, headerRows);
      const here = continues ? Math.ceil(groups / 2) : groups;
      pages.push(page(documentId, pages.length + 1, [[0, text]], [
        table(text.length + 10, [...headerRows, ...groupRows(s, 0, here, rowsPerGroup)], {
          headerRowCount: headerRows.length,
        }),
      ]));
      if (continues) {
        pages.push(page(documentId, pages.length + 1, [], [
          table(0, [...headerRows, ...groupRows(s, here, groups - here, rowsPerGroup)], {
            headerRowCount: headerRows.length,
            continuesPrevious: true,
          }),
        ]));
      }
      return;
    }
    pages.push(page(documentId, pages.length + 1, [[0, text]]));
  });
  return { document: { documentId, fiscalPeriods: ['FY2023'], pages }, headers };
}

/** One sentence of narrative, or one row group of a table */
function isSingleUnit(c: Chunk): boolean {
  if (c.kind === 'narrative') return !c.text.includes('\n') && splitSentences(c.text).length === 1;
  if (c.kind !== 'tabular') return false;
  const [block] = c.content;
  return block.type === 'table' && rowGroups(block.rows.map(cells => ({ cells }))).length === 1;
}

describe('chunk invariants over generated reports', () => {
  const cases: Array<{ name: string; bounds: ChunkBounds; sections: SectionPlan[] }> = [
    {
      name: 'three statements with tables',
      bounds: { lower: 40, upper: 120 },
      sections: [
        { title: 'Consolidated Income Statement', sentences: 3, table: { headerRows: YEARS_HEADER, groups: 3, rowsPerGroup: 2 } },
        { title: 'Consolidated Balance Sheet', sentences: 1, table: { headerRows: TWO_ROW_HEADER, groups: 4, rowsPerGroup: 3 } },
        { title: 'Statement of Cash Flows', sentences: 6 },
      ],
    },
    {
      name: 'narrative sections with an oversize sentence',
      bounds: { lower: 30, upper: 60 },
      sections: [
        { title: 'Financial Review', sentences: 8, longSentence: true },
        { title: 'Risk Factors', sentences: 2 },
        { title: 'Consolidated Income Statement', sentences: 1, table: { headerRows: YEARS_HEADER, groups: 2, rowsPerGroup: 1 } },
      ],
    },
    {
      name: 'tables continuing over page breaks',
      bounds: { lower: 20, upper: 80 },
      sections: [
        { title: 'Consolidated Balance Sheet', sentences: 2, table: { headerRows: TWO_ROW_HEADER, groups: 5, rowsPerGroup: 2, continues: true } },
        { title: 'Statement of Cash Flows', sentences: 1, table: { headerRows: YEARS_HEADER, groups: 4, rowsPerGroup: 1, continues: true } },
      ],
    },
    {
      name: 'bounds tighter than one row group',
      bounds: { lower: 10, upper: 30 },
      sections: [
        { title: 'Consolidated Income Statement', sentences: 2, table: { headerRows: YEARS_HEADER, groups: 3, rowsPerGroup: 4 } },
        { title: 'Risk Factors', sentences: 4, longSentence: true },
      ],
    },
  ];

  it.each(cases)('$name', ({ bounds, sections }) => {
    const { document, headers } = generateReport('gen', sections);
    const { boundaries } = detectBoundaries(document);
    const changeIds = new Set(boundaries.filter(b => b.kind === 'statement-change').map(b => b.id));
    const chunks = chunkDocument(document, boundaries, bounds);

    expect(changeIds.size).toBe(sections.length);
    expect(chunks.some(c => c.kind === 'tabular')).toBe(true);

    const startsStatement = (c: Chunk) => c.metadata.sourceBoundaryIds.some(id => changeIds.has(id));
    const joinedTokens = (a: Chunk, b: Chunk) => estimateTokens(`${a.text}\n\n${b.text}`);

    chunks.forEach((c, i) => {
      expect(c.tokens).toBe(estimateTokens(c.text));
      if (c.tokens > bounds.upper) {
        expect(isSingleUnit(c)).toBe(true);
      }
      if (c.tokens < bounds.lower) {
        const previous = i > 0 && !startsStatement(c) ? chunks[i - 1] : undefined;
        const next = i < chunks.length - 1 && !startsStatement(chunks[i + 1]) ? chunks[i + 1] : undefined;
        expect(previous === undefined || joinedTokens(previous, c) > bounds.upper).toBe(true);
        expect(next === undefined || joinedTokens(c, next) > bounds.upper).toBe(true);
      }

      for (const block of c.content) {
        if (block.type === 'table') expect(block.headerRows).toEqual(headers.get(block.tableIndex));
      }
      if (c.kind === 'tabular') {
        const [block] = c.content;
        expect(block.type).toBe('table');
        if (block.type !== 'table') return;
        expect(c.text.startsWith(block.headerRows.map(renderRow).join('\n'))).toBe(true);
        expect(c.metadata.tableIndex).toBe(block.tableIndex);
      }
    });
  });
});

describe('row helpers', () => {
  it('drops empty trailing cells when rendering a row', () => {
    expect(renderRow(['Current assets', '', ''])).toBe('Current assets');
    expect(renderRow(['Cash', '100'])).toBe('Cash | 100');
  });

  it('groups rows between section rows and totals', () => {
    const rows = [['A', ''], ['a1', '1'], ['Total A', '1'], ['b1', '2']].map(cells => ({ cells }));
    expect(rowGroups(rows).map(g => g.map(r => r.cells[0]))).toEqual([['A', 'a1', 'Total A'], ['b1']]);
  });
});
