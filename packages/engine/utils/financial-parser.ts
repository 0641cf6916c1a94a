// Read reported amounts out of statement tables and narrative text
// Handles "1,234", "(1,234)", "-1,234.5", "12.5%", "$ 300", "—" and unit captions like "in millions"

import type { Chunk, ChunkContent, TableBlock } from '../types/chunk.js';
import type { MetricDefinition } from '../config/lexicon.js';
import { extractFiscalPeriods, fiscalYearsOf, yearFromHeader } from './fiscal-period.js';
import { normalizeLabel, splitSentences } from './text.js';

const MULTIPLIERS: Record<string, number> = {
  trillion: 1e12, trillions: 1e12, tn: 1e12,
  billion: 1e9, billions: 1e9, bn: 1e9, b: 1e9,
  million: 1e6, millions: 1e6, mn: 1e6, mm: 1e6, m: 1e6,
  thousand: 1e3, thousands: 1e3, k: 1e3, "'000": 1e3, '000s': 1e3,
};

const NIL_CELL = /^[\s\-–—]*$|^n\/?a$|^nil$/i;
const AMOUNT_CELL = /^(\()?\s*(-)?\s*(?:[A-Z]{3}\s*|[$€£]\s*)?(-)?(\d[\d,]*(?:\.\d+)?|\.\d+)\s*(%)?\s*(\))?$/;
const BARE_YEAR = /^(?:19|20)\d{2}$/;

export interface UnitScale {
  label: string;
  multiplier: number;
}

export interface MetricValue {
  metric: string;
  /** Amount as printed, before the unit scale is applied */
  reported: number;
  /** Amount in base currency units */
  value: number;
  year?: number;
  rowLabel: string;
  unit?: string;
  source: 'table' | 'text';
}

/**
 * Parse one table cell. Parentheses and a leading minus mean negative;
 * dashes, "n/a" and "nil" yield undefined. Percent cells keep their face value.
 */
export function parseCellAmount(cell: string): number | undefined {
  const trimmed = cell.trim();
  if (NIL_CELL.test(trimmed)) return undefined;
  const m = AMOUNT_CELL.exec(trimmed);
  if (!m) return undefined;
  const [, open, minus, innerMinus, digits, , close] = m;
  if (Boolean(open) !== Boolean(close)) return undefined;
  const num = parseFloat(digits.replace(/,/g, ''));
  if (isNaN(num)) return undefined;
  return open || minus || innerMinus ? -num : num;
}

/** A cell holding a reported amount; bare years are column labels, not amounts */
export function isAmountCell(cell: string): boolean {
  return !BARE_YEAR.test(cell.trim()) && parseCellAmount(cell) !== undefined;
}

/** Unit scale from a caption such as "(in millions)", "AED '000" or "USD thousands" */
export function detectUnitScale(text: string): UnitScale | undefined {
  const m = /(?:^|[\s(])(?:in\s+)?(?:[A-Z]{3}\s*|[$€£]\s*)?(trillions?|billions?|millions?|thousands?|'000s?|000s)(?=$|[\s),.])/i.exec(text);
  if (!m) return undefined;
  const raw = m[1].toLowerCase();
  const key = raw === "'000s" ? "'000" : raw;
  const multiplier = MULTIPLIERS[key];
  if (!multiplier) return undefined;
  const label = multiplier === 1e12 ? 'trillions' : multiplier === 1e9 ? 'billions' : multiplier === 1e6 ? 'millions' : 'thousands';
  return { label, multiplier };
}

export function formatAmount(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

/** Human-scale rendering: 1200000000 -> "1.2 billion" */
export function formatScaled(value: number): string {
  const abs = Math.abs(value);
  const units: Array<[number, string]> = [[1e12, 'trillion'], [1e9, 'billion'], [1e6, 'million'], [1e3, 'thousand']];
  for (const [size, name] of units) {
    if (abs >= size) return `${formatAmount(value / size)} ${name}`;
  }
  return formatAmount(value);
}

function rowMatchScore(label: string, metric: MetricDefinition): number {
  let best = 0;
  for (const synonym of metric.synonyms) {
    if (label === synonym) return 2;
    if (label.startsWith(`${synonym} `)) best = 1;
  }
  return best;
}

function columnYears(table: TableBlock, width: number): Array<number | undefined> {
  const years: Array<number | undefined> = new Array(width).fill(undefined);
  for (const header of table.headerRows) {
    header.forEach((cell, col) => {
      if (col > 0 && years[col] === undefined) years[col] = yearFromHeader(cell);
    });
  }
  return years;
}

/** Find the metric's row in a table block and read the column for `year` */
export function findInTable(table: TableBlock, metric: MetricDefinition, year?: number): MetricValue | undefined {
  let row: readonly string[] | undefined;
  let rowScore = 0;
  for (const candidate of table.rows) {
    if (candidate.length < 2) continue;
    const score = rowMatchScore(normalizeLabel(candidate[0]), metric);
    if (score > rowScore) {
      row = candidate;
      rowScore = score;
      if (score === 2) break;
    }
  }
  if (!row) return undefined;

  const width = Math.max(row.length, ...table.headerRows.map(h => h.length));
  const years = columnYears(table, width);
  const scale = detectUnitScale(table.headerRows.map(h => h.join(' ')).join(' '));

  for (let col = 1; col < row.length; col++) {
    if (year !== undefined && years[col] !== year) continue;
    const reported = parseCellAmount(row[col]);
    if (reported === undefined) continue;
    return {
      metric: metric.key,
      reported,
      value: reported * (scale?.multiplier ?? 1),
      year: years[col],
      rowLabel: row[0].trim(),
      unit: scale?.label,
      source: 'table',
    };
  }
  return undefined;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Find "<metric> ... <amount> [unit]" in a sentence that names `year` when one is given */
export function findInText(text: string, metric: MetricDefinition, year?: number): MetricValue | undefined {
  const synonyms = [...metric.synonyms].sort((a, b) => b.length - a.length);
  for (const sentence of splitSentences(text)) {
    if (year !== undefined && !fiscalYearsOf(extractFiscalPeriods(sentence)).includes(year)) continue;
    for (const synonym of synonyms) {
      const words = synonym.split(' ').map(escapeRegExp).join('[^a-z0-9%]+');
      const re = new RegExp(
        `\\b${words}\\b[^.]{0,60}?(?<![\\d,.])(?!(?:19|20)\\d{2}\\b)(\\(?-?\\d[\\d,]*(?:\\.\\d+)?\\)?)(?:\\s*(trillion|billion|million|thousand|bn|mn|m|k)\\b)?`,
        'i',
      );
      const m = re.exec(sentence);
      if (!m) continue;
      const reported = parseCellAmount(m[1]);
      if (reported === undefined) continue;
      const unitKey = m[2]?.toLowerCase();
      const multiplier = unitKey ? MULTIPLIERS[unitKey] ?? 1 : 1;
      return {
        metric: metric.key,
        reported,
        value: reported * multiplier,
        year,
        rowLabel: synonym,
        unit: unitKey,
        source: 'text',
      };
    }
  }
  return undefined;
}

/** Search every content block of a chunk, tables first */
export function findMetricValue(
  source: Chunk | readonly ChunkContent[],
  metric: MetricDefinition,
  year?: number,
): MetricValue | undefined {
  const content = 'content' in source ? source.content : source;
  for (const block of content) {
    if (block.type !== 'table') continue;
    const found = findInTable(block, metric, year);
    if (found) return found;
  }
  for (const block of content) {
    if (block.type !== 'text') continue;
    const found = findInText(block.text, metric, year);
    if (found) return found;
  }
  return undefined;
}
