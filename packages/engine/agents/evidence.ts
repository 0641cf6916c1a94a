// Reading figures out of retrieved chunks

import type { RetrievalCandidate } from '../types/query.js';
import { containsPhrase, type Lexicon, type MetricDefinition, type RatioDefinition } from '../config/lexicon.js';
import { findMetricValue, formatScaled, type MetricValue } from '../utils/financial-parser.js';
import { normalizeLabel } from '../utils/text.js';

export interface LocatedValue {
  value: MetricValue;
  candidate: RetrievalCandidate;
}

/**
 * First candidate, in rank order, that reports `metric` for `year`. A chunk
 * tagged with `year` alone may also answer from a column without a year header.
 */
export function locateMetric(
  candidates: readonly RetrievalCandidate[],
  metric: MetricDefinition,
  year?: number,
): LocatedValue | undefined {
  for (const candidate of candidates) {
    const found = findMetricValue(candidate.chunk, metric, year);
    if (found) return { value: found, candidate };
  }
  if (year === undefined) return undefined;
  for (const candidate of candidates) {
    const years = candidate.chunk.metadata.fiscalYears;
    if (years.length !== 1 || years[0] !== year) continue;
    const found = findMetricValue(candidate.chunk, metric);
    if (found) return { value: { ...found, year }, candidate };
  }
  return undefined;
}

/** Ratio whose longest synonym occurs in the question */
export function findRatio(question: string, lexicon: Lexicon): RatioDefinition | undefined {
  const normalized = normalizeLabel(question);
  let best: { ratio: RatioDefinition; length: number } | undefined;
  for (const ratio of lexicon.ratios) {
    for (const synonym of ratio.synonyms) {
      if (containsPhrase(normalized, synonym) && (!best || synonym.length > best.length)) {
        best = { ratio, length: synonym.length };
      }
    }
  }
  return best?.ratio;
}

/**
 * Metrics named in the question, in order of appearance. Longer synonyms
 * claim their words first, so "net income" is not also read as "income".
 */
export function metricMentions(question: string, lexicon: Lexicon): MetricDefinition[] {
  const padded = ` ${normalizeLabel(question)} `;
  const phrases = lexicon.metrics
    .flatMap(metric => metric.synonyms.map(synonym => ({ metric, synonym })))
    .sort((a, b) => b.synonym.length - a.synonym.length);

  const claimed: Array<[number, number]> = [];
  const hits: Array<{ metric: MetricDefinition; index: number }> = [];
  for (const { metric, synonym } of phrases) {
    const needle = ` ${synonym} `;
    let from = 0;
    let index: number;
    while ((index = padded.indexOf(needle, from)) !== -1) {
      const start = index + 1;
      const end = start + synonym.length;
      from = end;
      if (claimed.some(([s, e]) => start < e && end > s)) continue;
      claimed.push([start, end]);
      hits.push({ metric, index: start });
    }
  }

  hits.sort((a, b) => a.index - b.index);
  const seen = new Set<string>();
  const metrics: MetricDefinition[] = [];
  for (const { metric } of hits) {
    if (seen.has(metric.key)) continue;
    seen.add(metric.key);
    metrics.push(metric);
  }
  return metrics;
}

export function describeValue(located: LocatedValue): string {
  const { value, candidate } = located;
  const { pageStart } = candidate.chunk.metadata;
  const year = value.year !== undefined ? ` (FY${value.year})` : '';
  return `${value.rowLabel}${year}: ${formatScaled(value.value)} [${candidate.chunk.documentId} p.${pageStart}]`;
}
