// Temporal comparison agent - one metric aligned across fiscal years
// One retrieval per fiscal year, issued sequentially, then deltas and growth rates

import type { ChunkFilter } from '../types/chunk.js';
import type { RetrievalCandidate, SubQuery } from '../types/query.js';
import { findMetric } from '../config/lexicon.js';
import { formatAmount, formatScaled } from '../utils/financial-parser.js';
import {
  BaseSpecialistAgent, retrievalGap, type AgentDependencies, type ConsistencyCheck, type Findings,
} from './specialist-agent.js';
import { describeValue, locateMetric, type LocatedValue } from './evidence.js';

/** Longest series compared in one answer */
export const MAX_COMPARED_YEARS = 5;

export interface PeriodChange {
  from: number;
  to: number;
  delta: number;
  /** Percentage change; undefined when the earlier value is zero */
  percent?: number;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function signed(text: string, value: number): string {
  return value > 0 ? `+${text}` : text;
}

export function periodChange(from: number, fromValue: number, to: number, toValue: number): PeriodChange {
  const delta = toValue - fromValue;
  return {
    from,
    to,
    delta,
    percent: fromValue === 0 ? undefined : round((delta / Math.abs(fromValue)) * 100, 2),
  };
}

/** Compound annual growth rate in percent; undefined unless both ends are positive */
export function compoundGrowth(first: number, last: number, years: number): number | undefined {
  if (first <= 0 || last <= 0 || years <= 0) return undefined;
  return round((Math.pow(last / first, 1 / years) - 1) * 100, 2);
}

function describeChange(change: PeriodChange): string {
  const pct = change.percent !== undefined ? ` (${signed(`${formatAmount(change.percent)}%`, change.percent)})` : '';
  return `${signed(formatScaled(change.delta), change.delta)}${pct}`;
}

export class TemporalComparisonAgent extends BaseSpecialistAgent {
  constructor(deps: AgentDependencies) {
    super('temporal-comparison', 'TemporalAgent', deps);
  }

  /** Years to compare: the routed years, or the routed year and the one before it */
  comparedYears(subQuery: SubQuery): number[] {
    const years = [...new Set(subQuery.fiscalYears)].sort((a, b) => a - b);
    if (years.length === 1) return [years[0] - 1, years[0]];
    return years.slice(-MAX_COMPARED_YEARS);
  }

  /**
   * Filter for one year's hop. Any widening the validator applied to the
   * routed range is kept as slack around the year.
   */
  yearFilter(subQuery: SubQuery, year: number, years: readonly number[]): ChunkFilter {
    const { fiscalYearRange, ...rest } = subQuery.filters;
    if (!fiscalYearRange) return rest;
    const slack = Math.max(
      0,
      fiscalYearRange.from !== undefined ? years[0] - fiscalYearRange.from : 0,
      fiscalYearRange.to !== undefined ? fiscalYearRange.to - years[years.length - 1] : 0,
    );
    return { ...rest, fiscalYearRange: { from: year - slack, to: year + slack } };
  }

  protected async investigate(subQuery: SubQuery, signal?: AbortSignal): Promise<Findings> {
    const metric = findMetric(subQuery.question, this.lexicon);
    if (!metric) {
      return {
        text: 'Could not identify which reported figure to compare across periods.',
        supporting: [],
        checks: [{ name: 'metric-identified', passed: false, required: true }],
        gap: 'agent-parse-failure',
        details: {},
      };
    }

    const years = this.comparedYears(subQuery);
    if (years.length < 2) {
      return {
        text: `Could not determine which fiscal years to compare for ${metric.label}.`,
        supporting: [],
        checks: [{ name: 'fiscal-years-resolved', passed: false, required: true }],
        gap: 'agent-parse-failure',
        details: { metric: metric.key },
      };
    }

    const found: Array<{ year: number; located: LocatedValue }> = [];
    const missing: number[] = [];
    let gap: Findings['gap'];
    for (const year of years) {
      const result = await this.search(`${metric.label} ${year}`, this.yearFilter(subQuery, year, years), signal);
      const located = result.candidates.length > 0 ? locateMetric(result.candidates, metric, year) : undefined;
      if (located) {
        found.push({ year, located });
      } else {
        missing.push(year);
        gap ??= result.candidates.length === 0 ? retrievalGap(result) : 'agent-parse-failure';
      }
    }

    const checks: ConsistencyCheck[] = years.map(year => ({
      name: `value-found-FY${year}`,
      passed: !missing.includes(year),
      required: true,
    }));
    const supporting: RetrievalCandidate[] = found.map(f => f.located.candidate);
    const details: Record<string, unknown> = {
      metric: metric.key,
      years,
      values: found.map(f => ({ year: f.year, value: f.located.value.value, unit: f.located.value.unit })),
    };

    if (missing.length > 0) {
      return {
        text: `Cannot compare ${metric.label}: no reported value found for ${missing.map(y => `FY${y}`).join(', ')}.`,
        supporting,
        checks,
        gap,
        details,
      };
    }

    const units = new Set(found.map(f => f.located.value.unit ?? ''));
    checks.push({ name: 'same-unit-scale', passed: units.size === 1, required: false });

    const changes: PeriodChange[] = [];
    for (let i = 1; i < found.length; i++) {
      const prev = found[i - 1];
      const cur = found[i];
      changes.push(periodChange(prev.year, prev.located.value.value, cur.year, cur.located.value.value));
    }
    checks.push({ name: 'prior-value-nonzero', passed: changes.every(c => c.percent !== undefined), required: false });

    const first = found[0];
    const last = found[found.length - 1];
    const overall = periodChange(first.year, first.located.value.value, last.year, last.located.value.value);
    const cagr = found.length > 2
      ? compoundGrowth(first.located.value.value, last.located.value.value, last.year - first.year)
      : undefined;

    const label = `${metric.label[0].toUpperCase()}${metric.label.slice(1)}`;
    const direction = overall.delta > 0 ? 'increased' : overall.delta < 0 ? 'decreased' : 'was unchanged';
    let text =
      `${label} ${direction} from ${formatScaled(first.located.value.value)} in FY${first.year} ` +
      `to ${formatScaled(last.located.value.value)} in FY${last.year}, a change of ${describeChange(overall)}.`;
    if (changes.length > 1) {
      text += ` Year by year: ${changes.map(c => `FY${c.from}-FY${c.to} ${describeChange(c)}`).join('; ')}.`;
      if (cagr !== undefined) text += ` Compound annual growth: ${formatAmount(cagr)}%.`;
    }

    const caveats: string[] = [];
    if (units.size > 1) caveats.push(`${label} is reported in different unit scales across years`);
    if (overall.percent === undefined) caveats.push(`Percentage change is undefined because FY${first.year} ${metric.label} is zero`);

    return {
      text,
      value: overall.delta,
      supporting,
      checks,
      caveats,
      facts: [...found.map(f => describeValue(f.located)), `change FY${first.year}-FY${last.year}: ${describeChange(overall)}`],
      details: { ...details, changes, overall, cagr },
    };
  }
}
