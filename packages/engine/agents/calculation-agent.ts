// Calculation agent - ratios and derived figures from statement tables
// Multi-hop: the numerator is retrieved first, then the denominator

import type { MetricDefinition, RatioDefinition } from '../config/lexicon.js';
import type { SubQuery } from '../types/query.js';
import { formatAmount, formatScaled } from '../utils/financial-parser.js';
import { normalizeLabel } from '../utils/text.js';
import {
  BaseSpecialistAgent, retrievalGap, type AgentDependencies, type ConsistencyCheck, type Findings,
} from './specialist-agent.js';
import { describeValue, findRatio, locateMetric, metricMentions, type LocatedValue } from './evidence.js';

type Computation =
  | { kind: 'ratio'; ratio: RatioDefinition }
  | { kind: 'figure'; metric: MetricDefinition };

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class CalculationAgent extends BaseSpecialistAgent {
  constructor(deps: AgentDependencies) {
    super('calculation', 'CalculationAgent', deps);
  }

  /** Lexicon ratio, else "X to Y" / "X as a percentage of Y" from two named metrics, else a single figure */
  resolveComputation(question: string): Computation | undefined {
    const ratio = findRatio(question, this.lexicon);
    if (ratio) return { kind: 'ratio', ratio };

    const metrics = metricMentions(question, this.lexicon);
    if (metrics.length >= 2) {
      const normalized = normalizeLabel(question);
      const percent = /\bpercent|%|\bshare of\b|\bproportion\b/.test(normalized);
      const [numerator, denominator] = metrics;
      return {
        kind: 'ratio',
        ratio: {
          key: `${numerator.key}_to_${denominator.key}`,
          label: `${numerator.label} to ${denominator.label}`,
          synonyms: [],
          numerator,
          denominator,
          format: percent ? 'percent' : 'multiple',
        },
      };
    }
    if (metrics.length === 1) return { kind: 'figure', metric: metrics[0] };
    return undefined;
  }

  protected async investigate(subQuery: SubQuery, signal?: AbortSignal): Promise<Findings> {
    const computation = this.resolveComputation(subQuery.question);
    if (!computation) {
      return {
        text: 'Could not identify the ratio or figure to compute from the question.',
        supporting: [],
        checks: [{ name: 'computation-identified', passed: false, required: true }],
        gap: 'agent-parse-failure',
        details: {},
      };
    }

    const years = subQuery.fiscalYears;
    const year = years.length > 0 ? years[years.length - 1] : undefined;

    if (computation.kind === 'figure') {
      return this.figure(subQuery, computation.metric, year, signal);
    }
    return this.ratio(subQuery, computation.ratio, year, signal);
  }

  private async hop(
    subQuery: SubQuery,
    metric: MetricDefinition,
    year: number | undefined,
    signal?: AbortSignal,
  ): Promise<{ located?: LocatedValue; gap?: Findings['gap'] }> {
    const query = year !== undefined ? `${metric.label} ${year}` : metric.label;
    const result = await this.search(query, subQuery.filters, signal);
    if (result.candidates.length === 0) return { gap: retrievalGap(result) };
    const located = locateMetric(result.candidates, metric, year);
    return located ? { located } : { gap: 'agent-parse-failure' };
  }

  private async figure(
    subQuery: SubQuery,
    metric: MetricDefinition,
    year: number | undefined,
    signal?: AbortSignal,
  ): Promise<Findings> {
    const { located, gap } = await this.hop(subQuery, metric, year, signal);
    const yearText = year !== undefined ? ` for FY${year}` : '';
    if (!located) {
      return {
        text: `No reported ${metric.label}${yearText} was found in the indexed statements.`,
        supporting: [],
        checks: [{ name: 'value-found', passed: false, required: true }],
        gap,
        details: { metric: metric.key, year },
      };
    }
    const checks: ConsistencyCheck[] = [
      { name: 'value-found', passed: true, required: true },
      { name: 'fiscal-year-matched', passed: year === undefined || located.value.year === year, required: false },
    ];
    return {
      text: `${metric.label[0].toUpperCase()}${metric.label.slice(1)}${yearText}: ${formatScaled(located.value.value)}.`,
      value: located.value.value,
      supporting: [located.candidate],
      checks,
      facts: [describeValue(located)],
      details: { metric: metric.key, year, reported: located.value },
    };
  }

  private async ratio(
    subQuery: SubQuery,
    ratio: RatioDefinition,
    year: number | undefined,
    signal?: AbortSignal,
  ): Promise<Findings> {
    const yearText = year !== undefined ? ` for FY${year}` : '';
    const details: Record<string, unknown> = {
      ratio: ratio.key,
      numerator: ratio.numerator.key,
      denominator: ratio.denominator.key,
      year,
    };

    const numerator = await this.hop(subQuery, ratio.numerator, year, signal);
    if (!numerator.located) {
      return {
        text: `Cannot compute the ${ratio.label}${yearText}: ${ratio.numerator.label} was not found.`,
        supporting: [],
        checks: [{ name: 'numerator-found', passed: false, required: true }],
        gap: numerator.gap,
        details,
      };
    }

    const denominator = await this.hop(subQuery, ratio.denominator, year, signal);
    if (!denominator.located) {
      return {
        text: `Cannot compute the ${ratio.label}${yearText}: ${ratio.denominator.label} was not found.`,
        supporting: [numerator.located.candidate],
        checks: [
          { name: 'numerator-found', passed: true, required: true },
          { name: 'denominator-found', passed: false, required: true },
        ],
        gap: denominator.gap,
        details: { ...details, numeratorValue: numerator.located.value },
      };
    }

    const n = numerator.located.value;
    const d = denominator.located.value;
    const checks: ConsistencyCheck[] = [
      { name: 'numerator-found', passed: true, required: true },
      { name: 'denominator-found', passed: true, required: true },
      { name: 'denominator-nonzero', passed: d.value !== 0, required: true },
      { name: 'same-fiscal-year', passed: n.year === d.year, required: false },
      { name: 'same-unit-scale', passed: n.unit === d.unit, required: false },
    ];
    const supporting = [numerator.located.candidate, denominator.located.candidate];

    if (d.value === 0) {
      return {
        text: `Cannot compute the ${ratio.label}${yearText}: ${ratio.denominator.label} is zero.`,
        supporting,
        checks,
        gap: 'agent-parse-failure',
        details: { ...details, numeratorValue: n, denominatorValue: d },
      };
    }

    const raw = n.value / d.value;
    const value = ratio.format === 'percent' ? round(raw * 100, 2) : round(raw, 2);
    const shown = ratio.format === 'percent' ? `${formatAmount(value)}%` : `${formatAmount(value)}x`;
    const caveats = checks
      .filter(c => !c.passed)
      .map(c => c.name === 'same-fiscal-year'
        ? `Numerator and denominator come from different fiscal years (${n.year ?? 'unknown'} vs ${d.year ?? 'unknown'})`
        : 'Numerator and denominator are reported in different unit scales');

    const label = `${ratio.label[0].toUpperCase()}${ratio.label.slice(1)}`;
    return {
      text:
        `${label}${yearText}: ${shown} ` +
        `(${ratio.numerator.label} ${formatScaled(n.value)} / ${ratio.denominator.label} ${formatScaled(d.value)}).`,
      value,
      supporting,
      checks,
      caveats,
      facts: [
        describeValue(numerator.located),
        describeValue(denominator.located),
        `${ratio.label}${yearText} = ${shown}`,
      ],
      details: { ...details, numeratorValue: n, denominatorValue: d, format: ratio.format },
    };
  }
}
