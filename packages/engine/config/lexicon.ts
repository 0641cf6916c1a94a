// Domain vocabulary for boundary detection, routing, ratio and risk extraction
// Phrases live in lexicon.json and are normalized with normalizeLabel on load

import { z } from 'zod';
import rawLexicon from './lexicon.json' with { type: 'json' };
import { STATEMENT_TYPES, type StatementType } from '../types/document.js';
import type { TaskCategory } from '../types/query.js';
import { normalizeLabel } from '../utils/text.js';

const PhraseList = z.array(z.string().min(1)).min(1);

const MetricSchema = z.object({
  label: z.string(),
  synonyms: PhraseList,
});

const RatioSchema = z.object({
  label: z.string(),
  synonyms: PhraseList,
  numerator: z.string(),
  denominator: z.string(),
  format: z.enum(['percent', 'multiple']),
});

const LexiconSchema = z.object({
  statements: z.record(z.enum(STATEMENT_TYPES), PhraseList),
  metrics: z.record(z.string(), MetricSchema),
  ratios: z.record(z.string(), RatioSchema),
  risks: z.record(z.string(), PhraseList),
  riskTone: z.object({
    mitigation: PhraseList,
    adverse: PhraseList,
    favourable: PhraseList,
  }),
  routing: z.object({
    calculation: PhraseList,
    'temporal-comparison': PhraseList,
    'risk-extraction': PhraseList,
  }),
});

export interface MetricDefinition {
  key: string;
  label: string;
  synonyms: string[];
}

export interface RatioDefinition {
  key: string;
  label: string;
  synonyms: string[];
  numerator: MetricDefinition;
  denominator: MetricDefinition;
  format: 'percent' | 'multiple';
}

export interface StatementPhrase {
  phrase: string;
  statementType: StatementType;
}

export interface Lexicon {
  /** Longest phrase first */
  statements: StatementPhrase[];
  metrics: MetricDefinition[];
  ratios: RatioDefinition[];
  risks: Array<{ category: string; phrases: string[] }>;
  /** Wording that marks a risk sentence as a mitigation, or shifts its severity */
  riskTone: { mitigation: string[]; adverse: string[]; favourable: string[] };
  routing: Record<Exclude<TaskCategory, 'general'>, string[]>;
}

function normalizeAll(phrases: readonly string[]): string[] {
  return [...new Set(phrases.map(normalizeLabel))];
}

export function buildLexicon(input: unknown): Lexicon {
  const parsed = LexiconSchema.parse(input);

  const statements: StatementPhrase[] = [];
  for (const statementType of STATEMENT_TYPES) {
    for (const phrase of normalizeAll(parsed.statements[statementType] ?? [])) {
      statements.push({ phrase, statementType });
    }
  }
  statements.sort((a, b) => b.phrase.length - a.phrase.length);

  const metrics = new Map<string, MetricDefinition>();
  for (const [key, def] of Object.entries(parsed.metrics)) {
    metrics.set(key, { key, label: def.label, synonyms: normalizeAll(def.synonyms) });
  }

  const ratios: RatioDefinition[] = [];
  for (const [key, def] of Object.entries(parsed.ratios)) {
    const numerator = metrics.get(def.numerator);
    const denominator = metrics.get(def.denominator);
    if (!numerator || !denominator) {
      throw new Error(`Ratio "${key}" references an unknown metric`);
    }
    ratios.push({ key, label: def.label, synonyms: normalizeAll(def.synonyms), numerator, denominator, format: def.format });
  }

  return {
    statements,
    metrics: [...metrics.values()],
    ratios,
    risks: Object.entries(parsed.risks).map(([category, phrases]) => ({ category, phrases: normalizeAll(phrases) })),
    riskTone: {
      mitigation: normalizeAll(parsed.riskTone.mitigation),
      adverse: normalizeAll(parsed.riskTone.adverse),
      favourable: normalizeAll(parsed.riskTone.favourable),
    },
    routing: {
      calculation: normalizeAll(parsed.routing.calculation),
      'temporal-comparison': normalizeAll(parsed.routing['temporal-comparison']),
      'risk-extraction': normalizeAll(parsed.routing['risk-extraction']),
    },
  };
}

export const LEXICON: Lexicon = buildLexicon(rawLexicon);

/** True when `phrase` occurs in `normalized` on word boundaries */
export function containsPhrase(normalized: string, phrase: string): boolean {
  return ` ${normalized} `.includes(` ${phrase} `);
}

/** Metric whose longest synonym occurs in the text */
export function findMetric(text: string, lexicon: Lexicon = LEXICON): MetricDefinition | undefined {
  const normalized = normalizeLabel(text);
  let best: { metric: MetricDefinition; length: number } | undefined;
  for (const metric of lexicon.metrics) {
    for (const synonym of metric.synonyms) {
      if (containsPhrase(normalized, synonym) && (!best || synonym.length > best.length)) {
        best = { metric, length: synonym.length };
      }
    }
  }
  return best?.metric;
}
