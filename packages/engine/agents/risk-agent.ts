// Risk extraction agent - qualitative risk statements grouped by risk category,
// each tagged with a severity and split into exposures and mitigations

import type { RetrievalCandidate, SubQuery } from '../types/query.js';
import { containsPhrase } from '../config/lexicon.js';
import { normalizeLabel, splitSentences } from '../utils/text.js';
import {
  BaseSpecialistAgent, pageRef, retrievalGap, type AgentDependencies, type Findings,
} from './specialist-agent.js';

export const GENERAL_RISK = 'general_risk';
export const MAX_RISK_STATEMENTS = 8;

export type RiskSeverity = 'elevated' | 'moderate' | 'low';

const SEVERITY_RANK: Record<RiskSeverity, number> = { low: 0, moderate: 1, elevated: 2 };

export interface RiskStatement {
  category: string;
  sentence: string;
  chunkId: string;
  severity: RiskSeverity;
  /** The sentence describes an action taken against the risk */
  mitigation: boolean;
}

function categoryLabel(category: string): string {
  const words = category.replace(/_/g, ' ');
  return `${words[0].toUpperCase()}${words.slice(1)}`;
}

/** Severity of a category: its most severe exposure, or its most severe statement when all are mitigations */
export function highestSeverity(statements: readonly RiskStatement[]): RiskSeverity {
  const exposures = statements.filter(s => !s.mitigation);
  const ranked = exposures.length > 0 ? exposures : statements;
  return ranked.reduce<RiskSeverity>(
    (worst, s) => (SEVERITY_RANK[s.severity] > SEVERITY_RANK[worst] ? s.severity : worst),
    'low',
  );
}

export class RiskExtractionAgent extends BaseSpecialistAgent {
  constructor(deps: AgentDependencies) {
    super('risk-extraction', 'RiskAgent', deps);
  }

  /** Risk category of a sentence; general risk when it only says "risk" */
  classifySentence(sentence: string): string | undefined {
    const normalized = normalizeLabel(sentence);
    for (const { category, phrases } of this.lexicon.risks) {
      if (phrases.some(p => containsPhrase(normalized, p))) return category;
    }
    if (/\b(?:risks?|uncertaint(?:y|ies)|exposures?)\b/.test(normalized)) return GENERAL_RISK;
    return undefined;
  }

  /**
   * Adverse wording against favourable wording; mitigation wording counts as
   * favourable. A tie is moderate.
   */
  assessSentence(sentence: string): Pick<RiskStatement, 'severity' | 'mitigation'> {
    const normalized = normalizeLabel(sentence);
    const count = (phrases: readonly string[]) => phrases.filter(p => containsPhrase(normalized, p)).length;
    const { mitigation, adverse, favourable } = this.lexicon.riskTone;
    const mitigating = count(mitigation);
    const against = count(adverse);
    const towards = count(favourable) + mitigating;
    const severity: RiskSeverity = against > towards ? 'elevated' : towards > against ? 'low' : 'moderate';
    return { severity, mitigation: mitigating > 0 };
  }

  /** Categories the question asks about; empty means all */
  focusCategories(question: string): Set<string> {
    const normalized = normalizeLabel(question);
    const focus = new Set<string>();
    for (const { category, phrases } of this.lexicon.risks) {
      if (phrases.some(p => containsPhrase(normalized, p))) focus.add(category);
    }
    return focus;
  }

  extractStatements(candidates: readonly RetrievalCandidate[]): RiskStatement[] {
    const statements: RiskStatement[] = [];
    const seen = new Set<string>();
    for (const { chunk } of candidates) {
      for (const block of chunk.content) {
        if (block.type !== 'text') continue;
        for (const sentence of splitSentences(block.text)) {
          const category = this.classifySentence(sentence);
          const key = normalizeLabel(sentence);
          if (!category || seen.has(key)) continue;
          seen.add(key);
          statements.push({ category, sentence, chunkId: chunk.id, ...this.assessSentence(sentence) });
        }
      }
    }
    return statements;
  }

  protected async investigate(subQuery: SubQuery, signal?: AbortSignal): Promise<Findings> {
    const result = await this.search(subQuery.question, subQuery.filters, signal);
    if (result.candidates.length === 0) {
      return {
        text: 'No risk disclosures were found in the indexed statements.',
        supporting: [],
        checks: [{ name: 'candidates-found', passed: false, required: true }],
        gap: retrievalGap(result),
        details: {},
      };
    }

    const all = this.extractStatements(result.candidates);
    const focus = this.focusCategories(subQuery.question);
    const focused = focus.size > 0 ? all.filter(s => focus.has(s.category)) : all;
    const statements = (focused.length > 0 ? focused : all).slice(0, MAX_RISK_STATEMENTS);

    const checks = [
      { name: 'candidates-found', passed: true, required: true },
      { name: 'risk-statements-found', passed: statements.length > 0, required: true },
      { name: 'focus-category-covered', passed: focus.size === 0 || focused.length > 0, required: false },
    ];

    if (statements.length === 0) {
      return {
        text: 'The retrieved passages contain no identifiable risk statements.',
        supporting: [],
        checks,
        gap: 'agent-parse-failure',
        details: { candidates: result.candidates.length },
      };
    }

    const used = new Set(statements.map(s => s.chunkId));
    const supporting = result.candidates.filter(c => used.has(c.chunkId));
    const byChunk = new Map(supporting.map(c => [c.chunkId, c]));

    const grouped = new Map<string, RiskStatement[]>();
    for (const statement of statements) {
      const list = grouped.get(statement.category) ?? [];
      list.push(statement);
      grouped.set(statement.category, list);
    }

    const severities = new Map<string, RiskSeverity>();
    const lines: string[] = [];
    for (const [category, list] of grouped) {
      const severity = highestSeverity(list);
      severities.set(category, severity);
      lines.push(`${categoryLabel(category)} (${severity}):`);
      // exposures first, then what is done about them
      for (const s of [...list.filter(x => !x.mitigation), ...list.filter(x => x.mitigation)]) {
        const candidate = byChunk.get(s.chunkId);
        const prefix = s.mitigation ? 'Mitigation: ' : '';
        lines.push(`- ${prefix}${s.sentence}${candidate ? ` (${pageRef(candidate)})` : ''}`);
      }
    }

    const caveats: string[] = [];
    if (focus.size > 0 && focused.length === 0) {
      caveats.push(`No statements matched the requested risk categories (${[...focus].map(categoryLabel).join(', ')}); showing other disclosed risks`);
    }

    return {
      text: lines.join('\n'),
      supporting,
      checks,
      caveats,
      facts: statements.map(s =>
        `${categoryLabel(s.category)} (${s.severity}${s.mitigation ? ', mitigation' : ''}): ${s.sentence}`,
      ),
      details: {
        categories: Object.fromEntries([...grouped].map(([c, list]) => [c, list.length])),
        severities: Object.fromEntries(severities),
        mitigations: statements.filter(s => s.mitigation).length,
        statements,
      },
    };
  }
}
