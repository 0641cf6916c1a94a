// Query Router - decomposes a question into category-tagged SubQueries
// Keyword rules run first; the language model is consulted only when no rule matches

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ChunkFilter, FiscalYearRange } from '../types/chunk.js';
import type { StatementType } from '../types/document.js';
import type { LanguageModel } from '../types/collaborators.js';
import { TASK_CATEGORIES, type SubQuery, type TaskCategory } from '../types/query.js';
import { CollaboratorUnavailableError, errorMessage, type Collaborator } from '../types/errors.js';
import { containsPhrase, LEXICON, type Lexicon } from '../config/lexicon.js';
import { extractFiscalPeriods, fiscalYearsOf } from '../utils/fiscal-period.js';
import { extractJsonObject } from '../utils/language-model.js';
import { AbortedError, DEFAULT_BACKOFF, withRetry, type BackoffPolicy } from '../utils/retry.js';
import { normalizeLabel } from '../utils/text.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('QueryRouter');

/** Order in which SubQueries are emitted for multi-category questions */
export const CATEGORY_ORDER: readonly TaskCategory[] = [
  'calculation',
  'temporal-comparison',
  'risk-extraction',
];

export const CATEGORY_INSTRUCTIONS: Record<TaskCategory, string> = {
  calculation:
    'Compute the requested ratio or figure from the statement tables; report numerator, denominator and result with their fiscal year.',
  'temporal-comparison':
    'Retrieve the metric separately for each fiscal year and report the absolute and percentage change between them.',
  'risk-extraction':
    'Extract the qualitative risk disclosures relevant to the question, grouped by risk category.',
  general:
    'Answer from the most relevant passages of the indexed statements and cite them.',
};

/** Sections that carry risk disclosures; dropped first when the filters are relaxed */
export const RISK_STATEMENT_TYPES: readonly StatementType[] = ['risk_management', 'notes', 'management_commentary'];

const ClassificationSchema = z.object({
  categories: z.array(z.enum(TASK_CATEGORIES)).min(1),
});

export type RoutingSource = 'rules' | 'language-model' | 'default';

export interface RoutingDecision {
  categories: TaskCategory[];
  source: RoutingSource;
  /** Keywords that matched, per category */
  matched: Partial<Record<TaskCategory, string[]>>;
  fiscalYears: number[];
}

export interface RoutedQuestion {
  questionId: string;
  decision: RoutingDecision;
  subQueries: SubQuery[];
  /** Set when classification needed a collaborator that failed */
  collaboratorUnavailable?: Collaborator;
}

interface ModelClassification {
  categories?: TaskCategory[];
  unavailable?: Collaborator;
}

export interface FiscalYearCatalog {
  fiscalYears(documentIds?: readonly string[], signal?: AbortSignal): Promise<number[]>;
}

export interface QueryRouterOptions {
  /** Source of the latest years when neither the question nor the caller names any */
  catalog?: FiscalYearCatalog;
  languageModel?: LanguageModel | null;
  lexicon?: Lexicon;
  backoff?: BackoffPolicy;
}

function rangeYears(range: FiscalYearRange | undefined): number[] {
  if (!range) return [];
  const { from, to } = range;
  if (from !== undefined && to !== undefined) {
    if (to < from) return [];
    return to === from ? [to] : [Math.max(from, to - 1), to];
  }
  if (to !== undefined) return [to - 1, to];
  if (from !== undefined) return [from, from + 1];
  return [];
}

export class QueryRouter {
  private readonly catalog?: FiscalYearCatalog;
  private readonly languageModel: LanguageModel | null;
  private readonly lexicon: Lexicon;
  private readonly backoff: BackoffPolicy;

  constructor(options: QueryRouterOptions = {}) {
    this.catalog = options.catalog;
    this.languageModel = options.languageModel ?? null;
    this.lexicon = options.lexicon ?? LEXICON;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
  }

  /** Deterministic keyword pass; categories in emission order */
  classify(question: string): Pick<RoutingDecision, 'categories' | 'matched'> {
    const normalized = normalizeLabel(question);
    const matched: Partial<Record<TaskCategory, string[]>> = {};
    const categories: TaskCategory[] = [];
    for (const category of CATEGORY_ORDER) {
      if (category === 'general') continue;
      const hits = this.lexicon.routing[category].filter(k => containsPhrase(normalized, k));
      if (hits.length > 0) {
        matched[category] = hits;
        categories.push(category);
      }
    }
    return { categories, matched };
  }

  async route(question: string, filters: ChunkFilter = {}, signal?: AbortSignal): Promise<SubQuery[]> {
    const routed = await this.routeQuestion(question, filters, { signal });
    return routed.subQueries;
  }

  /**
   * Route a question and report how the categories were chosen.
   * Every question yields at least one SubQuery.
   */
  async routeQuestion(
    question: string,
    filters: ChunkFilter = {},
    options: { questionId?: string; signal?: AbortSignal } = {},
  ): Promise<RoutedQuestion> {
    const questionId = options.questionId ?? randomUUID();
    const rules = this.classify(question);

    let categories = rules.categories;
    let source: RoutingSource = 'rules';
    let unavailable: Collaborator | undefined;
    if (categories.length === 0) {
      const fromModel = await this.classifyWithModel(question, options.signal);
      categories = fromModel.categories ?? ['general'];
      source = fromModel.categories ? 'language-model' : 'default';
      unavailable = fromModel.unavailable;
    }

    const fiscalYears = await this.resolveFiscalYears(question, filters, categories, options.signal);

    const subQueries = categories.map((category): SubQuery => ({
      id: `${questionId}:${category}`,
      questionId,
      category,
      question,
      instruction: CATEGORY_INSTRUCTIONS[category],
      filters: this.categoryFilters(category, filters, fiscalYears),
      fiscalYears,
      relaxation: 0,
    }));

    log.info('Question routed', { questionId, categories, source, fiscalYears, unavailable });
    return {
      questionId,
      decision: { categories, source, matched: rules.matched, fiscalYears },
      subQueries,
      ...(unavailable ? { collaboratorUnavailable: unavailable } : {}),
    };
  }

  private categoryFilters(category: TaskCategory, filters: ChunkFilter, years: readonly number[]): ChunkFilter {
    const out: { -readonly [K in keyof ChunkFilter]: ChunkFilter[K] } = { ...filters };
    if (!out.fiscalYearRange && years.length > 0 && category !== 'general' && category !== 'risk-extraction') {
      out.fiscalYearRange = { from: years[0], to: years[years.length - 1] };
    }
    if (category === 'risk-extraction' && !out.statementTypes?.length) {
      out.statementTypes = RISK_STATEMENT_TYPES;
    }
    return out;
  }

  /** Question text first, then the caller's range, then the latest two indexed years */
  private async resolveFiscalYears(
    question: string,
    filters: ChunkFilter,
    categories: readonly TaskCategory[],
    signal?: AbortSignal,
  ): Promise<number[]> {
    const named = fiscalYearsOf(extractFiscalPeriods(question));
    if (named.length > 0) return named;

    const fromRange = rangeYears(filters.fiscalYearRange);
    if (fromRange.length > 0) return fromRange;

    const needsYears = categories.includes('calculation') || categories.includes('temporal-comparison');
    if (!needsYears || !this.catalog) return [];
    const indexed = await this.catalog.fiscalYears(filters.documentIds, signal);
    const latest = categories.includes('temporal-comparison') ? indexed.slice(-2) : indexed.slice(-1);
    return latest;
  }

  private async classifyWithModel(question: string, signal?: AbortSignal): Promise<ModelClassification> {
    const model = this.languageModel;
    if (!model) return {};
    try {
      const reply = await withRetry(
        'language-model',
        () => model.complete({
          system: 'You classify questions about financial statements. Reply with JSON only.',
          prompt:
            `Classify this question into one or more of: ${TASK_CATEGORIES.join(', ')}.\n` +
            `calculation = ratios or derived figures; temporal-comparison = change across fiscal periods; ` +
            `risk-extraction = risk disclosures; general = anything else.\n\n` +
            `Question: "${question}"\n\nReturn: {"categories":["<category>", ...]}`,
          maxTokens: 100,
          signal,
        }),
        this.backoff,
        signal,
      );
      const parsed = ClassificationSchema.safeParse(extractJsonObject(reply));
      if (!parsed.success) {
        log.warn('Unusable classification reply, routing to general', { reply: reply.slice(0, 200) });
        return {};
      }
      const chosen = new Set(parsed.data.categories);
      const ordered = [...CATEGORY_ORDER, 'general' as const].filter(c => chosen.has(c));
      return {
        categories: ordered.includes('general') && ordered.length > 1 ? ordered.filter(c => c !== 'general') : ordered,
      };
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      log.warn('Language model classification failed, routing to general', { error: errorMessage(err) });
      return { unavailable: err instanceof CollaboratorUnavailableError ? err.collaborator : 'language-model' };
    }
  }
}
