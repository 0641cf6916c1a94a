// Confidence Validator & Aggregator - per-question state machine
// gathering -> validating -> composed | degraded; terminal states are never left

import type { ChunkFilter } from '../types/chunk.js';
import type {
  EvidenceGap, FinalAnswer, PartialAnswer, StateTransition, SubQuery, TaskCategory, ValidationState,
} from '../types/query.js';
import { createEvent, type EventHandler } from '../types/events.js';
import { errorMessage, type Collaborator } from '../types/errors.js';
import type { AggregationPolicy } from '../config/engine-config.js';
import { AbortedError, DEFAULT_BACKOFF, abortable, backoffDelay, sleep, type BackoffPolicy } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ConfidenceValidator');

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;
export const DEFAULT_MAX_RETRIES = 2;

export const RELAXATION_STEPS = [
  'widen-fiscal-range',
  'drop-statement-types',
  'drop-chunk-kinds',
  'drop-fiscal-range',
] as const;

export type RelaxationStep = (typeof RELAXATION_STEPS)[number];

const TRANSITIONS: Record<ValidationState, readonly ValidationState[]> = {
  gathering: ['validating', 'degraded'],
  validating: ['composed', 'degraded'],
  composed: [],
  degraded: [],
};

const CATEGORY_TITLES: Record<TaskCategory, string> = {
  calculation: 'Calculation',
  'temporal-comparison': 'Period comparison',
  'risk-extraction': 'Risk disclosures',
  general: 'Answer',
};

const GAP_DESCRIPTIONS: Record<EvidenceGap, string> = {
  'retrieval-empty': 'no matching passages were retrieved',
  'agent-parse-failure': 'required figures or statements could not be read from the retrieved passages',
  'collaborator-unavailable': 'a backing service was unavailable',
  timeout: 'the question timed out before this part completed',
};

export type AnswerFn = (subQuery: SubQuery, signal?: AbortSignal) => Promise<PartialAnswer>;

function applyStep(step: RelaxationStep, filters: ChunkFilter): ChunkFilter | undefined {
  const { fiscalYearRange, statementTypes, chunkKinds, ...rest } = filters;
  switch (step) {
    case 'widen-fiscal-range': {
      if (!fiscalYearRange || (fiscalYearRange.from === undefined && fiscalYearRange.to === undefined)) return undefined;
      return {
        ...filters,
        fiscalYearRange: {
          from: fiscalYearRange.from !== undefined ? fiscalYearRange.from - 1 : undefined,
          to: fiscalYearRange.to !== undefined ? fiscalYearRange.to + 1 : undefined,
        },
      };
    }
    case 'drop-statement-types':
      return statementTypes?.length ? { ...rest, fiscalYearRange, chunkKinds } : undefined;
    case 'drop-chunk-kinds':
      return chunkKinds?.length ? { ...rest, fiscalYearRange, statementTypes } : undefined;
    case 'drop-fiscal-range':
      return fiscalYearRange ? { ...rest, statementTypes, chunkKinds } : undefined;
  }
}

/**
 * Next rung of the relaxation ladder that changes the filters, or undefined
 * when nothing is left to relax. Document ids are never dropped.
 */
export function relaxSubQuery(subQuery: SubQuery): { subQuery: SubQuery; step: RelaxationStep } | undefined {
  for (let level = subQuery.relaxation + 1; level <= RELAXATION_STEPS.length; level++) {
    const step = RELAXATION_STEPS[level - 1];
    const filters = applyStep(step, subQuery.filters);
    if (filters) return { step, subQuery: { ...subQuery, filters, relaxation: level } };
  }
  return undefined;
}

export function aggregateConfidence(confidences: readonly number[], policy: AggregationPolicy): number {
  if (confidences.length === 0) return 0;
  const value = policy === 'mean'
    ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length
    : Math.min(...confidences);
  return Math.round(value * 10_000) / 10_000;
}

function failedPartial(subQuery: SubQuery, gap: EvidenceGap, caveat: string): PartialAnswer {
  return {
    subQueryId: subQuery.id,
    category: subQuery.category,
    text: '',
    supportingChunkIds: [],
    citations: [],
    confidence: 0,
    gap,
    caveats: [caveat],
    details: {},
  };
}

export interface ConfidenceValidatorOptions {
  threshold?: number;
  /** Retries per SubQuery */
  maxRetries?: number;
  /** Delay between retry rounds */
  backoff?: BackoffPolicy;
  aggregation?: AggregationPolicy;
  onEvent?: EventHandler;
}

export interface SubQueryRecord {
  subQuery: SubQuery;
  /** Highest-confidence answer across attempts */
  best?: PartialAnswer;
  /** Filters of the attempt that produced `best` */
  bestFilters?: ChunkFilter;
  attempts: number;
  retries: number;
  exhausted: boolean;
}

export interface ValidationOutcome {
  status: 'composed' | 'degraded';
  partials: PartialAnswer[];
  confidence: number;
  retryCount: number;
  retries: Record<string, number>;
  caveats: string[];
  transitions: StateTransition[];
  timedOut: boolean;
  /** Collaborators that failed along the way; any entry settles the question degraded */
  unavailable: Collaborator[];
}

/** A collaborator failure recorded before the agents ran, such as during routing */
export interface CollaboratorOutage {
  collaborator: Collaborator;
  caveat: string;
}

/** One question's pass through the state machine */
export class ValidationRun {
  private current: ValidationState = 'gathering';
  private readonly trace: StateTransition[] = [];

  get state(): ValidationState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return this.trace;
  }

  transition(to: ValidationState, reason: string): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal validation transition ${this.current} -> ${to}`);
    }
    this.trace.push({ from: this.current, to, reason });
    this.current = to;
  }
}

export class ConfidenceValidator {
  readonly threshold: number;
  readonly maxRetries: number;
  readonly aggregation: AggregationPolicy;
  private readonly backoff: BackoffPolicy;
  private readonly onEvent?: EventHandler;

  constructor(options: ConfidenceValidatorOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.aggregation = options.aggregation ?? 'min';
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.onEvent = options.onEvent;
  }

  /**
   * Gather a PartialAnswer per SubQuery, re-issue those below threshold with
   * relaxed filters, and settle on Composed or Degraded. An aborted signal
   * settles Degraded with whatever has completed.
   */
  async validate(
    subQueries: readonly SubQuery[],
    answer: AnswerFn,
    signal?: AbortSignal,
    outages: readonly CollaboratorOutage[] = [],
  ): Promise<ValidationOutcome> {
    const run = new ValidationRun();
    const records = subQueries.map((subQuery): SubQueryRecord => ({
      subQuery,
      attempts: 0,
      retries: 0,
      exhausted: false,
    }));

    let timedOut = false;
    try {
      await Promise.all(records.map(record => this.attempt(record, record.subQuery, answer, signal)));
      run.transition('validating', `gathered ${records.length} partial answer(s)`);
      await this.validateRounds(records, answer, signal);
    } catch (err) {
      if (!(err instanceof AbortedError)) throw err;
      timedOut = true;
    }

    const unavailable = [...new Set([
      ...outages.map(o => o.collaborator),
      ...records.flatMap(r => r.best?.unavailable ?? []),
    ])];

    if (timedOut) {
      run.transition('degraded', 'question timed out');
    } else {
      const below = records.filter(r => (r.best?.confidence ?? 0) < this.threshold);
      if (below.length > 0) {
        run.transition('degraded', `${below.length} partial answer(s) below ${this.threshold} after retries`);
      } else if (unavailable.length > 0) {
        run.transition('degraded', `collaborator unavailable: ${unavailable.join(', ')}`);
      } else {
        run.transition('composed', `all partial answers at or above ${this.threshold}`);
      }
    }

    const partials = records.map(r => r.best ?? failedPartial(
      r.subQuery,
      timedOut ? 'timeout' : 'collaborator-unavailable',
      timedOut ? 'No answer before the question timed out' : 'No answer was produced',
    ));
    const retries = Object.fromEntries(records.map(r => [r.subQuery.id, r.retries]));
    const status = run.state === 'composed' ? 'composed' : 'degraded';

    return {
      status,
      partials,
      confidence: aggregateConfidence(partials.map(p => p.confidence), this.aggregation),
      retryCount: records.reduce((sum, r) => sum + r.retries, 0),
      retries,
      caveats: [...outages.map(o => o.caveat), ...this.caveats(partials, timedOut)],
      transitions: [...run.transitions],
      timedOut,
      unavailable,
    };
  }

  /** Compose the FinalAnswer text from the validated partials */
  compose(questionId: string, question: string, outcome: ValidationOutcome): FinalAnswer {
    const sections = outcome.partials.filter(p => p.text.length > 0);
    const text = sections.length === 1
      ? sections[0].text
      : sections.map(p => `${CATEGORY_TITLES[p.category]}:\n${p.text}`).join('\n\n');

    const seen = new Set<string>();
    const citations = outcome.partials.flatMap(p => p.citations).filter(c => {
      if (seen.has(c.chunkId)) return false;
      seen.add(c.chunkId);
      return true;
    });

    return {
      questionId,
      question,
      text: text || 'The indexed statements did not provide enough evidence to answer this question.',
      confidence: outcome.confidence,
      citations,
      status: outcome.status,
      retryCount: outcome.retryCount,
      caveats: outcome.caveats,
      partials: outcome.partials,
    };
  }

  private async validateRounds(records: SubQueryRecord[], answer: AnswerFn, signal?: AbortSignal): Promise<void> {
    for (let round = 0; round < this.maxRetries; round++) {
      const scheduled: Array<{ record: SubQueryRecord; next: SubQuery; step: string }> = [];
      for (const record of records) {
        if (record.exhausted || (record.best?.confidence ?? 0) >= this.threshold) continue;
        const next = this.nextAttempt(record);
        if (!next) {
          record.exhausted = true;
          continue;
        }
        scheduled.push({ record, ...next });
      }
      if (scheduled.length === 0) return;

      for (const { record, next, step } of scheduled) {
        log.info('Retry scheduled', {
          subQueryId: record.subQuery.id,
          retry: record.retries + 1,
          step,
          confidence: record.best?.confidence ?? 0,
        });
        this.onEvent?.(createEvent('RetryScheduled', 'QuestionAnswering', {
          subQueryId: record.subQuery.id,
          retry: record.retries + 1,
          step,
          relaxation: next.relaxation,
          previousConfidence: record.best?.confidence ?? 0,
        }));
      }

      await sleep(backoffDelay(this.backoff, round), signal);
      await Promise.all(scheduled.map(({ record, next }) => {
        record.retries++;
        record.subQuery = next;
        return this.attempt(record, next, answer, signal);
      }));
    }
  }

  /** Same filters after an unavailable collaborator; otherwise the next relaxation */
  private nextAttempt(record: SubQueryRecord): { next: SubQuery; step: string } | undefined {
    if (record.retries >= this.maxRetries) return undefined;
    if (record.best?.gap === 'collaborator-unavailable') {
      return { next: record.subQuery, step: 'repeat' };
    }
    const relaxed = relaxSubQuery(record.subQuery);
    return relaxed ? { next: relaxed.subQuery, step: relaxed.step } : undefined;
  }

  private async attempt(record: SubQueryRecord, subQuery: SubQuery, answer: AnswerFn, signal?: AbortSignal): Promise<void> {
    record.attempts++;
    let partial: PartialAnswer;
    try {
      partial = await abortable(answer(subQuery, signal), signal);
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      log.error('Agent failed', { subQueryId: subQuery.id, error: errorMessage(err) });
      partial = failedPartial(subQuery, 'collaborator-unavailable', `Agent failed: ${errorMessage(err)}`);
    }

    this.onEvent?.(createEvent('PartialAnswerProduced', 'QuestionAnswering', {
      subQueryId: subQuery.id,
      category: subQuery.category,
      attempt: record.attempts,
      relaxation: subQuery.relaxation,
      confidence: partial.confidence,
      gap: partial.gap,
    }));

    if (!record.best || partial.confidence > record.best.confidence) {
      record.best = partial;
      record.bestFilters = subQuery.filters;
    } else if (record.best.confidence === 0 && partial.gap) {
      // keep the latest gap so retry decisions follow the most recent failure
      record.best = { ...record.best, gap: partial.gap };
    }
  }

  private caveats(partials: readonly PartialAnswer[], timedOut: boolean): string[] {
    const caveats: string[] = [];
    if (timedOut) caveats.push('The question timed out; the answer is built from the parts that completed');
    for (const p of partials) {
      const title = CATEGORY_TITLES[p.category];
      if (p.confidence < this.threshold) {
        const gap = p.gap ? GAP_DESCRIPTIONS[p.gap] : 'the supporting evidence scored below the confidence threshold';
        caveats.push(`${title}: insufficient evidence (${p.gap ?? 'low-confidence'}): ${gap}`);
      }
      for (const c of p.caveats) caveats.push(`${title}: ${c}`);
    }
    return caveats;
  }
}
