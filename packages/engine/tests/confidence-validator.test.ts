// Tests for the confidence validator: relaxation ladder, retry bound and composition

import { describe, it, expect } from 'vitest';
import type { PartialAnswer, SubQuery } from '../types/query.js';
import type { DomainEvent } from '../types/events.js';
import {
  ConfidenceValidator, ValidationRun, aggregateConfidence, relaxSubQuery,
} from '../orchestrator/confidence-validator.js';
import { NO_BACKOFF, subQuery } from './fixtures.js';

function partial(sub: SubQuery, confidence: number, extra: Partial<PartialAnswer> = {}): PartialAnswer {
  return {
    subQueryId: sub.id,
    category: sub.category,
    text: `answer at relaxation ${sub.relaxation}`,
    supportingChunkIds: [],
    citations: [],
    confidence,
    caveats: [],
    details: {},
    ...extra,
  };
}

describe('relaxSubQuery', () => {
  it('walks the ladder and never drops document ids', () => {
    const start = subQuery({
      category: 'risk-extraction',
      question: 'What are the risks?',
      filters: {
        documentIds: ['d1'],
        fiscalYearRange: { from: 2023, to: 2023 },
        statementTypes: ['risk_management'],
      },
    });

    const first = relaxSubQuery(start);
    expect(first?.step).toBe('widen-fiscal-range');
    expect(first?.subQuery.relaxation).toBe(1);
    expect(first?.subQuery.filters).toEqual({
      documentIds: ['d1'],
      fiscalYearRange: { from: 2022, to: 2024 },
      statementTypes: ['risk_management'],
    });
    if (!first) return;

    const second = relaxSubQuery(first.subQuery);
    expect(second?.step).toBe('drop-statement-types');
    expect(second?.subQuery.filters).toEqual({ documentIds: ['d1'], fiscalYearRange: { from: 2022, to: 2024 } });
    if (!second) return;

    // no chunk kinds to drop, so the range goes next
    const third = relaxSubQuery(second.subQuery);
    expect(third?.step).toBe('drop-fiscal-range');
    expect(third?.subQuery.relaxation).toBe(4);
    expect(third?.subQuery.filters).toEqual({ documentIds: ['d1'] });
    if (!third) return;

    expect(relaxSubQuery(third.subQuery)).toBeUndefined();
  });

  it('has nothing to relax for unfiltered sub-queries', () => {
    expect(relaxSubQuery(subQuery({ category: 'general', question: 'q' }))).toBeUndefined();
  });
});

describe('aggregateConfidence', () => {
  it('takes the minimum by default policy and the mean on request', () => {
    expect(aggregateConfidence([0.9, 0.7], 'min')).toBe(0.7);
    expect(aggregateConfidence([0.9, 0.7], 'mean')).toBe(0.8);
    expect(aggregateConfidence([], 'min')).toBe(0);
  });
});

describe('ValidationRun', () => {
  it('rejects transitions the state machine does not allow', () => {
    const run = new ValidationRun();
    expect(() => run.transition('composed', 'skip')).toThrow('Illegal validation transition gathering -> composed');

    run.transition('validating', 'gathered');
    run.transition('composed', 'done');
    expect(() => run.transition('degraded', 'late')).toThrow('Illegal validation transition composed -> degraded');
    expect(run.transitions.map(t => t.to)).toEqual(['validating', 'composed']);
  });
});

describe('ConfidenceValidator', () => {
  it('stops after maxRetries relaxed attempts and settles degraded', async () => {
    const seen: number[] = [];
    const validator = new ConfidenceValidator({ threshold: 0.6, maxRetries: 2, backoff: NO_BACKOFF });
    const sub = subQuery({
      category: 'calculation',
      question: 'What was the net margin?',
      filters: { fiscalYearRange: { from: 2023, to: 2023 }, statementTypes: ['income_statement'] },
    });

    const outcome = await validator.validate([sub], async s => {
      seen.push(s.relaxation);
      return partial(s, 0.1);
    });

    expect(seen).toEqual([0, 1, 2]);
    expect(outcome.status).toBe('degraded');
    expect(outcome.retryCount).toBe(2);
    expect(outcome.retries).toEqual({ 'q1:calculation': 2 });
    expect(outcome.confidence).toBe(0.1);
    expect(outcome.partials[0].text).toBe('answer at relaxation 0');
    expect(outcome.transitions.map(t => `${t.from}->${t.to}`)).toEqual(['gathering->validating', 'validating->degraded']);
  });

  it('repeats the same filters after an unavailable collaborator', async () => {
    const events: DomainEvent[] = [];
    const validator = new ConfidenceValidator({ backoff: NO_BACKOFF, onEvent: e => events.push(e) });
    const sub = subQuery({ category: 'general', question: 'Who audits the group?' });
    let calls = 0;

    const outcome = await validator.validate([sub], async s => {
      calls++;
      return calls === 1 ? partial(s, 0, { gap: 'collaborator-unavailable' }) : partial(s, 0.9);
    });

    expect(outcome.status).toBe('composed');
    expect(outcome.retryCount).toBe(1);
    expect(outcome.confidence).toBe(0.9);
    const retry = events.find(e => e.type === 'RetryScheduled');
    expect(retry?.payload).toEqual({
      subQueryId: 'q1:general',
      retry: 1,
      step: 'repeat',
      relaxation: 0,
      previousConfidence: 0,
    });
  });

  it('turns an agent failure into a caveated partial answer', async () => {
    const validator = new ConfidenceValidator({ maxRetries: 0, backoff: NO_BACKOFF });
    const sub = subQuery({ category: 'calculation', question: 'What was the net margin?' });

    const outcome = await validator.validate([sub], async () => {
      throw new Error('boom');
    });

    expect(outcome.status).toBe('degraded');
    expect(outcome.partials[0].gap).toBe('collaborator-unavailable');
    expect(outcome.caveats).toEqual([
      'Calculation: insufficient evidence (collaborator-unavailable): a backing service was unavailable',
      'Calculation: Agent failed: boom',
    ]);
  });

  it('composes sections per category when several partials answer', () => {
    const validator = new ConfidenceValidator();
    const calc = subQuery({ category: 'calculation', question: 'q' });
    const risk = { ...subQuery({ category: 'risk-extraction', question: 'q' }), id: 'q1:risk-extraction' };
    const citation = { chunkId: 'c1', documentId: 'd1', pageStart: 1, pageEnd: 1, statementType: 'notes' as const };

    const answer = validator.compose('q1', 'q', {
      status: 'composed',
      partials: [
        partial(calc, 0.8, { text: 'Margin 12.5%.', citations: [citation] }),
        partial(risk, 0.7, { text: 'Credit risk:\n- Loans.', citations: [citation] }),
      ],
      confidence: 0.7,
      retryCount: 0,
      retries: {},
      caveats: [],
      transitions: [],
      timedOut: false,
      unavailable: [],
    });

    expect(answer.text).toBe('Calculation:\nMargin 12.5%.\n\nRisk disclosures:\nCredit risk:\n- Loans.');
    expect(answer.citations).toEqual([citation]);
  });
});
