// Orchestrator - question -> router -> specialist agents -> validator -> FinalAnswer
// Independent SubQueries run concurrently; a question-level timeout aborts them

import { randomUUID } from 'node:crypto';
import type { ChunkFilter } from '../types/chunk.js';
import type { LanguageModel } from '../types/collaborators.js';
import type { FinalAnswer, SubQuery, TaskCategory } from '../types/query.js';
import type { DomainEvent, EventBus } from '../types/events.js';
import { SimpleEventBus, createEvent, forwardAll } from '../types/events.js';
import type { AggregationPolicy } from '../config/engine-config.js';
import type { Lexicon } from '../config/lexicon.js';
import type { RetrievalGateway } from '../retrieval/retrieval-gateway.js';
import type { SpecialistAgent } from '../agents/specialist-agent.js';
import { QueryRouter } from '../router/query-router.js';
import { AbortedError, abortable, type BackoffPolicy } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { ConfidenceValidator, type CollaboratorOutage, type ValidationOutcome } from './confidence-validator.js';
import { createSpecialists } from './specialist-factory.js';

const log = createLogger('Orchestrator');

export const DEFAULT_QUESTION_TIMEOUT_MS = 60_000;

export interface OrchestratorConfig {
  gateway: Pick<RetrievalGateway, 'search' | 'fiscalYears'>;
  languageModel?: LanguageModel | null;
  lexicon?: Lexicon;
  confidenceThreshold?: number;
  maxRetries?: number;
  backoff?: BackoffPolicy;
  aggregation?: AggregationPolicy;
  questionTimeoutMs?: number;
  topK?: number;
  /** Shared bus; a private one is created when absent */
  eventBus?: EventBus;
  onEvent?: (event: { type: string; payload: unknown }) => void;
  /** Replace the built-in agent for a category */
  agents?: Partial<Record<TaskCategory, SpecialistAgent>>;
  router?: QueryRouter;
}

export interface AnswerOptions {
  questionId?: string;
  /** Caller cancellation, in addition to the question timeout */
  signal?: AbortSignal;
}

export class Orchestrator {
  readonly validator: ConfidenceValidator;
  private readonly router: QueryRouter;
  private readonly agents: Record<TaskCategory, SpecialistAgent>;
  private readonly eventBus: EventBus;
  private readonly questionTimeoutMs: number;

  constructor(config: OrchestratorConfig) {
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.questionTimeoutMs = config.questionTimeoutMs ?? DEFAULT_QUESTION_TIMEOUT_MS;

    const emit = (event: DomainEvent) => this.eventBus.emit(event);
    this.router = config.router ?? new QueryRouter({
      catalog: config.gateway,
      languageModel: config.languageModel,
      lexicon: config.lexicon,
      backoff: config.backoff,
    });
    this.agents = {
      ...createSpecialists({
        gateway: config.gateway,
        languageModel: config.languageModel,
        lexicon: config.lexicon,
        topK: config.topK,
        backoff: config.backoff,
      }),
      ...config.agents,
    };
    this.validator = new ConfidenceValidator({
      threshold: config.confidenceThreshold,
      maxRetries: config.maxRetries,
      backoff: config.backoff,
      aggregation: config.aggregation,
      onEvent: emit,
    });

    if (config.onEvent) forwardAll(this.eventBus, config.onEvent);
  }

  /**
   * Answer one question. Never rejects for evidence or collaborator problems:
   * those settle as a Degraded FinalAnswer with caveats.
   */
  async answerQuestion(question: string, filters: ChunkFilter = {}, options: AnswerOptions = {}): Promise<FinalAnswer> {
    const trimmed = question.trim();
    if (!trimmed) throw new Error('Question must not be empty');

    const questionId = options.questionId ?? randomUUID();
    const start = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.questionTimeoutMs);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) controller.abort();
    const signal = controller.signal;

    this.eventBus.emit(createEvent('QuestionReceived', 'QuestionAnswering', { questionId, question: trimmed, filters }));

    try {
      let subQueries: SubQuery[];
      const outages: CollaboratorOutage[] = [];
      try {
        const routed = await abortable(this.router.routeQuestion(trimmed, filters, { questionId, signal }), signal);
        subQueries = routed.subQueries;
        if (routed.collaboratorUnavailable) {
          outages.push({
            collaborator: routed.collaboratorUnavailable,
            caveat: `Routing: ${routed.collaboratorUnavailable} unavailable; the question was sent to the general lookup`,
          });
        }
        this.eventBus.emit(createEvent('SubQueriesRouted', 'QuestionAnswering', {
          questionId,
          categories: routed.decision.categories,
          source: routed.decision.source,
          fiscalYears: routed.decision.fiscalYears,
        }));
      } catch (err) {
        if (!(err instanceof AbortedError)) throw err;
        return this.finish(questionId, trimmed, this.timedOutBeforeRouting(), start);
      }

      const outcome = await this.validator.validate(
        subQueries,
        (subQuery, s) => this.agents[subQuery.category].answer(subQuery, s),
        signal,
        outages,
      );
      return this.finish(questionId, trimmed, outcome, start);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private finish(questionId: string, question: string, outcome: ValidationOutcome, start: number): FinalAnswer {
    const answer = this.validator.compose(questionId, question, outcome);
    const payload = {
      questionId,
      status: answer.status,
      confidence: answer.confidence,
      retryCount: answer.retryCount,
      citations: answer.citations.length,
      transitions: outcome.transitions,
      unavailable: outcome.unavailable,
      durationMs: Date.now() - start,
    };
    if (answer.status === 'composed') {
      log.info('Answer composed', payload);
      this.eventBus.emit(createEvent('AnswerComposed', 'QuestionAnswering', payload));
    } else {
      log.warn('Answer degraded', { ...payload, caveats: answer.caveats });
      this.eventBus.emit(createEvent('AnswerDegraded', 'QuestionAnswering', { ...payload, caveats: answer.caveats }));
    }
    return answer;
  }

  private timedOutBeforeRouting(): ValidationOutcome {
    return {
      status: 'degraded',
      partials: [],
      confidence: 0,
      retryCount: 0,
      retries: {},
      caveats: ['The question timed out before it could be routed'],
      transitions: [{ from: 'gathering', to: 'degraded', reason: 'question timed out' }],
      timedOut: true,
      unavailable: [],
    };
  }
}
