// Specialist agent base - retrieve, post-process deterministically, self-score
// Subclasses implement investigate(); answer() turns findings into a PartialAnswer

import type { ChunkFilter } from '../types/chunk.js';
import type { LanguageModel } from '../types/collaborators.js';
import type {
  Citation, EvidenceGap, PartialAnswer, RetrievalCandidate, RetrievalResult, SubQuery, TaskCategory,
} from '../types/query.js';
import { errorMessage, type Collaborator } from '../types/errors.js';
import { LEXICON, type Lexicon } from '../config/lexicon.js';
import { DEFAULT_BACKOFF, AbortedError, withRetry, type BackoffPolicy } from '../utils/retry.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** The slice of the Retrieval Gateway an agent may use */
export interface AgentRetrieval {
  search(queryText: string, filters?: ChunkFilter, topK?: number, signal?: AbortSignal): Promise<RetrievalResult>;
}

export interface SpecialistAgent {
  readonly category: TaskCategory;
  answer(subQuery: SubQuery, signal?: AbortSignal): Promise<PartialAnswer>;
}

export interface AgentDependencies {
  gateway: AgentRetrieval;
  /** Drafts the final wording from computed facts; deterministic wording when absent */
  languageModel?: LanguageModel | null;
  lexicon?: Lexicon;
  topK?: number;
  backoff?: BackoffPolicy;
}

export interface ConsistencyCheck {
  name: string;
  passed: boolean;
  /** A failed required check forces confidence 0 */
  required: boolean;
}

export interface Findings {
  text: string;
  value?: number;
  /** Candidates whose content the answer rests on */
  supporting: RetrievalCandidate[];
  checks: ConsistencyCheck[];
  gap?: EvidenceGap;
  caveats?: string[];
  /** Facts handed to the language model for wording */
  facts?: string[];
  details?: Record<string, unknown>;
}

/** Evidence gap implied by a retrieval result that produced nothing usable */
export function retrievalGap(result: RetrievalResult): EvidenceGap {
  return result.outcome === 'unavailable' ? 'collaborator-unavailable' : 'retrieval-empty';
}

/**
 * Mean similarity of the supporting chunks times the fraction of checks passed.
 * Zero when a required check fails or nothing supports the answer.
 */
export function scoreConfidence(supporting: readonly RetrievalCandidate[], checks: readonly ConsistencyCheck[]): number {
  if (supporting.length === 0) return 0;
  if (checks.some(c => c.required && !c.passed)) return 0;
  const meanScore = supporting.reduce((sum, c) => sum + c.score, 0) / supporting.length;
  const passedFraction = checks.length === 0 ? 1 : checks.filter(c => c.passed).length / checks.length;
  const confidence = Math.min(1, Math.max(0, meanScore * passedFraction));
  return Math.round(confidence * 10_000) / 10_000;
}

/** Shortest narrative answer that counts as complete */
export const MIN_ANSWER_CHARS = 30;

/**
 * Completeness of the findings: a figure names every fiscal year the
 * sub-query was routed with; narrative says more than a fragment.
 */
export function completenessCheck(subQuery: SubQuery, findings: Findings): { check: ConsistencyCheck; caveat?: string } {
  if (findings.value !== undefined) {
    const missing = subQuery.fiscalYears.filter(year => !new RegExp(`\\b(?:FY)?${year}\\b`).test(findings.text));
    return {
      check: { name: 'answer-complete', passed: missing.length === 0, required: false },
      ...(missing.length > 0 ? { caveat: `Answer does not cover ${missing.map(y => `FY${y}`).join(', ')}` } : {}),
    };
  }
  const brief = findings.text.trim().length < MIN_ANSWER_CHARS;
  return {
    check: { name: 'answer-complete', passed: !brief, required: false },
    ...(brief ? { caveat: 'Answer is very brief' } : {}),
  };
}

export function citationsOf(candidates: readonly RetrievalCandidate[]): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const { chunk } of candidates) {
    if (seen.has(chunk.id)) continue;
    seen.add(chunk.id);
    citations.push({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      pageStart: chunk.metadata.pageStart,
      pageEnd: chunk.metadata.pageEnd,
      statementType: chunk.metadata.statementType,
    });
  }
  return citations;
}

export function pageRef(candidate: RetrievalCandidate): string {
  const { pageStart, pageEnd } = candidate.chunk.metadata;
  return pageStart === pageEnd ? `p.${pageStart}` : `pp.${pageStart}-${pageEnd}`;
}

export abstract class BaseSpecialistAgent implements SpecialistAgent {
  readonly category: TaskCategory;
  protected readonly gateway: AgentRetrieval;
  protected readonly lexicon: Lexicon;
  protected readonly topK?: number;
  protected readonly log: Logger;
  private readonly languageModel: LanguageModel | null;
  private readonly backoff: BackoffPolicy;

  constructor(category: TaskCategory, scope: string, deps: AgentDependencies) {
    this.category = category;
    this.gateway = deps.gateway;
    this.lexicon = deps.lexicon ?? LEXICON;
    this.topK = deps.topK;
    this.languageModel = deps.languageModel ?? null;
    this.backoff = deps.backoff ?? DEFAULT_BACKOFF;
    this.log = createLogger(scope);
  }

  async answer(subQuery: SubQuery, signal?: AbortSignal): Promise<PartialAnswer> {
    const findings = await this.investigate(subQuery, signal);
    const completeness = findings.supporting.length > 0 ? completenessCheck(subQuery, findings) : undefined;
    const checks = completeness ? [...findings.checks, completeness.check] : findings.checks;
    const confidence = scoreConfidence(findings.supporting, checks);
    const caveats = [...(findings.caveats ?? [])];
    if (completeness?.caveat) caveats.push(completeness.caveat);

    let text = findings.text;
    const unavailable: Collaborator[] = [];
    if (confidence > 0 && this.languageModel && findings.facts?.length) {
      const drafted = await this.draft(this.languageModel, subQuery, findings, signal);
      if (drafted) {
        text = drafted;
      } else {
        unavailable.push('language-model');
        caveats.push('Language model unavailable; answer uses deterministic wording');
      }
    }

    const failed = checks.filter(c => !c.passed).map(c => c.name);
    this.log.info('Partial answer', {
      subQueryId: subQuery.id,
      relaxation: subQuery.relaxation,
      confidence,
      gap: findings.gap,
      failedChecks: failed,
    });

    return {
      subQueryId: subQuery.id,
      category: this.category,
      text,
      value: findings.value,
      supportingChunkIds: findings.supporting.map(c => c.chunkId),
      citations: citationsOf(findings.supporting),
      confidence,
      gap: confidence === 0 ? findings.gap ?? 'agent-parse-failure' : findings.gap,
      ...(unavailable.length > 0 ? { unavailable } : {}),
      caveats,
      details: { ...findings.details, checks },
    };
  }

  protected abstract investigate(subQuery: SubQuery, signal?: AbortSignal): Promise<Findings>;

  protected search(queryText: string, filters: ChunkFilter, signal?: AbortSignal): Promise<RetrievalResult> {
    return this.gateway.search(queryText, filters, this.topK, signal);
  }

  private async draft(
    model: LanguageModel,
    subQuery: SubQuery,
    findings: Findings,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    try {
      const reply = await withRetry(
        'language-model',
        () => model.complete({
          system:
            'You write concise answers about financial statements. Use only the facts given; ' +
            'do not add figures that are not in them.',
          prompt:
            `Question: ${subQuery.question}\n` +
            `Task: ${subQuery.instruction}\n\n` +
            `Facts:\n${(findings.facts ?? []).map(f => `- ${f}`).join('\n')}\n\n` +
            'Answer in at most three sentences.',
          maxTokens: 300,
          signal,
        }),
        this.backoff,
        signal,
      );
      const trimmed = reply.trim();
      return trimmed.length > 0 ? trimmed : undefined;
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      this.log.warn('Drafting failed, keeping deterministic wording', { error: errorMessage(err) });
      return undefined;
    }
  }
}
