// Question answering - routing, partial answers and the composed final answer

import type { Chunk, ChunkFilter } from './chunk.js';
import type { StatementType } from './document.js';
import type { Collaborator } from './errors.js';

export type TaskCategory =
  | 'calculation'
  | 'temporal-comparison'
  | 'risk-extraction'
  | 'general';

export const TASK_CATEGORIES = [
  'calculation',
  'temporal-comparison',
  'risk-extraction',
  'general',
] as const satisfies readonly TaskCategory[];

export type EvidenceGap =
  | 'retrieval-empty'
  | 'agent-parse-failure'
  | 'collaborator-unavailable'
  | 'timeout';

export interface RetrievalCandidate {
  readonly chunkId: string;
  readonly score: number;          // similarity, higher is closer
  readonly filters: ChunkFilter;   // filters the candidate was retrieved under
  readonly chunk: Chunk;
}

export type RetrievalOutcome = 'ok' | 'empty' | 'unavailable';

export interface RetrievalResult {
  readonly candidates: RetrievalCandidate[];
  readonly outcome: RetrievalOutcome;
}

export interface SubQuery {
  readonly id: string;
  readonly questionId: string;
  readonly category: TaskCategory;
  readonly question: string;
  readonly instruction: string;
  readonly filters: ChunkFilter;
  readonly fiscalYears: readonly number[];   // ascending
  readonly relaxation: number;               // 0 = filters as routed
}

export interface Citation {
  readonly chunkId: string;
  readonly documentId: string;
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly statementType: StatementType;
}

export interface PartialAnswer {
  readonly subQueryId: string;
  readonly category: TaskCategory;
  readonly text: string;
  readonly value?: number;
  readonly supportingChunkIds: readonly string[];
  readonly citations: readonly Citation[];
  readonly confidence: number;   // 0-1
  readonly gap?: EvidenceGap;
  /** Collaborators that failed while this part was produced, even if it still answered */
  readonly unavailable?: readonly Collaborator[];
  readonly caveats: readonly string[];
  readonly details: Record<string, unknown>;
}

export type AnswerStatus = 'composed' | 'degraded';

export interface FinalAnswer {
  readonly questionId: string;
  readonly question: string;
  readonly text: string;
  readonly confidence: number;
  readonly citations: readonly Citation[];
  readonly status: AnswerStatus;
  readonly retryCount: number;
  readonly caveats: readonly string[];
  readonly partials: readonly PartialAnswer[];
}

export type ValidationState = 'gathering' | 'validating' | 'composed' | 'degraded';

export interface StateTransition {
  readonly from: ValidationState;
  readonly to: ValidationState;
  readonly reason: string;
}
