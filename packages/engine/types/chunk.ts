// Retrieval atoms - bounded, metadata-tagged units of document content

import type { StatementType } from './document.js';

export type ChunkKind = 'narrative' | 'tabular' | 'mixed';

export interface TextBlock {
  readonly type: 'text';
  readonly text: string;
}

export interface TableBlock {
  readonly type: 'table';
  readonly tableIndex: number;
  readonly headerRows: readonly (readonly string[])[];
  readonly rows: readonly (readonly string[])[];
}

export type ChunkContent = TextBlock | TableBlock;

export interface ChunkMetadata {
  readonly fiscalPeriods: readonly string[];
  readonly fiscalYears: readonly number[];
  readonly statementType: StatementType;
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly sourceBoundaryIds: readonly string[];
  /** Document-wide index of the first table in the chunk; absent for pure narrative */
  readonly tableIndex?: number;
}

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly ordinal: number;
  readonly kind: ChunkKind;
  readonly content: readonly ChunkContent[];
  readonly text: string;          // rendered content, the text that gets embedded
  readonly tokens: number;
  readonly metadata: ChunkMetadata;
}

export interface ChunkBounds {
  readonly lower: number;
  readonly upper: number;
}

export interface FiscalYearRange {
  readonly from?: number;
  readonly to?: number;
}

// Conjunction over chunk metadata; an absent field does not constrain
export interface ChunkFilter {
  readonly fiscalYearRange?: FiscalYearRange;
  readonly statementTypes?: readonly StatementType[];
  readonly chunkKinds?: readonly ChunkKind[];
  readonly documentIds?: readonly string[];
}
