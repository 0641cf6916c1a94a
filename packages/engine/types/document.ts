// Ingestion input - pages produced by the upstream extraction engines
// Text spans and table regions arrive pre-merged; the core never mutates them

export type StatementType =
  | 'balance_sheet'
  | 'income_statement'
  | 'cash_flow'
  | 'equity_changes'
  | 'notes'
  | 'risk_management'
  | 'management_commentary'
  | 'unclassified';

export const STATEMENT_TYPES = [
  'balance_sheet',
  'income_statement',
  'cash_flow',
  'equity_changes',
  'notes',
  'risk_management',
  'management_commentary',
  'unclassified',
] as const satisfies readonly StatementType[];

export interface TextSpan {
  readonly offset: number;     // character offset within the page
  readonly text: string;
}

export interface TableCell {
  readonly row: number;
  readonly column: number;
  readonly text: string;
}

export interface TableRegion {
  readonly offset: number;
  readonly rows: readonly (readonly TableCell[])[];
  /** Number of leading header rows, when the extraction engine reports it */
  readonly headerRowCount?: number;
  /** Set by extraction when the region continues a table from the previous page */
  readonly continuesPrevious?: boolean;
}

export interface ExtractedPage {
  readonly documentId: string;
  readonly pageNumber: number;
  readonly spans: readonly TextSpan[];
  readonly tables: readonly TableRegion[];
}

export interface ExtractedDocument {
  readonly documentId: string;
  readonly title?: string;
  /** Periods the document declares for itself, e.g. ['FY2023', 'FY2022'] */
  readonly fiscalPeriods?: readonly string[];
  readonly pages: readonly ExtractedPage[];
}

export type BoundaryKind =
  | 'statement-change'
  | 'table-start'
  | 'table-end'
  | 'section-heading'
  | 'page-break';

export interface Boundary {
  readonly id: string;
  readonly documentId: string;
  readonly page: number;
  readonly offset: number;
  readonly kind: BoundaryKind;
  readonly statementType?: StatementType;  // statement-change only
  readonly label?: string;
}

export interface BoundaryDetection {
  readonly boundaries: Boundary[];
  /** True when no structural cue was found and only page breaks were emitted */
  readonly degraded: boolean;
}
