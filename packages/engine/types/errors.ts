// Failure taxonomy - every failure is local to one document or one question

export type Collaborator = 'embedding' | 'vector-index' | 'language-model';

export type FailureKind =
  | 'extraction-gap'
  | 'retrieval-empty'
  | 'agent-parse-failure'
  | 'collaborator-unavailable'
  | 'invalid-document';

export abstract class LedgerLensError extends Error {
  abstract readonly kind: FailureKind;
}

/** No structural boundary was detected; the document degrades to one section */
export class ExtractionGapError extends LedgerLensError {
  readonly kind = 'extraction-gap' as const;

  constructor(public readonly documentId: string) {
    super(`No statement or table boundaries detected in document "${documentId}"`);
    this.name = 'ExtractionGapError';
  }
}

/** Required numeric or qualitative fields could not be read from retrieved chunks */
export class AgentParseFailure extends LedgerLensError {
  readonly kind = 'agent-parse-failure' as const;

  constructor(message: string, public readonly missingFields: string[] = []) {
    super(message);
    this.name = 'AgentParseFailure';
  }
}

/** An embedding, vector or language-model call failed after all retries */
export class CollaboratorUnavailableError extends LedgerLensError {
  readonly kind = 'collaborator-unavailable' as const;

  constructor(
    public readonly collaborator: Collaborator,
    public readonly attempts: number,
    public readonly lastError?: unknown,
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError ?? 'unknown error');
    super(`${collaborator} unavailable after ${attempts} attempt(s): ${detail}`);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class InvalidDocumentError extends LedgerLensError {
  readonly kind = 'invalid-document' as const;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidDocumentError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
