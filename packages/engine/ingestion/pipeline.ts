// Ingestion pipeline - validate -> detect boundaries -> chunk -> embed -> replace in index
// Failures are reported per document; one bad document never aborts a batch

import { z } from 'zod';
import type { ExtractedDocument, BoundaryDetection } from '../types/document.js';
import type { Chunk, ChunkBounds } from '../types/chunk.js';
import type { Embedder, VectorIndex } from '../types/collaborators.js';
import { createEvent, type EventHandler } from '../types/events.js';
import { ExtractionGapError, InvalidDocumentError, errorMessage } from '../types/errors.js';
import { DEFAULT_BACKOFF, withRetry, type BackoffPolicy } from '../utils/retry.js';
import { computeValidatedEmbeddings, type EmbeddingGuardOptions } from '../db/embedding-guard.js';
import { LEXICON, type Lexicon } from '../config/lexicon.js';
import { contentUnits } from './content-units.js';
import { detectBoundaries } from './boundary-detector.js';
import { chunkDocument, DEFAULT_CHUNK_BOUNDS } from './semantic-chunker.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Ingestion');

const TableCellSchema = z.object({
  row: z.number().int().min(0),
  column: z.number().int().min(0),
  text: z.string(),
});

const PageSchema = z.object({
  documentId: z.string().optional(),
  pageNumber: z.number().int().min(1),
  spans: z.array(z.object({ offset: z.number().int().min(0), text: z.string() })).default([]),
  tables: z
    .array(
      z.object({
        offset: z.number().int().min(0),
        rows: z.array(z.array(TableCellSchema)),
        headerRowCount: z.number().int().min(0).optional(),
        continuesPrevious: z.boolean().optional(),
      }),
    )
    .default([]),
});

export const ExtractedDocumentSchema = z
  .object({
    documentId: z.string().min(1),
    title: z.string().optional(),
    fiscalPeriods: z.array(z.string()).optional(),
    pages: z.array(PageSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<number>();
    doc.pages.forEach((page, i) => {
      if (page.documentId !== undefined && page.documentId !== doc.documentId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pages', i, 'documentId'],
          message: `page belongs to "${page.documentId}", not "${doc.documentId}"`,
        });
      }
      if (seen.has(page.pageNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pages', i, 'pageNumber'],
          message: `duplicate page number ${page.pageNumber}`,
        });
      }
      seen.add(page.pageNumber);
    });
  });

/** Validate raw extraction output; throws InvalidDocumentError listing every issue */
export function parseExtractedDocument(input: unknown): ExtractedDocument {
  const parsed = ExtractedDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidDocumentError(`Invalid extracted document: ${issues.join('; ')}`, issues);
  }
  const doc = parsed.data;
  return {
    documentId: doc.documentId,
    title: doc.title,
    fiscalPeriods: doc.fiscalPeriods,
    pages: doc.pages.map(page => ({ ...page, documentId: doc.documentId })),
  };
}

export interface IngestionPipelineOptions {
  embedder: Embedder;
  index: VectorIndex;
  chunkBounds?: ChunkBounds;
  backoff?: BackoffPolicy;
  /** Embedding quality guard settings; false disables the guard */
  guard?: EmbeddingGuardOptions | false;
  lexicon?: Lexicon;
  onEvent?: EventHandler;
}

export interface PreparedDocument {
  document: ExtractedDocument;
  detection: BoundaryDetection;
  chunks: Chunk[];
  warnings: string[];
}

export interface IngestionReport {
  documentId: string;
  chunksIndexed: number;
  chunksRemoved: number;
  degraded: boolean;
  warnings: string[];
  /** How many times this pipeline has ingested the document, this run included */
  ingestion: number;
  chunkIds: string[];
  durationMs: number;
}

export interface BatchIngestionOptions {
  /** Max documents in flight (default: 3) */
  concurrency?: number;
  onProgress?: (progress: BatchIngestionProgress) => void;
}

export interface BatchIngestionProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface BatchIngestionItem {
  documentId: string;
  report?: IngestionReport;
  error?: string;
}

export interface BatchIngestionResult {
  documents: BatchIngestionItem[];
  succeeded: number;
  failed: number;
  totalDurationMs: number;
}

function documentIdOf(input: unknown, position: number): string {
  if (typeof input === 'object' && input !== null && 'documentId' in input && typeof input.documentId === 'string') {
    return input.documentId;
  }
  return `#${position}`;
}

export class IngestionPipeline {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly chunkBounds: ChunkBounds;
  private readonly backoff: BackoffPolicy;
  private readonly guard: EmbeddingGuardOptions | false;
  private readonly lexicon: Lexicon;
  private readonly onEvent?: EventHandler;
  private readonly ingestionCounts = new Map<string, number>();

  constructor(options: IngestionPipelineOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.chunkBounds = options.chunkBounds ?? DEFAULT_CHUNK_BOUNDS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.guard = options.guard ?? {};
    this.lexicon = options.lexicon ?? LEXICON;
    this.onEvent = options.onEvent;
  }

  ingestionCount(documentId: string): number {
    return this.ingestionCounts.get(documentId) ?? 0;
  }

  /** Boundary detection and chunking without touching the collaborators */
  prepare(input: unknown): PreparedDocument {
    const document = parseExtractedDocument(input);
    const units = contentUnits(document, this.lexicon);
    const detection = detectBoundaries(document, { lexicon: this.lexicon, units });
    const warnings: string[] = [];

    if (detection.degraded) {
      const gap = new ExtractionGapError(document.documentId);
      warnings.push(gap.message);
      log.warn('Extraction gap, indexing document as one section', { documentId: document.documentId });
      this.onEvent?.(createEvent('ExtractionGapDetected', 'Ingestion', { documentId: document.documentId }));
    }

    const chunks = chunkDocument(document, detection.boundaries, this.chunkBounds, units);
    return { document, detection, chunks, warnings };
  }

  /**
   * Ingest one document. Re-ingestion replaces the document's previous chunks;
   * ids are content-derived, so unchanged input yields identical chunks.
   */
  async ingestDocument(input: unknown, signal?: AbortSignal): Promise<IngestionReport> {
    const start = Date.now();
    const documentId = documentIdOf(input, 0);
    try {
      const { document, detection, chunks, warnings } = this.prepare(input);

      const texts = chunks.map(c => c.text);
      const embeddings = texts.length === 0
        ? []
        : await withRetry('embedding', () => this.embed(texts, signal), this.backoff, signal);

      // Write the new chunks, then prune ids this ingestion no longer produced
      if (chunks.length > 0) {
        await withRetry(
          'vector-index',
          () => this.index.upsert(chunks.map((chunk, i) => ({ chunk, embedding: embeddings[i] }))),
          this.backoff,
          signal,
        );
      }
      const chunkIds = chunks.map(c => c.id);
      const chunksRemoved = await withRetry(
        'vector-index',
        () => this.index.deleteDocument(document.documentId, chunkIds),
        this.backoff,
        signal,
      );

      const ingestion = this.ingestionCount(document.documentId) + 1;
      this.ingestionCounts.set(document.documentId, ingestion);

      const report: IngestionReport = {
        documentId: document.documentId,
        chunksIndexed: chunks.length,
        chunksRemoved,
        degraded: detection.degraded,
        warnings,
        ingestion,
        chunkIds,
        durationMs: Date.now() - start,
      };
      log.info('Document ingested', {
        documentId: report.documentId,
        chunks: report.chunksIndexed,
        removed: report.chunksRemoved,
        boundaries: detection.boundaries.length,
        degraded: report.degraded,
      });
      this.onEvent?.(createEvent('DocumentIngested', 'Ingestion', {
        documentId: report.documentId,
        chunksIndexed: report.chunksIndexed,
        degraded: report.degraded,
      }));
      return report;
    } catch (err) {
      log.error('Ingestion failed', { documentId, error: errorMessage(err) });
      this.onEvent?.(createEvent('IngestionFailed', 'Ingestion', { documentId, error: errorMessage(err) }));
      throw err;
    }
  }

  /**
   * Ingest several documents with a concurrency limit. Each document is
   * reported independently; chunking within one document stays sequential.
   */
  async ingestDocuments(inputs: readonly unknown[], options: BatchIngestionOptions = {}): Promise<BatchIngestionResult> {
    const { concurrency = 3, onProgress } = options;
    const width = Math.max(1, Math.floor(concurrency));
    const totalStart = Date.now();
    const documents: BatchIngestionItem[] = [];

    for (let i = 0; i < inputs.length; i += width) {
      const batch = inputs.slice(i, i + width);

      const batchResults = await Promise.all(batch.map(async (input, j): Promise<BatchIngestionItem> => {
        const documentId = documentIdOf(input, i + j);
        onProgress?.({ completed: documents.length, total: inputs.length, current: documentId, status: 'running' });
        try {
          const report = await this.ingestDocument(input);
          onProgress?.({ completed: documents.length + 1, total: inputs.length, current: documentId, status: 'completed' });
          return { documentId, report };
        } catch (err) {
          const error = errorMessage(err);
          onProgress?.({ completed: documents.length + 1, total: inputs.length, current: documentId, status: 'failed', error });
          return { documentId, error };
        }
      }));

      documents.push(...batchResults);
    }

    const failed = documents.filter(d => d.error !== undefined).length;
    return {
      documents,
      succeeded: documents.length - failed,
      failed,
      totalDurationMs: Date.now() - totalStart,
    };
  }

  private embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const compute = async (batch: readonly string[]) => {
      const vectors = await this.embedder.embed(batch, signal);
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${batch.length} texts`);
      }
      return vectors;
    };
    if (this.guard === false) return compute(texts);
    return computeValidatedEmbeddings(compute, texts, this.guard);
  }
}
