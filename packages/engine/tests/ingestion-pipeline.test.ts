// Tests for the ingestion pipeline

import { describe, it, expect, beforeEach } from 'vitest';
import type { ExtractedDocument } from '../types/document.js';
import type { Embedder } from '../types/collaborators.js';
import type { DomainEvent } from '../types/events.js';
import { CollaboratorUnavailableError, InvalidDocumentError } from '../types/errors.js';
import { IngestionPipeline, parseExtractedDocument, type BatchIngestionProgress } from '../ingestion/pipeline.js';
import { LocalVectorIndex } from '../retrieval/local-vector-index.js';
import { FINANCE_VOCABULARY, KeywordEmbedder, NO_BACKOFF, annualReport, page } from './fixtures.js';

const BOUNDS = { lower: 1, upper: 500 };

describe('IngestionPipeline', () => {
  let index: LocalVectorIndex;
  let embedder: KeywordEmbedder;
  let events: DomainEvent[];
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    index = new LocalVectorIndex();
    embedder = new KeywordEmbedder(FINANCE_VOCABULARY);
    events = [];
    pipeline = new IngestionPipeline({
      embedder,
      index,
      chunkBounds: BOUNDS,
      backoff: NO_BACKOFF,
      onEvent: e => events.push(e),
    });
  });

  it('chunks, embeds and indexes a document', async () => {
    const report = await pipeline.ingestDocument(annualReport());

    expect(report.documentId).toBe('annual-2023');
    expect(report.chunksIndexed).toBe(3);
    expect(report.chunksRemoved).toBe(0);
    expect(report.degraded).toBe(false);
    expect(report.warnings).toEqual([]);
    expect(report.ingestion).toBe(1);
    expect(index.size).toBe(3);
    expect(embedder.calls).toBe(1);
    expect(index.documentChunks('annual-2023').map(c => c.id)).toEqual(report.chunkIds);
  });

  it('replaces the previous chunks when a document is ingested again', async () => {
    const first = await pipeline.ingestDocument(annualReport());
    const second = await pipeline.ingestDocument(annualReport());

    expect(second.chunkIds).toEqual(first.chunkIds);
    expect(second.chunksRemoved).toBe(0);
    expect(second.ingestion).toBe(2);
    expect(pipeline.ingestionCount('annual-2023')).toBe(2);
    expect(index.size).toBe(3);
  });

  it('prunes chunks the new version of a document no longer produces', async () => {
    const first = await pipeline.ingestDocument(annualReport());
    const shorter = annualReport();
    const second = await pipeline.ingestDocument({ ...shorter, pages: shorter.pages.slice(0, 1) });

    const stale = first.chunkIds.filter(id => !second.chunkIds.includes(id));
    expect(stale.length).toBeGreaterThan(0);
    expect(second.chunksRemoved).toBe(stale.length);
    expect(index.documentChunks('annual-2023').map(c => c.id)).toEqual(second.chunkIds);
  });

  it('keeps the previous chunks when the index write fails on re-ingestion', async () => {
    const first = await pipeline.ingestDocument(annualReport());
    index.upsert = async () => {
      throw new Error('connection reset');
    };

    const err = await pipeline.ingestDocument(annualReport()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorUnavailableError);
    expect(err).toMatchObject({ collaborator: 'vector-index' });
    expect(index.size).toBe(3);
    expect(index.documentChunks('annual-2023').map(c => c.id)).toEqual(first.chunkIds);
    expect(pipeline.ingestionCount('annual-2023')).toBe(1);
  });

  it('emits DocumentIngested with the chunk count', async () => {
    await pipeline.ingestDocument(annualReport());

    const ingested = events.filter(e => e.type === 'DocumentIngested');
    expect(ingested).toHaveLength(1);
    expect(ingested[0].payload).toEqual({ documentId: 'annual-2023', chunksIndexed: 3, degraded: false });
  });

  it('indexes a document without structural cues as one section and warns', async () => {
    const memo: ExtractedDocument = {
      documentId: 'memo',
      pages: [page('memo', 1, [[0, 'revenue grew this year.']])],
    };
    const report = await pipeline.ingestDocument(memo);

    expect(report.degraded).toBe(true);
    expect(report.chunksIndexed).toBe(1);
    expect(report.warnings).toEqual(['No statement or table boundaries detected in document "memo"']);
    expect(events.map(e => e.type)).toContain('ExtractionGapDetected');
  });

  it('rejects malformed input with every issue listed', async () => {
    await expect(pipeline.ingestDocument({ documentId: '', pages: [] })).rejects.toBeInstanceOf(InvalidDocumentError);
    await expect(pipeline.ingestDocument({
      documentId: 'dup',
      pages: [{ pageNumber: 1 }, { pageNumber: 1 }],
    })).rejects.toThrow(/duplicate page number 1/);
    expect(events.filter(e => e.type === 'IngestionFailed')).toHaveLength(2);
  });

  it('surfaces an embedder that returns the wrong number of vectors', async () => {
    const short: Embedder = { model: 'short', embed: async () => [] };
    const failing = new IngestionPipeline({ embedder: short, index, chunkBounds: BOUNDS, backoff: NO_BACKOFF });

    const err = await failing.ingestDocument(annualReport()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorUnavailableError);
    expect(err).toMatchObject({ collaborator: 'embedding', attempts: 1 });
    expect(index.size).toBe(0);
  });

  it('prepares chunks without calling the collaborators', () => {
    const prepared = pipeline.prepare(annualReport());

    expect(prepared.chunks).toHaveLength(3);
    expect(prepared.detection.boundaries).toHaveLength(3);
    expect(embedder.calls).toBe(0);
  });

  describe('ingestDocuments', () => {
    it('reports each document independently', async () => {
      const progress: BatchIngestionProgress[] = [];
      const result = await pipeline.ingestDocuments(
        [annualReport(), { documentId: 'broken', pages: 'not pages' }],
        { concurrency: 2, onProgress: p => progress.push(p) },
      );

      expect(result.succeeded).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.documents.map(d => d.documentId)).toEqual(['annual-2023', 'broken']);
      expect(result.documents[0].report?.chunksIndexed).toBe(3);
      expect(result.documents[1].error).toMatch(/^Invalid extracted document/);
      expect(progress.filter(p => p.status === 'running')).toHaveLength(2);
      expect(progress.filter(p => p.status === 'completed').map(p => p.current)).toEqual(['annual-2023']);
      expect(progress.filter(p => p.status === 'failed').map(p => p.current)).toEqual(['broken']);
    });

    it('processes documents in batches of the given width', async () => {
      const docs = ['a', 'b', 'c'].map(id => annualReport(id));
      const result = await pipeline.ingestDocuments(docs, { concurrency: 1 });

      expect(result.succeeded).toBe(3);
      expect(index.size).toBe(9);
    });
  });
});

describe('parseExtractedDocument', () => {
  it('stamps every page with the document id and fills defaults', () => {
    const doc = parseExtractedDocument({ documentId: 'd1', pages: [{ pageNumber: 1 }] });

    expect(doc.pages).toEqual([{ documentId: 'd1', pageNumber: 1, spans: [], tables: [] }]);
  });

  it('rejects a page that belongs to another document', () => {
    expect(() => parseExtractedDocument({
      documentId: 'd1',
      pages: [{ documentId: 'd2', pageNumber: 1 }],
    })).toThrow(/page belongs to "d2", not "d1"/);
  });
});
