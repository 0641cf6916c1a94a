import { z } from "zod";
import { ExtractedDocumentSchema } from "@ledgerlens/engine";

export const IngestDocumentSchema = z.object({
  document: ExtractedDocumentSchema.describe(
    "Extracted document: { documentId, title?, fiscalPeriods?, pages: [{ pageNumber, spans: [{ offset, text }], tables: [{ offset, rows: [[{ row, column, text }]], headerRowCount?, continuesPrevious? }] }] }",
  ),
});

export const IngestDocumentsSchema = z.object({
  documents: z.array(ExtractedDocumentSchema).min(1).describe("Extracted documents to ingest"),
  concurrency: z.coerce.number().int().min(1).max(16).optional().describe("Documents ingested in parallel (default 3)"),
});
