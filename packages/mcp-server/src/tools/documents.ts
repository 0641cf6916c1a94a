import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerLensEngine } from "@ledgerlens/engine";
import { IngestDocumentSchema, IngestDocumentsSchema } from "../schemas/documents.js";
import { wrapResponse, formatIngestion } from "../formatters/response.js";

export function registerDocumentTools(server: McpServer, engine: LedgerLensEngine) {
  server.tool(
    "ingest_document",
    "Ingest one extracted financial statement document. Detects statement and table boundaries, splits the content into bounded chunks that never break a table or statement section, embeds them and replaces any chunks previously indexed for the same document id. Returns the number of chunks indexed.",
    IngestDocumentSchema.shape,
    async (params) => {
      try {
        const { document } = IngestDocumentSchema.parse(params);
        const report = await engine.ingestDocument(document);
        return wrapResponse(formatIngestion(report));
      } catch (err) {
        return wrapResponse(err instanceof Error ? err : new Error(String(err)));
      }
    }
  );

  server.tool(
    "ingest_documents",
    "Ingest several extracted documents with a concurrency limit. Each document succeeds or fails on its own; the result lists chunks indexed per document and the error for any that failed.",
    IngestDocumentsSchema.shape,
    async (params) => {
      try {
        const { documents, concurrency } = IngestDocumentsSchema.parse(params);
        const result = await engine.ingestDocuments(documents, { concurrency });
        return wrapResponse({
          succeeded: result.succeeded,
          failed: result.failed,
          documents: result.documents.map((d) =>
            d.report ? formatIngestion(d.report) : { document_id: d.documentId, error: d.error }
          ),
          total_duration_ms: result.totalDurationMs,
        });
      } catch (err) {
        return wrapResponse(err instanceof Error ? err : new Error(String(err)));
      }
    }
  );
}
