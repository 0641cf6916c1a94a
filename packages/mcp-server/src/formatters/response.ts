import type { FinalAnswer, IngestionReport } from "@ledgerlens/engine";

export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.message, kind: errorKind(result) }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: typeof result === "string" ? result : JSON.stringify(result, null, 2) }],
  };
}

function errorKind(err: Error): string | undefined {
  return "kind" in err && typeof err.kind === "string" ? err.kind : undefined;
}

/** FinalAnswer as the tool's JSON payload; partial answers are summarized */
export function formatAnswer(answer: FinalAnswer) {
  return {
    question_id: answer.questionId,
    answer: answer.text,
    status: answer.status,
    confidence: answer.confidence,
    retry_count: answer.retryCount,
    citations: answer.citations.map((c) => ({
      chunk_id: c.chunkId,
      document_id: c.documentId,
      pages: c.pageStart === c.pageEnd ? `${c.pageStart}` : `${c.pageStart}-${c.pageEnd}`,
      statement_type: c.statementType,
    })),
    caveats: answer.caveats,
    partials: answer.partials.map((p) => ({
      category: p.category,
      confidence: p.confidence,
      ...(p.value !== undefined ? { value: p.value } : {}),
      ...(p.gap ? { evidence_gap: p.gap } : {}),
    })),
  };
}

export function formatIngestion(report: IngestionReport) {
  return {
    document_id: report.documentId,
    chunks_indexed: report.chunksIndexed,
    chunks_replaced: report.chunksRemoved,
    degraded: report.degraded,
    warnings: report.warnings,
    duration_ms: report.durationMs,
  };
}
