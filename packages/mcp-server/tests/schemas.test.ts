import { describe, it, expect } from "vitest";
import { CollaboratorUnavailableError, type FinalAnswer } from "@ledgerlens/engine";
import { AnswerQuestionSchema, toChunkFilter } from "../src/schemas/questions.js";
import { IngestDocumentsSchema } from "../src/schemas/documents.js";
import { formatAnswer, formatIngestion, wrapResponse } from "../src/formatters/response.js";

describe("answer_question input", () => {
  it("maps tool arguments to a chunk filter", () => {
    const { question, ...filters } = AnswerQuestionSchema.parse({
      question: "  What was the net margin?  ",
      fiscal_year_from: "2022",
      fiscal_year_to: 2023,
      statement_types: ["income_statement"],
      document_ids: [],
    });

    expect(question).toBe("What was the net margin?");
    expect(toChunkFilter(filters)).toEqual({
      fiscalYearRange: { from: 2022, to: 2023 },
      statementTypes: ["income_statement"],
    });
  });

  it("leaves the filter empty when no field is given", () => {
    const { question, ...filters } = AnswerQuestionSchema.parse({ question: "Who audits the group?" });
    expect(question).toBe("Who audits the group?");
    expect(toChunkFilter(filters)).toEqual({});
  });

  it("rejects an inverted fiscal year range", () => {
    const result = AnswerQuestionSchema.safeParse({ question: "q", fiscal_year_from: 2024, fiscal_year_to: 2022 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe("fiscal_year_from must not be after fiscal_year_to");
  });

  it("rejects an unknown statement type and a blank question", () => {
    expect(AnswerQuestionSchema.safeParse({ question: "q", statement_types: ["p_and_l"] }).success).toBe(false);
    expect(AnswerQuestionSchema.safeParse({ question: "   " }).success).toBe(false);
  });
});

describe("ingest_documents input", () => {
  it("bounds the concurrency", () => {
    const doc = { documentId: "d1", pages: [{ pageNumber: 1 }] };
    expect(IngestDocumentsSchema.safeParse({ documents: [doc], concurrency: 0 }).success).toBe(false);
    expect(IngestDocumentsSchema.parse({ documents: [doc], concurrency: "4" }).concurrency).toBe(4);
  });
});

describe("response formatting", () => {
  const answer: FinalAnswer = {
    questionId: "q1",
    question: "What was the net margin in FY2023?",
    text: "Net profit margin for FY2023: 12.5%.",
    confidence: 0.85,
    citations: [
      { chunkId: "c1", documentId: "annual-2023", pageStart: 3, pageEnd: 3, statementType: "income_statement" },
      { chunkId: "c2", documentId: "annual-2023", pageStart: 4, pageEnd: 6, statementType: "notes" },
    ],
    status: "composed",
    retryCount: 1,
    caveats: [],
    partials: [{
      subQueryId: "q1:calculation",
      category: "calculation",
      text: "Net profit margin for FY2023: 12.5%.",
      value: 12.5,
      supportingChunkIds: ["c1", "c2"],
      citations: [],
      confidence: 0.85,
      caveats: [],
      details: {},
    }],
  };

  it("renders a final answer with snake_case fields", () => {
    expect(formatAnswer(answer)).toEqual({
      question_id: "q1",
      answer: "Net profit margin for FY2023: 12.5%.",
      status: "composed",
      confidence: 0.85,
      retry_count: 1,
      citations: [
        { chunk_id: "c1", document_id: "annual-2023", pages: "3", statement_type: "income_statement" },
        { chunk_id: "c2", document_id: "annual-2023", pages: "4-6", statement_type: "notes" },
      ],
      caveats: [],
      partials: [{ category: "calculation", confidence: 0.85, value: 12.5 }],
    });
  });

  it("renders an ingestion report", () => {
    expect(formatIngestion({
      documentId: "annual-2023",
      chunksIndexed: 12,
      chunksRemoved: 10,
      degraded: false,
      warnings: [],
      ingestion: 2,
      chunkIds: [],
      durationMs: 40,
    })).toEqual({
      document_id: "annual-2023",
      chunks_indexed: 12,
      chunks_replaced: 10,
      degraded: false,
      warnings: [],
      duration_ms: 40,
    });
  });

  it("wraps errors with their failure kind", () => {
    const response = wrapResponse(new CollaboratorUnavailableError("embedding", 3, new Error("timeout")));

    expect(response).toMatchObject({ isError: true });
    expect(JSON.parse(response.content[0].text)).toEqual({
      error: "embedding unavailable after 3 attempt(s): timeout",
      kind: "collaborator-unavailable",
    });
  });

  it("passes strings through and pretty-prints objects", () => {
    expect(wrapResponse("ok").content[0].text).toBe("ok");
    expect(wrapResponse({ fiscal_years: [2022] }).content[0].text).toBe('{\n  "fiscal_years": [\n    2022\n  ]\n}');
  });
});
