import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LedgerLensEngine } from "@ledgerlens/engine";
import { AnswerQuestionShape, AnswerQuestionSchema, FiscalYearsSchema, toChunkFilter } from "../schemas/questions.js";
import { wrapResponse, formatAnswer } from "../formatters/response.js";

export async function answerQuestion(engine: Pick<LedgerLensEngine, "answerQuestion">, params: unknown) {
  try {
    const { question, ...filters } = AnswerQuestionSchema.parse(params);
    const answer = await engine.answerQuestion(question, toChunkFilter(filters));
    return wrapResponse(formatAnswer(answer));
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}

export async function listFiscalYears(engine: Pick<LedgerLensEngine, "fiscalYears">, params: unknown) {
  try {
    const { document_ids } = FiscalYearsSchema.parse(params);
    const years = await engine.fiscalYears(document_ids);
    return wrapResponse({ fiscal_years: years });
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}

export function registerQuestionTools(server: McpServer, engine: LedgerLensEngine) {
  server.tool(
    "answer_question",
    "Answer an analytical question over the indexed financial statements. The question is routed to calculation (ratios, margins), period comparison (YoY changes) and risk extraction agents; each retrieves evidence, computes its part and scores its confidence, and low-confidence parts are retried with relaxed filters. Returns the answer text, status (composed or degraded), confidence, citations and caveats.",
    AnswerQuestionShape,
    async (params) => answerQuestion(engine, params)
  );

  server.tool(
    "list_fiscal_years",
    "List the fiscal years present in the indexed statements, optionally within some documents.",
    FiscalYearsSchema.shape,
    async (params) => listFiscalYears(engine, params)
  );
}
