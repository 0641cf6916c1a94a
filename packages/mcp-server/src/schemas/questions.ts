import { z } from "zod";
import type { ChunkFilter } from "@ledgerlens/engine";
import { FilterShape } from "./filters.js";

export const AnswerQuestionShape = {
  question: z.string().trim().min(1).describe("Analytical question about the indexed financial statements"),
  ...FilterShape,
};

export const AnswerQuestionSchema = z
  .object(AnswerQuestionShape)
  .refine(
    (v) => v.fiscal_year_from === undefined || v.fiscal_year_to === undefined || v.fiscal_year_from <= v.fiscal_year_to,
    { message: "fiscal_year_from must not be after fiscal_year_to", path: ["fiscal_year_from"] },
  );

export type AnswerQuestionInput = z.infer<typeof AnswerQuestionSchema>;

export const FiscalYearsSchema = z.object({
  document_ids: FilterShape.document_ids,
});

/** Tool arguments -> engine ChunkFilter; absent fields do not constrain */
export function toChunkFilter(input: Omit<AnswerQuestionInput, "question">): ChunkFilter {
  const { fiscal_year_from: from, fiscal_year_to: to } = input;
  return {
    ...(from !== undefined || to !== undefined ? { fiscalYearRange: { from, to } } : {}),
    ...(input.statement_types?.length ? { statementTypes: input.statement_types } : {}),
    ...(input.chunk_kinds?.length ? { chunkKinds: input.chunk_kinds } : {}),
    ...(input.document_ids?.length ? { documentIds: input.document_ids } : {}),
  };
}
