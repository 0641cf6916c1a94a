import { z } from "zod";
import { STATEMENT_TYPES } from "@ledgerlens/engine";

export const StatementTypeSchema = z
  .enum(STATEMENT_TYPES)
  .describe("Financial statement section, e.g. income_statement or balance_sheet");

export const ChunkKindSchema = z
  .enum(["narrative", "tabular", "mixed"])
  .describe("Chunk content kind");

const YearSchema = z.coerce.number().int().min(1900).max(2100);

export const FilterShape = {
  fiscal_year_from: YearSchema.optional().describe("First fiscal year to search (inclusive)"),
  fiscal_year_to: YearSchema.optional().describe("Last fiscal year to search (inclusive)"),
  statement_types: z.array(StatementTypeSchema).optional().describe("Restrict retrieval to these statement sections"),
  chunk_kinds: z.array(ChunkKindSchema).optional().describe("Restrict retrieval to these chunk kinds"),
  document_ids: z.array(z.string().min(1)).optional().describe("Restrict retrieval to these documents"),
};
