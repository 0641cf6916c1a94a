import { describe, it, expect, vi } from "vitest";
import { CollaboratorUnavailableError } from "@ledgerlens/engine";
import { answerQuestion, listFiscalYears } from "../src/tools/questions.js";

describe("list_fiscal_years", () => {
  it("lists the years within the requested documents", async () => {
    const fiscalYears = vi.fn(async () => [2022, 2023]);

    const response = await listFiscalYears({ fiscalYears }, { document_ids: ["annual-2023"] });

    expect(fiscalYears).toHaveBeenCalledWith(["annual-2023"]);
    expect(response).not.toHaveProperty("isError");
    expect(JSON.parse(response.content[0].text)).toEqual({ fiscal_years: [2022, 2023] });
  });

  it("returns an error response when the index is unreachable", async () => {
    const fiscalYears = vi.fn(async (): Promise<number[]> => {
      throw new CollaboratorUnavailableError("vector-index", 3, new Error("connect ECONNREFUSED"));
    });

    const response = await listFiscalYears({ fiscalYears }, {});

    expect(response).toMatchObject({ isError: true });
    expect(JSON.parse(response.content[0].text)).toEqual({
      error: "vector-index unavailable after 3 attempt(s): connect ECONNREFUSED",
      kind: "collaborator-unavailable",
    });
  });

  it("returns an error response for invalid arguments", async () => {
    const fiscalYears = vi.fn(async () => [2023]);

    const response = await listFiscalYears({ fiscalYears }, { document_ids: [""] });

    expect(response).toMatchObject({ isError: true });
    expect(fiscalYears).not.toHaveBeenCalled();
  });
});

describe("answer_question", () => {
  it("returns an error response when answering fails", async () => {
    const engine = {
      answerQuestion: vi.fn(async () => {
        throw new Error("question rejected");
      }),
    };

    const response = await answerQuestion(engine, { question: "What was the net margin?" });

    expect(response).toMatchObject({ isError: true });
    expect(JSON.parse(response.content[0].text)).toEqual({ error: "question rejected" });
  });
});
