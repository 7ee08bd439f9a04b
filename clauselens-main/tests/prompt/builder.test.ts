import { describe, it, expect } from "vitest";
import { ANSWER_INSTRUCTIONS, buildAnswerPrompt } from "../../src/prompt/builder.js";
import { estimateTextTokens } from "../../src/prompt/token-estimator.js";
import type { ScoredChunk } from "../../src/retrieval/types.js";

function scored(text: string, page: number, score: number): ScoredChunk {
  return {
    chunk: { id: `doc:p${page}:0`, documentId: "doc", page, startOffset: 0, endOffset: text.length, text },
    score,
  };
}

describe("buildAnswerPrompt", () => {
  it("should number passages in ranked order", () => {
    const output = buildAnswerPrompt({
      question: "  Who may terminate? ",
      passages: [scored(" Either party may terminate. ", 3, 2), scored("Notice must be written.", 1, 1)],
      tokenBudget: 1_000,
    });

    expect(output.prompt).toEqual({
      system: ANSWER_INSTRUCTIONS,
      user:
        "## Source passages\n\n" +
        "[S1] (page 3)\nEither party may terminate.\n\n" +
        "[S2] (page 1)\nNotice must be written.\n\n" +
        "## Question\n\nWho may terminate?",
    });
    expect(output.sources.map((chunk) => chunk.page)).toEqual([3, 1]);
  });

  it("should stop adding passages once the budget is spent", () => {
    const long = "x".repeat(100);
    const output = buildAnswerPrompt({
      question: "What?",
      passages: [scored(long, 1, 3), scored(long, 2, 2)],
      tokenBudget: 40,
    });

    expect(output.sources).toHaveLength(1);
    expect(output.sections).toEqual([
      { id: "instructions", tokens: estimateTextTokens(ANSWER_INSTRUCTIONS), included: true },
      { id: "passages", tokens: 29, included: true },
      { id: "question", tokens: 2, included: true },
    ]);
  });

  it("should always keep the top passage", () => {
    const output = buildAnswerPrompt({ question: "Term?", passages: [scored("Two years.", 1, 1)], tokenBudget: 0 });
    expect(output.sources).toHaveLength(1);
  });

  it("should mark the passages section missing when nothing was ranked", () => {
    const output = buildAnswerPrompt({ question: "Term?", passages: [], tokenBudget: 100 });
    expect(output.sections[1]).toEqual({
      id: "passages",
      tokens: 0,
      included: false,
      reason: "No passages above the relevance floor",
    });
  });
});
