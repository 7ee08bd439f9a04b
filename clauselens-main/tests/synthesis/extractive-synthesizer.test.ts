import { describe, it, expect } from "vitest";
import type { Chunk, ScoredChunk } from "../../src/retrieval/types.js";
import { ExtractiveSynthesizer, composeExtractiveAnswer } from "../../src/synthesis/extractive-synthesizer.js";
import { NO_RELEVANT_INFORMATION } from "../../src/synthesis/types.js";

function scored(text: string, score: number, page = 1, startOffset = 0): ScoredChunk {
  const chunk: Chunk = {
    id: `doc:p${page}:${startOffset}`,
    documentId: "doc",
    page,
    startOffset,
    endOffset: startOffset + text.length,
    text,
  };
  return { chunk, score };
}

const EFFECTIVE = "This agreement is effective as of January 1, 2024.";

describe("composeExtractiveAnswer", () => {
  it("should lead with the normalized date for date questions", () => {
    const answer = composeExtractiveAnswer("What is the effective date?", [scored(EFFECTIVE, 2)]);
    expect(answer).toEqual({
      text: `Based on the document, the relevant date is 2024-01-01: "${EFFECTIVE}"`,
      citations: [{ documentId: "doc", page: 1, charRange: [0, 50], textSnippet: EFFECTIVE }],
      strategy: "extractive",
      relevanceSignal: "lexical",
    });
  });

  it("should lead with the amount for amount questions", () => {
    const text = "The annual fee is $12,000 payable in advance. Late payments accrue interest.";
    const answer = composeExtractiveAnswer("How much is the fee?", [scored(text, 1)]);
    expect(answer.text).toBe(
      'Based on the document, the relevant amount is $12,000: "The annual fee is $12,000 payable in advance."',
    );
    expect(answer.citations[0]?.charRange).toEqual([0, 45]);
  });

  it("should quote the best sentence of the top chunk for other questions", () => {
    const text = "Licensor retains all intellectual property. Licensee receives a limited license.";
    const answer = composeExtractiveAnswer("Who owns the intellectual property?", [scored(text, 1)]);
    expect(answer.text).toBe(
      'Based on the document, the most relevant passage reads: "Licensor retains all intellectual property."',
    );
    expect(answer.citations).toHaveLength(1);
  });

  it("should look past the top chunk for a sentence carrying a date", () => {
    const top = scored("The effective terms are listed below.", 3);
    const second = scored(EFFECTIVE, 1, 2);
    const answer = composeExtractiveAnswer("What is the effective date?", [top, second]);
    expect(answer.citations[0]?.page).toBe(2);
    expect(answer.text).toContain("2024-01-01");
  });

  it("should answer with no citations when nothing is ranked", () => {
    expect(composeExtractiveAnswer("What is the term?", [], "none")).toEqual({
      text: NO_RELEVANT_INFORMATION,
      citations: [],
      strategy: "none",
      relevanceSignal: "none",
    });
  });
});

describe("ExtractiveSynthesizer", () => {
  it("should pass the relevance signal through", async () => {
    const synthesizer = new ExtractiveSynthesizer();
    const answer = await synthesizer.answer("effective date", [scored(EFFECTIVE, 0)], { relevanceSignal: "none" });
    expect(synthesizer.strategy).toBe("extractive");
    expect(answer.relevanceSignal).toBe("none");
    expect(answer.citations).toHaveLength(1);
  });
});
