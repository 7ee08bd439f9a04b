import { describe, it, expect } from "vitest";
import type { ScoredChunk } from "../../src/retrieval/types.js";
import { attributeAnswer } from "../../src/synthesis/attribution.js";

function scored(id: number, text: string, score: number): ScoredChunk {
  return {
    chunk: { id: `doc:p${id}:0`, documentId: "doc", page: id, startOffset: 0, endOffset: text.length, text },
    score,
  };
}

const payment = scored(1, "Invoices are issued monthly. Payment is due within thirty days of invoice.", 1);
const law = scored(2, "This agreement is governed by the laws of Delaware.", 2);

describe("attributeAnswer", () => {
  it("should cite the best-matching sentence of each supporting chunk", () => {
    const citations = attributeAnswer("Payment is due thirty days after each invoice.", [payment, law]);
    expect(citations).toEqual([
      { documentId: "doc", page: 1, charRange: [29, 74], textSnippet: "Payment is due within thirty days of invoice." },
    ]);
  });

  it("should order citations by chunk score", () => {
    const citations = attributeAnswer(
      "Payment is due within thirty days and the agreement is governed by the laws of Delaware.",
      [payment, law],
    );
    expect(citations.map((citation) => citation.page)).toEqual([2, 1]);
  });

  it("should cite nothing for text the chunks do not support", () => {
    expect(attributeAnswer("Bananas are yellow.", [payment, law])).toEqual([]);
    expect(attributeAnswer("", [payment])).toEqual([]);
  });
});
