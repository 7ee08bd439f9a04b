import { describe, it, expect } from "vitest";
import { queryTerms, scoreChunks } from "../../src/retrieval/relevance-scorer.js";
import type { Chunk } from "../../src/retrieval/types.js";

function chunk(documentId: string, page: number, startOffset: number, text: string): Chunk {
  return {
    id: `${documentId}:p${page}:${startOffset}`,
    documentId,
    page,
    startOffset,
    endOffset: startOffset + text.length,
    text,
  };
}

const payment = chunk("doc", 1, 0, "Payment is due within thirty days of invoice.");
const law = chunk("doc", 1, 46, "The governing law is the State of New York.");
const termination = chunk("doc", 2, 0, "Either party may terminate for convenience.");

describe("queryTerms", () => {
  it("should return sorted distinct content terms", () => {
    expect(queryTerms("Law law GOVERNING the")).toEqual(["governing", "law"]);
  });
});

describe("scoreChunks", () => {
  it("should rank only chunks sharing query terms", () => {
    const result = scoreChunks("What is the governing law?", [payment, law, termination]);
    expect(result.signal).toBe("lexical");
    expect(result.ranked.map((entry) => entry.chunk.id)).toEqual(["doc:p1:46"]);
    // two terms each seen once in one of three chunks, plus one adjacent pair
    expect(result.ranked[0]?.score).toBeCloseTo(2 * Math.log(1 + 2.5 / 1.5) + 0.5, 10);
  });

  it("should not pad the result up to topK", () => {
    const result = scoreChunks("governing law", [payment, law, termination], { topK: 5 });
    expect(result.ranked).toHaveLength(1);
  });

  it("should drop everything at or below the relevance floor", () => {
    const result = scoreChunks("governing law", [payment, law, termination], { relevanceFloor: 100 });
    expect(result).toEqual({ ranked: [], signal: "lexical" });
  });

  it("should break score ties by page, offset and document id", () => {
    const text = "Confidential information must be protected.";
    const chunks = [chunk("b", 2, 0, text), chunk("b", 1, 50, text), chunk("a", 1, 50, text), chunk("a", 1, 0, text)];
    const result = scoreChunks("confidential information", chunks);
    expect(result.ranked.map((entry) => entry.chunk.id)).toEqual(["a:p1:0", "a:p1:50", "b:p1:50", "b:p2:0"]);
  });

  it("should be independent of input order", () => {
    const forward = scoreChunks("terminate payment", [payment, law, termination]);
    const reversed = scoreChunks("terminate payment", [termination, law, payment]);
    expect(reversed).toEqual(forward);
  });

  it("should fall back to document order when the query has no content terms", () => {
    const result = scoreChunks("what is the", [termination, law, payment], { topK: 2 });
    expect(result.signal).toBe("none");
    expect(result.ranked).toEqual([
      { chunk: payment, score: 0 },
      { chunk: law, score: 0 },
    ]);
  });
});
