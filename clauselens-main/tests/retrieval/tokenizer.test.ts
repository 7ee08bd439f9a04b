import { describe, it, expect } from "vitest";
import { contentTerms, tokenize } from "../../src/retrieval/tokenizer.js";

describe("tokenize", () => {
  it("should lowercase and split on punctuation", () => {
    expect(tokenize("Hello, World! Net-30 terms.")).toEqual(["hello", "world", "net", "30", "terms"]);
  });

  it("should return an empty list for empty text", () => {
    expect(tokenize("")).toEqual([]);
  });
});

describe("contentTerms", () => {
  it("should drop stopwords and keep first-occurrence order", () => {
    expect(contentTerms("The term of the Agreement is the Term")).toEqual(["term", "agreement"]);
  });
});
