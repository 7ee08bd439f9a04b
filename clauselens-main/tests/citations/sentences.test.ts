import { describe, it, expect } from "vitest";
import { sentenceSpans } from "../../src/citations/sentences.js";

describe("sentenceSpans", () => {
  it("should not split after known abbreviations", () => {
    expect(sentenceSpans("Acme Corp. agrees to pay. Payment is due in 30 days! Really?")).toEqual([
      { start: 0, end: 25, terminated: true },
      { start: 26, end: 52, terminated: true },
      { start: 53, end: 60, terminated: true },
    ]);
  });

  it("should end a sentence at a capital letter closing a clause", () => {
    expect(sentenceSpans("Services are set out in Exhibit A. The Vendor may terminate.")).toEqual([
      { start: 0, end: 34, terminated: true },
      { start: 35, end: 60, terminated: true },
    ]);
  });

  it("should keep initials followed by another initial or a lowercase word", () => {
    expect(sentenceSpans("Filed with the U. S. government.")).toEqual([{ start: 0, end: 32, terminated: true }]);
  });

  it("should not split inside decimal numbers", () => {
    expect(sentenceSpans("The fee is 2.5 million.")).toEqual([{ start: 0, end: 23, terminated: true }]);
  });

  it("should flag a trailing run with no terminator", () => {
    expect(sentenceSpans("First sentence. trailing text")).toEqual([
      { start: 0, end: 15, terminated: true },
      { start: 16, end: 29, terminated: false },
    ]);
  });

  it("should end a sentence at a blank line", () => {
    expect(sentenceSpans("Heading\n\nBody text.")).toEqual([
      { start: 0, end: 7, terminated: true },
      { start: 9, end: 19, terminated: true },
    ]);
  });

  it("should return nothing for whitespace", () => {
    expect(sentenceSpans("  \n ")).toEqual([]);
  });
});
