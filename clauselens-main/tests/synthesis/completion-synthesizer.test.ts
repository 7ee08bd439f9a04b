import { describe, it, expect, vi } from "vitest";
import type { CompletionOptions, CompletionPrompt } from "../../src/core/contracts/completion-protocol.js";
import type { CompletionProvider } from "../../src/core/contracts/provider.js";
import { ProviderError } from "../../src/core/errors.js";
import { ANSWER_INSTRUCTIONS, NOT_FOUND_REPLY } from "../../src/prompt/builder.js";
import type { ScoredChunk } from "../../src/retrieval/types.js";
import { CompletionSynthesizer } from "../../src/synthesis/completion-synthesizer.js";
import { composeExtractiveAnswer } from "../../src/synthesis/extractive-synthesizer.js";
import { createSynthesizer } from "../../src/synthesis/index.js";

const EFFECTIVE = "This agreement is effective as of January 1, 2024.";
const ranked: ScoredChunk[] = [
  {
    chunk: { id: "doc:p1:0", documentId: "doc", page: 1, startOffset: 0, endOffset: EFFECTIVE.length, text: EFFECTIVE },
    score: 2,
  },
];
const CONFIDENTIAL =
  "Confidential Information provided under this Agreement shall not be disclosed to any third party without consent.";
const confidentialRanked: ScoredChunk[] = [
  {
    chunk: { id: "doc:p2:0", documentId: "doc", page: 2, startOffset: 0, endOffset: CONFIDENTIAL.length, text: CONFIDENTIAL },
    score: 1,
  },
];
const EXTRACTIVE_TEXT = `Based on the document, the relevant date is 2024-01-01: "${EFFECTIVE}"`;

function createMockProvider(
  complete: (prompt: CompletionPrompt, options: CompletionOptions) => Promise<string>,
): CompletionProvider {
  return {
    name: "mock",
    version: "1.0.0",
    start: vi.fn(),
    stop: vi.fn(),
    complete: vi.fn(complete),
    async *completeStream() {
      yield "";
    },
  };
}

function synthesizer(provider: CompletionProvider, timeoutMs = 1_000): CompletionSynthesizer {
  return new CompletionSynthesizer({
    kind: "completion",
    provider,
    maxTokens: 200,
    temperature: 0,
    timeoutMs,
    promptTokenBudget: 1_000,
  });
}

describe("CompletionSynthesizer", () => {
  it("should attribute the completion to the supplied passages", async () => {
    const provider = createMockProvider(async () => "The agreement took effect on January 1, 2024.");
    const answer = await synthesizer(provider).answer("What is the effective date?", ranked);

    expect(answer).toEqual({
      text: "The agreement took effect on January 1, 2024.",
      citations: [{ documentId: "doc", page: 1, charRange: [0, 50], textSnippet: EFFECTIVE }],
      strategy: "completion",
      relevanceSignal: "lexical",
    });
    expect(provider.complete).toHaveBeenCalledWith(
      {
        system: ANSWER_INSTRUCTIONS,
        user: `## Source passages\n\n[S1] (page 1)\n${EFFECTIVE}\n\n## Question\n\nWhat is the effective date?`,
      },
      expect.objectContaining({ maxTokens: 200, temperature: 0 }),
    );
  });

  it("should fall back to the extractive answer when the provider fails", async () => {
    const provider = createMockProvider(async () => {
      throw new ProviderError("down", "UNAVAILABLE");
    });
    const answer = await synthesizer(provider).answer("What is the effective date?", ranked);
    expect(answer.strategy).toBe("extractive");
    expect(answer.text).toBe(EXTRACTIVE_TEXT);
  });

  it("should treat an empty completion as malformed", async () => {
    const answer = await synthesizer(createMockProvider(async () => "   ")).answer("What is the effective date?", ranked);
    expect(answer.strategy).toBe("extractive");
  });

  it("should reject completions that overlap none of the passages", async () => {
    const answer = await synthesizer(createMockProvider(async () => "Bananas are yellow.")).answer(
      "What is the effective date?",
      ranked,
    );
    expect(answer.strategy).toBe("extractive");
    expect(answer.citations).toHaveLength(1);
  });

  it("should answer extractively when the model gives the not-found reply", async () => {
    const question = "Which court hears disputes?";
    const answer = await synthesizer(createMockProvider(async () => NOT_FOUND_REPLY)).answer(question, confidentialRanked);
    expect(answer).toEqual(composeExtractiveAnswer(question, confidentialRanked));
    expect(answer.strategy).toBe("extractive");
  });

  it("should recognise the not-found reply when quoted", async () => {
    const question = "Which court hears disputes?";
    const answer = await synthesizer(createMockProvider(async () => `"${NOT_FOUND_REPLY}"\n`)).answer(
      question,
      confidentialRanked,
    );
    expect(answer.strategy).toBe("extractive");
  });

  it("should abort a slow provider and answer extractively", async () => {
    const seen: { signal?: AbortSignal } = {};
    const provider = createMockProvider((_prompt, options) => {
      seen.signal = options.signal;
      return new Promise<string>(() => undefined);
    });

    const answer = await synthesizer(provider, 20).answer("What is the effective date?", ranked);

    expect(answer.strategy).toBe("extractive");
    expect(seen.signal?.aborted).toBe(true);
    expect(seen.signal?.reason).toMatchObject({ code: "TIMEOUT" });
  });

  it("should not call the provider when nothing is ranked", async () => {
    const provider = createMockProvider(async () => "unused");
    const answer = await synthesizer(provider).answer("What is the term?", []);
    expect(answer.strategy).toBe("none");
    expect(provider.complete).not.toHaveBeenCalled();
  });
});

describe("createSynthesizer", () => {
  it("should build the strategy named by configuration", () => {
    expect(createSynthesizer({ kind: "extractive" }).strategy).toBe("extractive");
    const provider = createMockProvider(async () => "");
    expect(
      createSynthesizer({ kind: "completion", provider, maxTokens: 1, temperature: 0, timeoutMs: 1, promptTokenBudget: 1 })
        .strategy,
    ).toBe("completion");
  });
});
