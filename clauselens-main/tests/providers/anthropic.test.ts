import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@anthropic-ai/sdk", () => {
  class APIError extends Error {}
  class APIConnectionError extends APIError {
    constructor(opts?: { message?: string }) {
      super(opts?.message ?? "Connection error.");
    }
  }
  class APIConnectionTimeoutError extends APIConnectionError {}
  class APIUserAbortError extends APIError {
    constructor(opts?: { message?: string }) {
      super(opts?.message ?? "Request was aborted.");
    }
  }
  const MockAnthropic = vi.fn();
  return { default: MockAnthropic, APIError, APIConnectionError, APIConnectionTimeoutError, APIUserAbortError };
});

import Anthropic, { APIConnectionTimeoutError } from "@anthropic-ai/sdk";
import type { CompletionProvider } from "../../src/core/contracts/provider.js";

const PROMPT = { system: "Answer from the excerpts.", user: "Who may terminate?" };
const OPTIONS = { maxTokens: 300, temperature: 0 };

async function getProvider(): Promise<CompletionProvider> {
  const mod = await import("../../src/providers/anthropic/index.js");
  return mod.default;
}

function mockAnthropicConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(Anthropic).mockImplementation(function (this: unknown) {
    return { messages: { create: mockCreate } } as unknown as Anthropic;
  } as never);
}

async function* events(): AsyncGenerator<Record<string, unknown>> {
  yield { type: "message_start" };
  yield { type: "content_block_delta", delta: { type: "text_delta", text: "Either party " } };
  yield { type: "content_block_delta", delta: { type: "input_json_delta", partial_json: "{}" } };
  yield { type: "content_block_delta", delta: { type: "text_delta", text: "may terminate." } };
  yield { type: "message_stop" };
}

describe("Anthropic provider", () => {
  const originalEnv = { ...process.env };
  let provider: CompletionProvider;

  beforeEach(async () => {
    vi.clearAllMocks();
    provider = await getProvider();
    await provider.stop();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should throw when ANTHROPIC_API_KEY is missing", () => {
    delete process.env["ANTHROPIC_API_KEY"];
    expect(() => provider.start()).toThrow("Missing ANTHROPIC_API_KEY environment variable.");
  });

  it("should pass the system prompt separately and join text blocks", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-secret";
    process.env["ANTHROPIC_MODEL"] = "claude-test";
    const mockCreate = vi.fn().mockResolvedValue({
      content: [
        { type: "text", text: "Either party may terminate " },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: "on notice [1]." },
      ],
    });
    mockAnthropicConstructor(mockCreate);

    provider.start();
    const out = await provider.complete(PROMPT, OPTIONS);

    expect(out).toBe("Either party may terminate on notice [1].");
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "claude-test",
        max_tokens: 300,
        temperature: 0,
        system: "Answer from the excerpts.",
        messages: [{ role: "user", content: "Who may terminate?" }],
      },
      { signal: undefined },
    );
  });

  it("should flag a reply without text as malformed", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-secret";
    mockAnthropicConstructor(vi.fn().mockResolvedValue({ content: [] }));

    provider.start();
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({
      code: "MALFORMED_RESPONSE",
      message: "Empty response from Anthropic.",
    });
  });

  it("should report timeouts", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-secret";
    mockAnthropicConstructor(vi.fn().mockRejectedValue(new APIConnectionTimeoutError({ message: "slow" })));

    provider.start();
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "Anthropic request timed out.",
    });
  });

  it("should stream only text deltas", async () => {
    process.env["ANTHROPIC_API_KEY"] = "test-secret";
    mockAnthropicConstructor(vi.fn().mockResolvedValue(events()));

    provider.start();
    const pieces: string[] = [];
    for await (const piece of provider.completeStream(PROMPT, OPTIONS)) pieces.push(piece);

    expect(pieces).toEqual(["Either party ", "may terminate."]);
  });
});
