import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("openai", () => {
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
  const MockOpenAI = vi.fn();
  return { default: MockOpenAI, APIError, APIConnectionError, APIConnectionTimeoutError, APIUserAbortError };
});

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIUserAbortError } from "openai";
import type { CompletionProvider } from "../../src/core/contracts/provider.js";
import { ProviderError } from "../../src/core/errors.js";

const PROMPT = { system: "Answer from the excerpts.", user: "What is the term?" };
const OPTIONS = { maxTokens: 200, temperature: 0.1 };

async function getProvider(): Promise<CompletionProvider> {
  const mod = await import("../../src/providers/openai/index.js");
  return mod.default;
}

function mockOpenAIConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(OpenAI).mockImplementation(function (this: unknown) {
    return { chat: { completions: { create: mockCreate } } } as unknown as OpenAI;
  } as never);
}

async function* chunks(parts: string[]): AsyncGenerator<{ choices: { delta: { content?: string } }[] }> {
  for (const part of parts) {
    yield { choices: [{ delta: { content: part } }] };
  }
  yield { choices: [{ delta: {} }] };
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const piece of stream) out.push(piece);
  return out;
}

describe("OpenAI provider", () => {
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

  it("should throw when OPENAI_API_KEY is missing", () => {
    delete process.env["OPENAI_API_KEY"];
    expect(() => provider.start()).toThrow("Missing OPENAI_API_KEY environment variable.");
  });

  it("should initialize when API key is present", () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    expect(() => provider.start()).not.toThrow();
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: "test-secret" });
  });

  it("should refuse to complete before start", async () => {
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({ code: "UNAVAILABLE" });
  });

  it("should send the prompt with token and temperature limits", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    process.env["OPENAI_MODEL"] = "gpt-4o";
    const mockCreate = vi.fn().mockResolvedValue({
      choices: [{ message: { content: "The term is two years [1]." } }],
    });
    mockOpenAIConstructor(mockCreate);
    const controller = new AbortController();

    provider.start();
    const out = await provider.complete(PROMPT, { ...OPTIONS, signal: controller.signal });

    expect(out).toBe("The term is two years [1].");
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "gpt-4o",
        messages: [
          { role: "system", content: "Answer from the excerpts." },
          { role: "user", content: "What is the term?" },
        ],
        max_tokens: 200,
        temperature: 0.1,
      },
      { signal: controller.signal },
    );
  });

  it("should flag an empty reply as malformed", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    mockOpenAIConstructor(vi.fn().mockResolvedValue({ choices: [{ message: { content: "  " } }] }));

    provider.start();
    const err = await provider.complete(PROMPT, OPTIONS).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ code: "MALFORMED_RESPONSE", message: "Empty response from OpenAI." });
  });

  it("should map SDK failures onto provider error codes", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi
      .fn()
      .mockRejectedValueOnce(new APIConnectionTimeoutError({ message: "slow" }))
      .mockRejectedValueOnce(new APIUserAbortError({ message: "stop" }))
      .mockRejectedValueOnce(new APIConnectionError({ message: "ECONNREFUSED" }));
    mockOpenAIConstructor(mockCreate);

    provider.start();
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({ code: "TIMEOUT" });
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({ code: "ABORTED" });
    await expect(provider.complete(PROMPT, OPTIONS)).rejects.toMatchObject({
      code: "UNAVAILABLE",
      message: "OpenAI is unreachable: ECONNREFUSED",
    });
  });

  it("should stream content deltas", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi.fn().mockResolvedValue(chunks(["The term ", "is two years."]));
    mockOpenAIConstructor(mockCreate);

    provider.start();
    const pieces = await collect(provider.completeStream(PROMPT, OPTIONS));

    expect(pieces).toEqual(["The term ", "is two years."]);
    expect(mockCreate.mock.calls[0]?.[0]).toMatchObject({ stream: true, max_tokens: 200 });
  });
});
