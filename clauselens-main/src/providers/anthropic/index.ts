import Anthropic, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from "@anthropic-ai/sdk";
import type { CompletionOptions, CompletionPrompt } from "../../core/contracts/completion-protocol.js";
import type { CompletionProvider } from "../../core/contracts/provider.js";
import { ProviderError } from "../../core/errors.js";
import { toProviderError } from "../errors.js";

let client: Anthropic | null = null;

const SDK_ERRORS = {
  userAbort: APIUserAbortError,
  connectionTimeout: APIConnectionTimeoutError,
  connection: APIConnectionError,
  api: APIError,
};

function requireClient(): Anthropic {
  if (!client) {
    throw new ProviderError("Anthropic provider not started.", "UNAVAILABLE");
  }
  return client;
}

function currentModel(): string {
  return process.env["ANTHROPIC_MODEL"] ?? "claude-3-5-haiku-latest";
}

const provider: CompletionProvider = {
  name: "anthropic",
  version: "1.0.0",

  start() {
    const apiKey = process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing ANTHROPIC_API_KEY environment variable.");
    }
    client = new Anthropic({ apiKey });
  },

  stop() {
    client = null;
  },

  async complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<string> {
    const anthropic = requireClient();
    try {
      const response = await anthropic.messages.create(
        {
          model: currentModel(),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        },
        { signal: options.signal },
      );
      const reply = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      if (reply.trim().length === 0) {
        throw new ProviderError("Empty response from Anthropic.", "MALFORMED_RESPONSE");
      }
      return reply;
    } catch (err) {
      throw toProviderError("Anthropic", err, SDK_ERRORS);
    }
  },

  async *completeStream(prompt: CompletionPrompt, options: CompletionOptions): AsyncGenerator<string> {
    const anthropic = requireClient();
    try {
      const stream = await anthropic.messages.create(
        {
          model: currentModel(),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
          stream: true,
        },
        { signal: options.signal },
      );
      for await (const event of stream) {
        if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
          yield event.delta.text;
        }
      }
    } catch (err) {
      throw toProviderError("Anthropic", err, SDK_ERRORS);
    }
  },
};

export default provider;
