import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from "openai";
import type { CompletionOptions, CompletionPrompt } from "../../core/contracts/completion-protocol.js";
import type { CompletionProvider } from "../../core/contracts/provider.js";
import { ProviderError } from "../../core/errors.js";
import { toProviderError } from "../errors.js";

let client: OpenAI | null = null;

const SDK_ERRORS = {
  userAbort: APIUserAbortError,
  connectionTimeout: APIConnectionTimeoutError,
  connection: APIConnectionError,
  api: APIError,
};

function requireClient(): OpenAI {
  if (!client) {
    throw new ProviderError("OpenAI provider not started.", "UNAVAILABLE");
  }
  return client;
}

function currentModel(): string {
  return process.env["OPENAI_MODEL"] ?? "gpt-4o-mini";
}

function toMessages(prompt: CompletionPrompt): OpenAI.ChatCompletionMessageParam[] {
  return [
    { role: "system", content: prompt.system },
    { role: "user", content: prompt.user },
  ];
}

const provider: CompletionProvider = {
  name: "openai",
  version: "1.0.0",

  start() {
    const apiKey = process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing OPENAI_API_KEY environment variable.");
    }
    client = new OpenAI({ apiKey });
  },

  stop() {
    client = null;
  },

  async complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<string> {
    const openai = requireClient();
    try {
      const response = await openai.chat.completions.create(
        {
          model: currentModel(),
          messages: toMessages(prompt),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
        },
        { signal: options.signal },
      );
      const reply = response.choices[0]?.message?.content;
      if (!reply || reply.trim().length === 0) {
        throw new ProviderError("Empty response from OpenAI.", "MALFORMED_RESPONSE");
      }
      return reply;
    } catch (err) {
      throw toProviderError("OpenAI", err, SDK_ERRORS);
    }
  },

  async *completeStream(prompt: CompletionPrompt, options: CompletionOptions): AsyncGenerator<string> {
    const openai = requireClient();
    try {
      const stream = await openai.chat.completions.create(
        {
          model: currentModel(),
          messages: toMessages(prompt),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          stream: true,
        },
        { signal: options.signal },
      );
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) yield delta;
      }
    } catch (err) {
      throw toProviderError("OpenAI", err, SDK_ERRORS);
    }
  },
};

export default provider;
