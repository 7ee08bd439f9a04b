import type { CompletionPrompt } from "../core/contracts/completion-protocol.js";

const BYTES_PER_TOKEN = 4;
const REQUEST_OVERHEAD_TOKENS = 3;
const MESSAGE_OVERHEAD_TOKENS = 4;

export function estimateTextTokens(text: string): number {
  if (!text || text.trim().length === 0) return 0;
  return Math.max(1, Math.ceil(Buffer.byteLength(text, "utf8") / BYTES_PER_TOKEN));
}

export function estimatePromptTokens(prompt: CompletionPrompt): number {
  return (
    REQUEST_OVERHEAD_TOKENS +
    MESSAGE_OVERHEAD_TOKENS * 2 +
    estimateTextTokens(prompt.system) +
    estimateTextTokens(prompt.user)
  );
}
