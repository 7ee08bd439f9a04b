import type { CompletionOptions, CompletionPrompt } from "./completion-protocol.js";

/**
 * Text-completion collaborator used for answer synthesis.
 *
 * Implementations reject with `ProviderError` (UNAVAILABLE, TIMEOUT,
 * MALFORMED_RESPONSE, ABORTED) and must stop work promptly once
 * `options.signal` aborts.
 */
export interface CompletionProvider {
  name: string;
  version: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<string>;
  completeStream(prompt: CompletionPrompt, options: CompletionOptions): AsyncIterable<string>;
}
