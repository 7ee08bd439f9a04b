import type { CompletionPrompt } from "../core/contracts/completion-protocol.js";
import type { Chunk, ScoredChunk } from "../retrieval/types.js";

export type PromptSectionId = "instructions" | "passages" | "question";

export interface AnswerPromptInput {
  question: string;
  passages: readonly ScoredChunk[];
  /** Upper bound on the estimated tokens spent on passages. */
  tokenBudget: number;
}

export interface PromptSectionMetadata {
  id: PromptSectionId;
  tokens: number;
  included: boolean;
  reason?: string;
}

export interface AnswerPromptOutput {
  prompt: CompletionPrompt;
  /** Chunks placed in the prompt, index i tagged `[S{i+1}]`. */
  sources: Chunk[];
  sections: PromptSectionMetadata[];
}
