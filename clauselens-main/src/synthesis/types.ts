import type { Citation } from "../citations/types.js";
import type { CompletionProvider } from "../core/contracts/provider.js";
import type { RelevanceSignal, ScoredChunk } from "../retrieval/types.js";

export type AnswerStrategyName = "completion" | "extractive" | "none";

export interface Answer {
  text: string;
  /** Descending relevance, ties by (page, startOffset, documentId). */
  citations: Citation[];
  strategy: AnswerStrategyName;
  relevanceSignal: RelevanceSignal;
}

export interface CompletionSettings {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  promptTokenBudget: number;
}

/** Chosen once, when the synthesizer is built. */
export type SynthesisStrategy =
  | ({ kind: "completion"; provider: CompletionProvider } & CompletionSettings)
  | { kind: "extractive" };

export interface AnswerOptions {
  /** Defaults to "lexical". */
  relevanceSignal?: RelevanceSignal;
  signal?: AbortSignal;
}

export interface AnswerSynthesizer {
  readonly strategy: SynthesisStrategy["kind"];
  answer(question: string, ranked: readonly ScoredChunk[], options?: AnswerOptions): Promise<Answer>;
}

export const NO_RELEVANT_INFORMATION = "The provided documents do not contain information relevant to this question.";
