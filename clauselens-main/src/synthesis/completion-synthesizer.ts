import { ProviderError, errorMessage } from "../core/errors.js";
import { buildAnswerPrompt } from "../prompt/builder.js";
import { estimatePromptTokens } from "../prompt/token-estimator.js";
import type { ScoredChunk } from "../retrieval/types.js";
import { devDebug, devWarn } from "../shared/index.js";
import { attributeAnswer, isDeclinedAnswer } from "./attribution.js";
import { Deadline } from "./deadline.js";
import { composeExtractiveAnswer, noRelevantAnswer } from "./extractive-synthesizer.js";
import type { Answer, AnswerOptions, AnswerSynthesizer, SynthesisStrategy } from "./types.js";

type CompletionStrategy = Extract<SynthesisStrategy, { kind: "completion" }>;

export function describeProviderFailure(err: unknown): string {
  return err instanceof ProviderError ? `${err.code}: ${err.message}` : `UNAVAILABLE: ${errorMessage(err)}`;
}

/**
 * Prompt-and-parse synthesis over a completion provider. Every failure mode
 * (timeout, transport error, empty, declined or unattributable output) degrades to the
 * extractive answer for that request.
 */
export class CompletionSynthesizer implements AnswerSynthesizer {
  readonly strategy = "completion";

  constructor(private readonly settings: CompletionStrategy) {}

  async answer(question: string, ranked: readonly ScoredChunk[], options?: AnswerOptions): Promise<Answer> {
    const relevanceSignal = options?.relevanceSignal ?? "lexical";
    if (ranked.length === 0) return noRelevantAnswer(relevanceSignal);

    const { prompt, sources } = buildAnswerPrompt({
      question,
      passages: ranked,
      tokenBudget: this.settings.promptTokenBudget,
    });
    const supplied = ranked.filter((scored) => sources.includes(scored.chunk));
    devDebug(`Prompt carries ${sources.length} passage(s), ~${estimatePromptTokens(prompt)} tokens`);
    const deadline = new Deadline(this.settings.timeoutMs, options?.signal);

    try {
      const raw = await deadline.race(
        this.settings.provider.complete(prompt, {
          maxTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
          signal: deadline.signal,
        }),
      );
      const text = raw.trim();
      if (text.length === 0) {
        throw new ProviderError("Provider returned an empty completion.", "MALFORMED_RESPONSE");
      }
      if (isDeclinedAnswer(text)) {
        throw new ProviderError("Provider declined to answer from the supplied passages.", "MALFORMED_RESPONSE");
      }
      const citations = attributeAnswer(text, supplied);
      if (citations.length === 0) {
        throw new ProviderError("Completion overlaps none of the supplied passages.", "MALFORMED_RESPONSE");
      }
      return { text, citations, strategy: "completion", relevanceSignal };
    } catch (err) {
      devWarn(`Completion synthesis via ${this.settings.provider.name} failed (${describeProviderFailure(err)}); answering extractively.`);
      return composeExtractiveAnswer(question, ranked, relevanceSignal);
    } finally {
      deadline.dispose();
    }
  }
}
