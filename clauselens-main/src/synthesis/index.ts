import { CompletionSynthesizer } from "./completion-synthesizer.js";
import { ExtractiveSynthesizer } from "./extractive-synthesizer.js";
import type { AnswerSynthesizer, SynthesisStrategy } from "./types.js";

export function createSynthesizer(strategy: SynthesisStrategy): AnswerSynthesizer {
  switch (strategy.kind) {
    case "completion":
      return new CompletionSynthesizer(strategy);
    case "extractive":
      return new ExtractiveSynthesizer();
  }
}

export { attributeAnswer } from "./attribution.js";
export { CompletionSynthesizer, describeProviderFailure } from "./completion-synthesizer.js";
export { Deadline } from "./deadline.js";
export { ExtractiveSynthesizer, composeExtractiveAnswer, noRelevantAnswer } from "./extractive-synthesizer.js";
export { NO_RELEVANT_INFORMATION } from "./types.js";
export type { Answer, AnswerOptions, AnswerStrategyName, AnswerSynthesizer, CompletionSettings, SynthesisStrategy } from "./types.js";
