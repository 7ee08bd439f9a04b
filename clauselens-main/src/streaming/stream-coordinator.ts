import { ProviderError } from "../core/errors.js";
import { buildAnswerPrompt } from "../prompt/builder.js";
import type { RelevanceSignal, ScoredChunk } from "../retrieval/types.js";
import { devDebug, devWarn } from "../shared/index.js";
import { attributeAnswer, isDeclinedAnswer } from "../synthesis/attribution.js";
import { describeProviderFailure } from "../synthesis/completion-synthesizer.js";
import { Deadline } from "../synthesis/deadline.js";
import { composeExtractiveAnswer, noRelevantAnswer } from "../synthesis/extractive-synthesizer.js";
import type { Answer, SynthesisStrategy } from "../synthesis/types.js";
import { AnswerStream } from "./answer-stream.js";
import type { Channel } from "./channel.js";
import type { StreamEvent, StreamOptions } from "./types.js";

type CompletionStrategy = Extract<SynthesisStrategy, { kind: "completion" }>;

const FRAGMENT_PATTERN = /^\s*\S+\s*|\S+\s*/g;

/** Whitespace-delimited pieces whose concatenation is exactly `text`. */
export function splitFragments(text: string): string[] {
  const pieces = text.match(FRAGMENT_PATTERN) ?? [];
  return pieces.length > 0 || text.length === 0 ? pieces : [text];
}

function emitAnswer(channel: Channel<StreamEvent>, answer: Answer): void {
  for (const text of splitFragments(answer.text)) {
    channel.push({ type: "fragment", text });
  }
  channel.push({ type: "citations", citations: answer.citations, strategy: answer.strategy });
}

export class StreamCoordinator {
  constructor(private readonly strategy: SynthesisStrategy) {}

  stream(question: string, ranked: readonly ScoredChunk[], options?: StreamOptions): AnswerStream {
    const relevanceSignal = options?.relevanceSignal ?? "lexical";
    return new AnswerStream((channel, signal) => this.produce(question, ranked, relevanceSignal, channel, signal), options?.signal);
  }

  private async produce(
    question: string,
    ranked: readonly ScoredChunk[],
    relevanceSignal: RelevanceSignal,
    channel: Channel<StreamEvent>,
    signal: AbortSignal,
  ): Promise<void> {
    if (ranked.length === 0) {
      emitAnswer(channel, noRelevantAnswer(relevanceSignal));
      return;
    }
    if (this.strategy.kind === "extractive") {
      emitAnswer(channel, composeExtractiveAnswer(question, ranked, relevanceSignal));
      return;
    }
    await this.produceCompletion(this.strategy, question, ranked, relevanceSignal, channel, signal);
  }

  private async produceCompletion(
    settings: CompletionStrategy,
    question: string,
    ranked: readonly ScoredChunk[],
    relevanceSignal: RelevanceSignal,
    channel: Channel<StreamEvent>,
    signal: AbortSignal,
  ): Promise<void> {
    const { prompt, sources } = buildAnswerPrompt({
      question,
      passages: ranked,
      tokenBudget: settings.promptTokenBudget,
    });
    const supplied = ranked.filter((scored) => sources.includes(scored.chunk));
    const deadline = new Deadline(settings.timeoutMs, signal);
    let iterator: AsyncIterator<string> | null = null;
    let text = "";

    try {
      iterator = settings.provider
        .completeStream(prompt, {
          maxTokens: settings.maxTokens,
          temperature: settings.temperature,
          signal: deadline.signal,
        })
        [Symbol.asyncIterator]();

      for (;;) {
        const step = await deadline.race(iterator.next());
        if (step.done) break;
        if (step.value.length === 0) continue;
        deadline.arm();
        text += step.value;
        channel.push({ type: "fragment", text: step.value });
      }

      if (text.trim().length === 0) {
        throw new ProviderError("Provider streamed no text.", "MALFORMED_RESPONSE");
      }
      if (isDeclinedAnswer(text)) {
        throw new ProviderError("Provider declined to answer from the supplied passages.", "MALFORMED_RESPONSE");
      }
      const citations = attributeAnswer(text, supplied);
      if (citations.length === 0) {
        throw new ProviderError("Streamed answer overlaps none of the supplied passages.", "MALFORMED_RESPONSE");
      }
      channel.push({ type: "citations", citations, strategy: "completion" });
    } catch (err) {
      if (signal.aborted) {
        devDebug("Answer stream cancelled by consumer.");
        return;
      }
      devWarn(`Streaming via ${settings.provider.name} failed (${describeProviderFailure(err)}).`);
      this.recover(question, ranked, supplied, relevanceSignal, text, channel);
    } finally {
      deadline.dispose();
      iterator?.return?.().catch((err: unknown) => devDebug(`Provider stream did not close cleanly: ${describeProviderFailure(err)}`));
    }
  }

  /** Falls back without retracting fragments already sent. */
  private recover(
    question: string,
    ranked: readonly ScoredChunk[],
    supplied: readonly ScoredChunk[],
    relevanceSignal: RelevanceSignal,
    partial: string,
    channel: Channel<StreamEvent>,
  ): void {
    if (partial.length === 0) {
      emitAnswer(channel, composeExtractiveAnswer(question, ranked, relevanceSignal));
      return;
    }
    const citations = isDeclinedAnswer(partial) ? [] : attributeAnswer(partial, supplied);
    if (citations.length > 0) {
      channel.push({ type: "citations", citations, strategy: "completion" });
      return;
    }
    const fallback = composeExtractiveAnswer(question, ranked, relevanceSignal);
    channel.push({ type: "fragment", text: "\n\n" });
    emitAnswer(channel, fallback);
  }
}
