import type { Citation } from "../citations/types.js";
import type { RelevanceSignal } from "../retrieval/types.js";
import type { AnswerStrategyName } from "../synthesis/types.js";

export interface FragmentEvent {
  type: "fragment";
  text: string;
}

/** Always the last event of a stream that ran to completion. */
export interface CitationsEvent {
  type: "citations";
  citations: Citation[];
  strategy: AnswerStrategyName;
}

export type StreamEvent = FragmentEvent | CitationsEvent;

export interface StreamOptions {
  signal?: AbortSignal;
  relevanceSignal?: RelevanceSignal;
}
