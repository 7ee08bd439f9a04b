/**
 * Verifiable pointer back to source text.
 * Invariant: `textSnippet === pageText.slice(charRange[0], charRange[1])`.
 */
export interface Citation {
  readonly documentId: string;
  readonly page: number;
  readonly charRange: readonly [number, number];
  readonly textSnippet: string;
}

/** Half-open range relative to a chunk's text. */
export interface ChunkSpan {
  start: number;
  end: number;
}

export interface SentenceSpan extends ChunkSpan {
  /** False for a trailing run of text with no terminator after it. */
  terminated: boolean;
}

export type CitationBoundary = "exact" | "sentence";
