/**
 * A bounded, position-tracked substring of one page.
 * Invariant: `pageText.slice(startOffset, endOffset) === text`.
 */
export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly page: number;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly text: string;
}

export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

export type RelevanceSignal = "lexical" | "none";

export interface RankingResult {
  ranked: ScoredChunk[];
  signal: RelevanceSignal;
}

export interface ChunkerOptions {
  chunkSize?: number;
  overlapRatio?: number;
}

export interface ScorerOptions {
  topK?: number;
  relevanceFloor?: number;
  proximityWindow?: number;
}
