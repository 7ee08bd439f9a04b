import { STOPWORDS, tokenize } from "./tokenizer.js";
import type { Chunk, RankingResult, ScoredChunk, ScorerOptions } from "./types.js";

export const DEFAULT_TOP_K = 5;
export const DEFAULT_RELEVANCE_FLOOR = 0;
export const DEFAULT_PROXIMITY_WINDOW = 8;
const PROXIMITY_BONUS = 0.5;

interface ChunkProfile {
  chunk: Chunk;
  termFrequency: Map<string, number>;
  tokens: string[];
}

/** Deterministic ordering for equal scores: (page, startOffset, documentId). */
export function compareChunkPosition(a: Chunk, b: Chunk): number {
  if (a.page !== b.page) return a.page - b.page;
  if (a.startOffset !== b.startOffset) return a.startOffset - b.startOffset;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.endOffset - b.endOffset;
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareChunkPosition(a.chunk, b.chunk);
}

export function queryTerms(query: string): string[] {
  const seen = new Set<string>();
  for (const token of tokenize(query)) {
    if (!STOPWORDS.has(token)) seen.add(token);
  }
  return [...seen].sort();
}

/**
 * Ranks chunks by term-frequency overlap weighted by inverse document
 * frequency over the supplied chunk set, plus a proximity bonus when distinct
 * query terms occur close together. Chunks at or below the relevance floor are
 * dropped; the result is never padded.
 */
export function scoreChunks(query: string, chunks: readonly Chunk[], options?: ScorerOptions): RankingResult {
  const topK = Math.max(1, Math.floor(options?.topK ?? DEFAULT_TOP_K));
  const floor = options?.relevanceFloor ?? DEFAULT_RELEVANCE_FLOOR;
  const window = Math.max(1, options?.proximityWindow ?? DEFAULT_PROXIMITY_WINDOW);

  const terms = queryTerms(query);
  if (terms.length === 0) {
    const inOrder = [...chunks].sort(compareChunkPosition).slice(0, topK);
    return {
      ranked: inOrder.map((chunk) => ({ chunk, score: 0 })),
      signal: "none",
    };
  }

  const profiles = chunks.map(profileChunk);
  const idf = inverseDocumentFrequency(terms, profiles);

  const scored: ScoredChunk[] = [];
  for (const profile of profiles) {
    const score = lexicalScore(terms, profile, idf) + proximityBonus(terms, profile.tokens, window);
    if (score > floor) {
      scored.push({ chunk: profile.chunk, score });
    }
  }

  scored.sort(compareScored);
  return { ranked: scored.slice(0, topK), signal: "lexical" };
}

function profileChunk(chunk: Chunk): ChunkProfile {
  const tokens = tokenize(chunk.text);
  const termFrequency = new Map<string, number>();
  for (const token of tokens) {
    termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
  }
  return { chunk, termFrequency, tokens };
}

function inverseDocumentFrequency(terms: string[], profiles: ChunkProfile[]): Map<string, number> {
  const total = profiles.length;
  const idf = new Map<string, number>();
  for (const term of terms) {
    let df = 0;
    for (const profile of profiles) {
      if (profile.termFrequency.has(term)) df++;
    }
    idf.set(term, Math.log(1 + (total - df + 0.5) / (df + 0.5)));
  }
  return idf;
}

function lexicalScore(terms: string[], profile: ChunkProfile, idf: Map<string, number>): number {
  let score = 0;
  for (const term of terms) {
    const tf = profile.termFrequency.get(term) ?? 0;
    if (tf === 0) continue;
    score += (1 + Math.log(tf)) * (idf.get(term) ?? 0);
  }
  return score;
}

function proximityBonus(terms: string[], tokens: string[], window: number): number {
  if (terms.length < 2) return 0;
  const termSet = new Set(terms);
  const hits: Array<{ term: string; position: number }> = [];
  tokens.forEach((token, position) => {
    if (termSet.has(token)) hits.push({ term: token, position });
  });

  let pairs = 0;
  for (let index = 1; index < hits.length; index++) {
    const previous = hits[index - 1];
    const current = hits[index];
    if (!previous || !current) continue;
    if (previous.term !== current.term && current.position - previous.position <= window) {
      pairs++;
    }
  }

  return PROXIMITY_BONUS * Math.min(pairs, terms.length - 1);
}
