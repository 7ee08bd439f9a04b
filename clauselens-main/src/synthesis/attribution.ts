import { resolveCitation } from "../citations/citation-resolver.js";
import { sentenceSpans } from "../citations/sentences.js";
import type { Citation } from "../citations/types.js";
import { NOT_FOUND_REPLY } from "../prompt/builder.js";
import { compareScored } from "../retrieval/relevance-scorer.js";
import { contentTerms, tokenize } from "../retrieval/tokenizer.js";
import type { Chunk, ScoredChunk } from "../retrieval/types.js";

const MIN_SHARED_TERMS = 3;

function normalizeReply(text: string): string {
  return text
    .trim()
    .replace(/^["'\u201c]+|["'\u201d]+$/g, "")
    .replace(/\.+$/, "")
    .replace(/\s+/g, " ")
    .toLowerCase();
}

const DECLINED = normalizeReply(NOT_FOUND_REPLY);

/** True when the model gave the instructed not-found reply instead of an answer. */
export function isDeclinedAnswer(text: string): boolean {
  return normalizeReply(text) === DECLINED;
}

function sharedCount(terms: readonly string[], text: string): number {
  const present = new Set(tokenize(text));
  return terms.reduce((count, term) => (present.has(term) ? count + 1 : count), 0);
}

/** The sentence of `chunk` sharing the most terms with the answer; whole sentences when none does. */
function citeBestSentence(chunk: Chunk, terms: readonly string[]): Citation {
  let best: { start: number; end: number } | null = null;
  let bestShared = 0;
  for (const span of sentenceSpans(chunk.text)) {
    const shared = sharedCount(terms, chunk.text.slice(span.start, span.end));
    if (shared > bestShared) {
      best = span;
      bestShared = shared;
    }
  }
  return best ? resolveCitation(chunk, { start: best.start, end: best.end }) : resolveCitation(chunk);
}

/**
 * Post-hoc attribution of free text to the chunks it was generated from.
 * A chunk is cited when it shares at least `min(3, |answer terms|)` distinct
 * content terms with the answer; the model's own references are never trusted.
 */
export function attributeAnswer(answerText: string, sources: readonly ScoredChunk[]): Citation[] {
  const terms = contentTerms(answerText);
  if (terms.length === 0) return [];
  const needed = Math.min(MIN_SHARED_TERMS, terms.length);

  const citations: Citation[] = [];
  const seen = new Set<string>();
  for (const { chunk } of [...sources].sort(compareScored)) {
    if (sharedCount(terms, chunk.text) < needed) continue;
    const citation = citeBestSentence(chunk, terms);
    const key = `${citation.documentId}:${citation.page}:${citation.charRange[0]}:${citation.charRange[1]}`;
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push(citation);
  }
  return citations;
}
