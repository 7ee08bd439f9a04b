import { CitationRangeError } from "../core/errors.js";
import type { Chunk } from "../retrieval/types.js";
import { sentenceSpans } from "./sentences.js";
import type { ChunkSpan, Citation, CitationBoundary } from "./types.js";

export interface ResolveOptions {
  boundary?: CitationBoundary;
}

/**
 * The single constructor of Citation values.
 *
 * `span` is relative to the chunk text. Without a span the chunk is narrowed
 * to the whole sentences it contains, falling back to the full chunk when no
 * sentence is detectable. The snippet is always sliced from the chunk, so it
 * is verbatim page text at the returned absolute range.
 */
export function resolveCitation(chunk: Chunk, span?: ChunkSpan, options?: ResolveOptions): Citation {
  let range: ChunkSpan;
  if (span) {
    assertWithinChunk(chunk, span);
    range = options?.boundary === "sentence" ? expandToSentence(chunk.text, span) : { ...span };
  } else {
    range = wholeSentenceRange(chunk);
  }

  const trimmed = trimRange(chunk.text, range);
  return Object.freeze({
    documentId: chunk.documentId,
    page: chunk.page,
    charRange: Object.freeze([chunk.startOffset + trimmed.start, chunk.startOffset + trimmed.end] as const),
    textSnippet: chunk.text.slice(trimmed.start, trimmed.end),
  });
}

/** Round-trip check of a citation against the page text it points into. */
export function verifyCitation(citation: Citation, pageText: string): boolean {
  const [start, end] = citation.charRange;
  if (start < 0 || end > pageText.length || start >= end) return false;
  return pageText.slice(start, end) === citation.textSnippet;
}

export function expandToSentence(text: string, span: ChunkSpan): ChunkSpan {
  let start = span.start;
  let end = span.end;
  for (const sentence of sentenceSpans(text)) {
    if (sentence.end <= span.start || sentence.start >= span.end) continue;
    start = Math.min(start, sentence.start);
    end = Math.max(end, sentence.end);
  }
  return { start, end };
}

function wholeSentenceRange(chunk: Chunk): ChunkSpan {
  const spans = sentenceSpans(chunk.text);
  let first = 0;
  let last = spans.length - 1;

  // A chunk that does not open its page most likely starts mid-sentence.
  if (chunk.startOffset > 0 && spans.length > 1) first = 1;
  const trailing = spans[last];
  if (trailing && !trailing.terminated) last--;

  const head = spans[first];
  const tail = spans[last];
  if (!head || !tail || last < first) {
    return { start: 0, end: chunk.text.length };
  }
  return { start: head.start, end: tail.end };
}

function trimRange(text: string, range: ChunkSpan): ChunkSpan {
  let start = range.start;
  let end = range.end;
  while (start < end && /\s/.test(text.charAt(start))) start++;
  while (end > start && /\s/.test(text.charAt(end - 1))) end--;
  return end > start ? { start, end } : range;
}

function assertWithinChunk(chunk: Chunk, span: ChunkSpan): void {
  const valid =
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.start < span.end &&
    span.end <= chunk.text.length;
  if (!valid) {
    throw new CitationRangeError(
      `Span [${span.start}, ${span.end}) is outside chunk ${chunk.id} (length ${chunk.text.length}).`,
    );
  }
}
