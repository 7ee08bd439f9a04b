import type { SentenceSpan } from "./types.js";

const TERMINATORS = new Set([".", "!", "?"]);
const CLOSERS = new Set(['"', "'", ")", "]", "”", "’"]);
const ABBREVIATIONS = new Set([
  "art",
  "co",
  "corp",
  "dr",
  "e.g",
  "etc",
  "i.e",
  "inc",
  "jr",
  "ltd",
  "mr",
  "mrs",
  "ms",
  "no",
  "para",
  "sec",
  "sr",
  "st",
  "vs",
]);

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\t" || ch === "\r" || ch === "\f" || ch === "\u00a0";
}

/** A lowercase word or another initial such as "B." follows. */
function continuesAfterInitial(text: string, dotIndex: number): boolean {
  let cursor = dotIndex + 1;
  while (cursor < text.length && isWhitespace(text.charAt(cursor))) cursor++;
  const next = text.slice(cursor, cursor + 2);
  return /^[a-z]/.test(next) || /^[A-Z]\./.test(next);
}

function isAbbreviation(text: string, dotIndex: number): boolean {
  const before = text.slice(Math.max(0, dotIndex - 12), dotIndex);
  const word = /([A-Za-z][A-Za-z.]*)$/.exec(before)?.[1];
  if (!word) return false;
  if (word.length === 1 && word === word.toUpperCase()) return continuesAfterInitial(text, dotIndex);
  return ABBREVIATIONS.has(word.toLowerCase());
}

/** Index just past a terminator (and any closing quotes) at `index`, or -1. */
function terminatorEnd(text: string, index: number): number {
  const ch = text.charAt(index);
  if (!TERMINATORS.has(ch)) return -1;
  let end = index + 1;
  while (end < text.length && CLOSERS.has(text.charAt(end))) end++;
  if (end < text.length && !isWhitespace(text.charAt(end))) return -1;
  if (ch === "." && isAbbreviation(text, index)) return -1;
  return end;
}

function isParagraphBreak(text: string, index: number): boolean {
  if (text.charAt(index) !== "\n") return false;
  for (let cursor = index + 1; cursor < text.length; cursor++) {
    const ch = text.charAt(cursor);
    if (ch === "\n") return true;
    if (!isWhitespace(ch)) return false;
  }
  return false;
}

function pushTrimmed(spans: SentenceSpan[], text: string, start: number, end: number, terminated: boolean): void {
  let s = start;
  let e = end;
  while (s < e && isWhitespace(text.charAt(s))) s++;
  while (e > s && isWhitespace(text.charAt(e - 1))) e--;
  if (e > s) spans.push({ start: s, end: e, terminated });
}

/**
 * Punctuation-heuristic sentence segmentation. Returned spans are trimmed,
 * non-empty and in order; blank lines also end a sentence.
 */
export function sentenceSpans(text: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  let segmentStart = 0;
  let index = 0;

  while (index < text.length) {
    const end = terminatorEnd(text, index);
    if (end !== -1) {
      pushTrimmed(spans, text, segmentStart, end, true);
      segmentStart = end;
      index = end;
      continue;
    }
    if (isParagraphBreak(text, index)) {
      pushTrimmed(spans, text, segmentStart, index, true);
      segmentStart = index + 1;
    }
    index++;
  }

  pushTrimmed(spans, text, segmentStart, text.length, false);
  return spans;
}
