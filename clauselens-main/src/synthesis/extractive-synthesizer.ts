import { resolveCitation } from "../citations/citation-resolver.js";
import { sentenceSpans } from "../citations/sentences.js";
import type { Citation } from "../citations/types.js";
import { findAmount, findDate } from "../extraction/normalizers.js";
import { compareScored, queryTerms } from "../retrieval/relevance-scorer.js";
import { tokenize } from "../retrieval/tokenizer.js";
import type { Chunk, RelevanceSignal, ScoredChunk } from "../retrieval/types.js";
import { NO_RELEVANT_INFORMATION } from "./types.js";
import type { Answer, AnswerOptions, AnswerSynthesizer } from "./types.js";

const DATE_QUESTION = /\b(?:when|dates?|dated|effective|commence\w*|starts?|expir\w*|deadline)\b/i;
const AMOUNT_QUESTION = /\b(?:how\s+much|amounts?|fees?|price|costs?|pay|payments?|paid|cap|compensation|rent|sum)\b/i;

type QuestionKind = "date" | "amount" | "general";

interface Excerpt {
  citation: Citation;
  lead: string;
}

function classifyQuestion(question: string): QuestionKind {
  if (DATE_QUESTION.test(question)) return "date";
  if (AMOUNT_QUESTION.test(question)) return "amount";
  return "general";
}

function overlap(terms: readonly string[], text: string): number {
  const present = new Set(tokenize(text));
  return terms.reduce((count, term) => (present.has(term) ? count + 1 : count), 0);
}

/** Sentences of the chunk, best term overlap first, ties in reading order. */
function rankSentences(chunk: Chunk, terms: readonly string[]): { start: number; end: number; overlap: number }[] {
  return sentenceSpans(chunk.text)
    .map((span) => ({ start: span.start, end: span.end, overlap: overlap(terms, chunk.text.slice(span.start, span.end)) }))
    .sort((a, b) => b.overlap - a.overlap || a.start - b.start);
}

/** First sentence, in ranked order, that carries the kind of value the question asks for. */
function findTypedExcerpt(kind: "date" | "amount", ranked: readonly ScoredChunk[], terms: readonly string[]): Excerpt | null {
  for (const { chunk } of ranked) {
    for (const span of rankSentences(chunk, terms)) {
      const citation = resolveCitation(chunk, { start: span.start, end: span.end });
      if (kind === "date") {
        const date = findDate(citation.textSnippet);
        if (date) return { citation, lead: `the relevant date is ${date.iso}` };
      } else {
        const amount = findAmount(citation.textSnippet);
        if (amount) return { citation, lead: `the relevant amount is ${amount.text}` };
      }
    }
  }
  return null;
}

function bestExcerpt(chunk: Chunk, terms: readonly string[]): Excerpt {
  const best = rankSentences(chunk, terms)[0];
  const citation =
    best && best.overlap > 0 ? resolveCitation(chunk, { start: best.start, end: best.end }) : resolveCitation(chunk);
  return { citation, lead: "the most relevant passage reads" };
}

export function noRelevantAnswer(relevanceSignal: RelevanceSignal): Answer {
  return { text: NO_RELEVANT_INFORMATION, citations: [], strategy: "none", relevanceSignal };
}

/**
 * Deterministic, provider-free answer: quotes the best sentence of the top
 * chunk verbatim. Date and amount questions lead with the normalized value
 * when a ranked sentence carries one.
 */
export function composeExtractiveAnswer(
  question: string,
  ranked: readonly ScoredChunk[],
  relevanceSignal: RelevanceSignal = "lexical",
): Answer {
  const ordered = [...ranked].sort(compareScored);
  const top = ordered[0];
  if (!top) return noRelevantAnswer(relevanceSignal);

  const terms = queryTerms(question);
  const kind = classifyQuestion(question);
  const excerpt = (kind === "general" ? null : findTypedExcerpt(kind, ordered, terms)) ?? bestExcerpt(top.chunk, terms);

  return {
    text: `Based on the document, ${excerpt.lead}: "${excerpt.citation.textSnippet}"`,
    citations: [excerpt.citation],
    strategy: "extractive",
    relevanceSignal,
  };
}

export class ExtractiveSynthesizer implements AnswerSynthesizer {
  readonly strategy = "extractive";

  async answer(question: string, ranked: readonly ScoredChunk[], options?: AnswerOptions): Promise<Answer> {
    return composeExtractiveAnswer(question, ranked, options?.relevanceSignal);
  }
}
