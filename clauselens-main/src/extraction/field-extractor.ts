import { parseAmount, parseCount } from "../audit/quantities.js";
import { resolveCitation } from "../citations/citation-resolver.js";
import type { Citation } from "../citations/types.js";
import { compareChunkPosition } from "../retrieval/relevance-scorer.js";
import type { Chunk } from "../retrieval/types.js";
import { findDate } from "./normalizers.js";

export interface ExtractedField {
  /** Verbatim page text; always equal to `citation.textSnippet`. */
  value: string;
  normalized?: string;
  citation: Citation;
}

export interface ContractFields {
  parties: ExtractedField[];
  effectiveDate: ExtractedField | null;
  term: ExtractedField | null;
  governingLaw: ExtractedField | null;
  paymentTerms: ExtractedField | null;
  termination: ExtractedField | null;
  autoRenewal: ExtractedField | null;
  confidentiality: ExtractedField | null;
  indemnity: ExtractedField | null;
  liabilityCap: ExtractedField | null;
}

type SingleFieldKey = Exclude<keyof ContractFields, "parties" | "effectiveDate">;

interface FieldSpec {
  patterns: RegExp[];
  normalize?: (value: string) => string | undefined;
}

const COUNT = "\\d+|one|two|three|four|five|six|seven|eight|nine|ten|twelve|fifteen|twenty-four|thirty-six|thirty|forty-five|sixty|ninety";
const AMOUNT = "(?:US)?\\$\\s?\\d[\\d,]*(?:\\.\\d+)?(?:\\s*(?:thousand|million|billion))?|\\d[\\d,]*(?:\\.\\d+)?\\s*(?:USD|dollars)";

const PARTY_PATTERN =
  /\b[Bb]etween\s+(?<first>[A-Z][\w&.,'\- ]+?)\s*(?:\([^)]*\)\s*)?,?\s+and\s+(?<second>[A-Z][\w&.'\- ]+?)(?=\s*\(|[,.;\n]|$)/dg;
const DATE_CUE = /\b(?:effective|dated|commenc\w*)\b/gi;
const DATE_LOOKAHEAD_CHARS = 60;

function normalizeMonths(value: string): string | undefined {
  const match = new RegExp(`(${COUNT})\\s*(?:\\(\\d+\\)\\s*)?-?\\s*(years?|months?)`, "i").exec(value);
  const count = match?.[1] ? parseCount(match[1]) : null;
  if (!count || !match?.[2]) return undefined;
  const months = match[2].toLowerCase().startsWith("year") ? count.times(12) : count;
  return `${months.toString()} months`;
}

function normalizeDays(value: string): string | undefined {
  const match = new RegExp(`(${COUNT})\\s*(?:\\(\\d+\\)\\s*)?days?`, "i").exec(value);
  const count = match?.[1] ? parseCount(match[1]) : null;
  return count ? `${count.toString()} days` : undefined;
}

const FIELD_SPECS: Readonly<Record<SingleFieldKey, FieldSpec>> = {
  term: {
    patterns: [
      new RegExp(`\\bterm\\b[^.;]{0,60}?\\b(?:of|for|is)\\s+(?<value>(?:${COUNT})\\s*(?:\\(\\d+\\)\\s*)?-?\\s*(?:years?|months?))`, "dgi"),
    ],
    normalize: normalizeMonths,
  },
  governingLaw: {
    patterns: [
      /\bgoverned\s+by\s+(?:and\s+construed\s+in\s+accordance\s+with\s+)?(?:the\s+)?laws?\s+of\s+(?:the\s+)?(?<value>[A-Za-z][A-Za-z ]+?)(?=\s*[,.;\n]|\s+without\b|$)/dgi,
      /\bgoverning\s+law\s*[:.\-]\s*(?<value>[A-Za-z][^.;\n]+)/dgi,
    ],
  },
  paymentTerms: {
    patterns: [
      new RegExp(`\\b(?:payments?|invoices?|fees?)\\b[^.;]{0,80}?\\b(?:within|net)\\s+(?<value>(?:${COUNT})\\s*(?:\\(\\d+\\)\\s*)?days?)`, "dgi"),
    ],
    normalize: normalizeDays,
  },
  termination: {
    patterns: [/(?<value>\bmay\s+terminate\s+[^.;]{5,200})/dgi],
  },
  autoRenewal: {
    patterns: [/(?<value>\b(?:auto(?:matic(?:ally)?)?[- ]?renew(?:s|ed|al)?|renew(?:s|ed)?\s+automatically)\b[^.;]{0,200})/dgi],
  },
  confidentiality: {
    patterns: [
      /(?<value>\bconfidential\s+information\s+(?:means|shall\s+mean|includes)\s+[^.;]{5,300})/dgi,
      /(?<value>\b(?:shall|will)\s+(?:keep|hold|maintain)\b[^.;]{0,60}?\bconfidential\b[^.;]{0,200})/dgi,
    ],
  },
  indemnity: {
    patterns: [/(?<value>\b(?:shall|will|agrees?\s+to)\s+(?:defend,\s+)?indemnify\b[^.;]{0,250})/dgi],
  },
  liabilityCap: {
    patterns: [
      new RegExp(
        `\\b(?:liability|damages)\\b[^.;]{0,120}?\\b(?:shall\\s+not\\s+exceed|not\\s+to\\s+exceed|limited\\s+to|capped\\s+at)\\s+(?:the\\s+(?:sum|amount)\\s+of\\s+)?(?<value>${AMOUNT})`,
        "dgi",
      ),
    ],
    normalize: (value) => parseAmount(value)?.toFixed(2),
  },
};

function toField(chunk: Chunk, start: number, end: number, normalize?: (value: string) => string | undefined): ExtractedField | null {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(chunk.text.charAt(s))) s++;
  while (e > s && /[\s,]/.test(chunk.text.charAt(e - 1))) e--;
  if (e <= s) return null;

  const citation = resolveCitation(chunk, { start: s, end: e });
  const normalized = normalize?.(citation.textSnippet);
  return {
    value: citation.textSnippet,
    citation,
    ...(normalized !== undefined ? { normalized } : {}),
  };
}

function groupSpan(match: RegExpMatchArray, group: string): [number, number] | undefined {
  return match.indices?.groups?.[group];
}

function extractSingle(chunks: readonly Chunk[], spec: FieldSpec): ExtractedField | null {
  for (const pattern of spec.patterns) {
    for (const chunk of chunks) {
      for (const match of chunk.text.matchAll(pattern)) {
        const span = groupSpan(match, "value");
        if (!span) continue;
        const field = toField(chunk, span[0], span[1], spec.normalize);
        if (field) return field;
      }
    }
  }
  return null;
}

/** Legal-form suffixes and descriptors after the first comma are not part of the name. */
function trimPartyEnd(text: string, start: number, end: number): number {
  const comma = text.indexOf(",", start);
  return comma !== -1 && comma < end ? comma : end;
}

function extractParties(chunks: readonly Chunk[]): ExtractedField[] {
  const parties: ExtractedField[] = [];
  const seen = new Set<string>();
  for (const chunk of chunks) {
    for (const match of chunk.text.matchAll(PARTY_PATTERN)) {
      for (const group of ["first", "second"]) {
        const span = groupSpan(match, group);
        if (!span) continue;
        const field = toField(chunk, span[0], trimPartyEnd(chunk.text, span[0], span[1]));
        if (!field || field.value.length < 3) continue;
        const key = field.value.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        parties.push(field);
      }
    }
    if (parties.length > 0) break;
  }
  return parties;
}

function extractEffectiveDate(chunks: readonly Chunk[]): ExtractedField | null {
  for (const chunk of chunks) {
    for (const cue of chunk.text.matchAll(DATE_CUE)) {
      if (cue.index === undefined) continue;
      const windowStart = cue.index + cue[0].length;
      const window = chunk.text.slice(windowStart, windowStart + DATE_LOOKAHEAD_CHARS);
      const sentenceEnd = window.search(/[.;](?:\s|$)/);
      const date = findDate(sentenceEnd === -1 ? window : window.slice(0, sentenceEnd + 1));
      if (!date) continue;
      const field = toField(chunk, windowStart + date.start, windowStart + date.end);
      if (field) return { ...field, normalized: date.iso };
    }
  }
  return null;
}

/**
 * Pulls the common commercial terms out of a document's chunks. Every value
 * is cut from page text through the citation resolver, so nothing is
 * paraphrased; a field that cannot be located is null.
 */
export function extractContractFields(chunks: readonly Chunk[]): ContractFields {
  const ordered = [...chunks].sort(compareChunkPosition);
  return {
    parties: extractParties(ordered),
    effectiveDate: extractEffectiveDate(ordered),
    term: extractSingle(ordered, FIELD_SPECS.term),
    governingLaw: extractSingle(ordered, FIELD_SPECS.governingLaw),
    paymentTerms: extractSingle(ordered, FIELD_SPECS.paymentTerms),
    termination: extractSingle(ordered, FIELD_SPECS.termination),
    autoRenewal: extractSingle(ordered, FIELD_SPECS.autoRenewal),
    confidentiality: extractSingle(ordered, FIELD_SPECS.confidentiality),
    indemnity: extractSingle(ordered, FIELD_SPECS.indemnity),
    liabilityCap: extractSingle(ordered, FIELD_SPECS.liabilityCap),
  };
}
