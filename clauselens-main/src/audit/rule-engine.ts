import { resolveCitation } from "../citations/citation-resolver.js";
import { compareChunkPosition } from "../retrieval/relevance-scorer.js";
import type { Chunk } from "../retrieval/types.js";
import { formatQuantity, normalizeQuantity } from "./quantities.js";
import type { AbsenceRule, Finding, RiskRule, RuleLibrary, Severity, ThresholdRule } from "./types.js";

const SEVERITY_RANK: Readonly<Record<Severity, number>> = { high: 3, medium: 2, low: 1 };

interface Candidate {
  key: string;
  finding: Finding;
}

function compareText(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.evidence.page - b.evidence.page ||
    a.evidence.charRange[0] - b.evidence.charRange[0] ||
    compareText(a.documentId, b.documentId) ||
    compareText(a.riskType, b.riskType) ||
    compareText(a.ruleId, b.ruleId) ||
    a.evidence.charRange[1] - b.evidence.charRange[1]
  );
}

function width(finding: Finding): number {
  return finding.evidence.charRange[1] - finding.evidence.charRange[0];
}

function firstMatch(pattern: RegExp, text: string): RegExpMatchArray | null {
  for (const match of text.matchAll(pattern)) {
    if (match[0].length > 0) return match;
  }
  return null;
}

/**
 * Evaluates a rule library against the chunks of one or more documents.
 * Pure and synchronous; the same chunks always yield byte-identical findings.
 */
export class RiskRuleEngine {
  constructor(private readonly library: RuleLibrary) {}

  get version(): string {
    return this.library.version;
  }

  audit(chunks: readonly Chunk[]): Finding[] {
    const ordered = [...chunks].sort(compareChunkPosition);
    const kept = new Map<string, Finding>();
    const keep = (candidate: Candidate): void => {
      const existing = kept.get(candidate.key);
      if (!existing || width(candidate.finding) > width(existing)) {
        kept.set(candidate.key, candidate.finding);
      }
    };

    for (const chunk of ordered) {
      for (const rule of this.library.rules) {
        if (rule.kind === "absence") continue;
        for (const candidate of this.matchRule(rule, chunk)) keep(candidate);
      }
    }

    const byDocument = new Map<string, Chunk[]>();
    for (const chunk of ordered) {
      const list = byDocument.get(chunk.documentId) ?? [];
      list.push(chunk);
      byDocument.set(chunk.documentId, list);
    }
    for (const documentChunks of byDocument.values()) {
      for (const rule of this.library.rules) {
        if (rule.kind !== "absence") continue;
        const candidate = this.checkAbsence(rule, documentChunks);
        if (candidate) keep(candidate);
      }
    }

    return [...kept.values()].sort(compareFindings);
  }

  private *matchRule(rule: Exclude<RiskRule, AbsenceRule>, chunk: Chunk): Generator<Candidate> {
    for (const match of chunk.text.matchAll(rule.pattern)) {
      const start = match.index;
      if (start === undefined || match[0].length === 0) continue;

      let description = rule.description;
      if (rule.kind === "threshold") {
        const interpolated = this.evaluateThreshold(rule, match);
        if (interpolated === null) continue;
        description = interpolated;
      }

      const evidence = resolveCitation(chunk, { start, end: start + match[0].length }, { boundary: "sentence" });
      yield {
        key: `${rule.id}|${chunk.documentId}|${chunk.page}|${chunk.startOffset + start}`,
        finding: Object.freeze({
          ruleId: rule.id,
          riskType: rule.riskType,
          severity: rule.severity,
          description,
          documentId: chunk.documentId,
          evidence,
        }),
      };
    }
  }

  /** Returns the interpolated description when the rule fires, else null. */
  private evaluateThreshold(rule: ThresholdRule, match: RegExpMatchArray): string | null {
    const raw = match.groups?.["value"];
    if (raw === undefined) return null;
    const value = normalizeQuantity(rule.measure, raw, match.groups?.["unit"]);
    const threshold = this.library.policy[rule.policy]?.value;
    if (!value || threshold === undefined) return null;

    const fires = rule.comparison === "below" ? value.lessThan(threshold) : value.greaterThan(threshold);
    if (!fires) return null;
    return rule.description
      .replaceAll("{value}", formatQuantity(value))
      .replaceAll("{threshold}", formatQuantity(threshold));
  }

  private checkAbsence(rule: AbsenceRule, chunks: readonly Chunk[]): Candidate | null {
    if (chunks.some((chunk) => firstMatch(rule.pattern, chunk.text) !== null)) return null;

    for (const chunk of chunks) {
      const anchor = firstMatch(rule.anchor, chunk.text);
      if (!anchor || anchor.index === undefined) continue;
      const start = anchor.index;
      const evidence = resolveCitation(chunk, { start, end: start + anchor[0].length }, { boundary: "sentence" });
      return {
        key: `${rule.id}|${chunk.documentId}`,
        finding: Object.freeze({
          ruleId: rule.id,
          riskType: rule.riskType,
          severity: rule.severity,
          description: rule.description,
          documentId: chunk.documentId,
          evidence,
        }),
      };
    }
    return null;
  }
}
