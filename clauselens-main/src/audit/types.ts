import type { Citation } from "../citations/types.js";

export type Severity = "low" | "medium" | "high";

/** How a threshold rule normalizes its captured value before comparing. */
export type ThresholdMeasure = "days" | "years" | "amount";

export type ThresholdComparison = "below" | "above";

interface RuleBase {
  readonly id: string;
  readonly riskType: string;
  readonly severity: Severity;
  /** May reference `{value}` and `{threshold}` on threshold rules. */
  readonly description: string;
}

export interface PatternRule extends RuleBase {
  readonly kind: "pattern";
  readonly pattern: RegExp;
}

export interface ThresholdRule extends RuleBase {
  readonly kind: "threshold";
  readonly pattern: RegExp;
  readonly measure: ThresholdMeasure;
  readonly comparison: ThresholdComparison;
  readonly policy: string;
}

/** Document-level: fires when `anchor` matches somewhere and `pattern` nowhere. */
export interface AbsenceRule extends RuleBase {
  readonly kind: "absence";
  readonly anchor: RegExp;
  readonly pattern: RegExp;
}

export type RiskRule = PatternRule | ThresholdRule | AbsenceRule;

export interface PolicyEntry {
  readonly value: number;
  readonly description: string;
}

export interface RuleLibrary {
  readonly version: string;
  readonly policy: Readonly<Record<string, PolicyEntry>>;
  readonly rules: readonly RiskRule[];
}

export type PolicyOverrides = Readonly<Record<string, number | undefined>>;

export interface Finding {
  readonly ruleId: string;
  readonly riskType: string;
  readonly severity: Severity;
  readonly description: string;
  readonly documentId: string;
  readonly evidence: Citation;
}
