import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { RuleLibraryError, errorMessage } from "../core/errors.js";
import { devLog } from "../shared/index.js";
import type {
  PolicyEntry,
  PolicyOverrides,
  RiskRule,
  RuleLibrary,
  Severity,
  ThresholdComparison,
  ThresholdMeasure,
} from "./types.js";

const thisDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(thisDir, "..", "..");
export const DEFAULT_RULES_PATH = resolve(projectRoot, "rules", "contract-risk-rules.json");

const SEVERITIES: readonly Severity[] = ["low", "medium", "high"];
const MEASURES: readonly ThresholdMeasure[] = ["days", "years", "amount"];
const COMPARISONS: readonly ThresholdComparison[] = ["below", "above"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === "string" && allowed.some((item) => item === value);
}

function requireString(entry: Record<string, unknown>, key: string, ruleId?: string): string {
  const value = entry[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new RuleLibraryError(`Field "${key}" must be a non-empty string.`, "INVALID_SHAPE", ruleId);
  }
  return value;
}

function compilePattern(source: string, ruleId: string, field: string): RegExp {
  try {
    return new RegExp(source, "gi");
  } catch (err) {
    throw new RuleLibraryError(`Field "${field}" is not a valid pattern: ${errorMessage(err)}`, "INVALID_PATTERN", ruleId);
  }
}

function parsePolicy(raw: unknown, overrides: PolicyOverrides): Record<string, PolicyEntry> {
  if (!isObject(raw)) {
    throw new RuleLibraryError('Field "policy" must be an object.', "INVALID_SHAPE");
  }
  const policy: Record<string, PolicyEntry> = {};
  for (const [key, entry] of Object.entries(raw)) {
    if (!isObject(entry) || typeof entry["value"] !== "number" || !Number.isFinite(entry["value"])) {
      throw new RuleLibraryError(`Policy "${key}" must carry a finite numeric value.`, "INVALID_SHAPE");
    }
    const description = typeof entry["description"] === "string" ? entry["description"] : "";
    const override = overrides[key];
    policy[key] = Object.freeze({ value: override ?? entry["value"], description });
  }
  for (const key of Object.keys(overrides)) {
    if (overrides[key] !== undefined && !Object.hasOwn(policy, key)) {
      throw new RuleLibraryError(`Override targets unknown policy "${key}".`, "UNKNOWN_POLICY");
    }
  }
  return policy;
}

function parseRule(raw: unknown, index: number, policy: Record<string, PolicyEntry>): RiskRule {
  if (!isObject(raw)) {
    throw new RuleLibraryError(`Rule #${index} must be an object.`, "INVALID_SHAPE");
  }
  const id = requireString(raw, "id");
  const riskType = requireString(raw, "riskType", id);
  const description = requireString(raw, "description", id);
  const severity = raw["severity"];
  if (!isOneOf(severity, SEVERITIES)) {
    throw new RuleLibraryError(`Unknown severity "${String(severity)}".`, "INVALID_SHAPE", id);
  }
  const pattern = compilePattern(requireString(raw, "pattern", id), id, "pattern");
  const base = { id, riskType, severity, description };

  switch (raw["kind"]) {
    case "pattern":
      return { ...base, kind: "pattern", pattern };
    case "absence":
      return { ...base, kind: "absence", pattern, anchor: compilePattern(requireString(raw, "anchor", id), id, "anchor") };
    case "threshold": {
      const measure = raw["measure"];
      const comparison = raw["comparison"];
      const policyKey = requireString(raw, "policy", id);
      if (!isOneOf(measure, MEASURES)) {
        throw new RuleLibraryError(`Unknown measure "${String(measure)}".`, "INVALID_SHAPE", id);
      }
      if (!isOneOf(comparison, COMPARISONS)) {
        throw new RuleLibraryError(`Unknown comparison "${String(comparison)}".`, "INVALID_SHAPE", id);
      }
      if (!Object.hasOwn(policy, policyKey)) {
        throw new RuleLibraryError(`Rule reads unknown policy "${policyKey}".`, "UNKNOWN_POLICY", id);
      }
      if (!pattern.source.includes("(?<value>")) {
        throw new RuleLibraryError('Threshold pattern must capture a named "value" group.', "INVALID_PATTERN", id);
      }
      return { ...base, kind: "threshold", pattern, measure, comparison, policy: policyKey };
    }
    default:
      throw new RuleLibraryError(`Unknown rule kind "${String(raw["kind"])}".`, "INVALID_SHAPE", id);
  }
}

/**
 * Validates an already-parsed rule table and compiles its patterns.
 * Every defect is fatal: a partially loaded library would audit silently wrong.
 */
export function parseRuleLibrary(raw: unknown, overrides: PolicyOverrides = {}): RuleLibrary {
  if (!isObject(raw)) {
    throw new RuleLibraryError("Rule library must be a JSON object.", "INVALID_SHAPE");
  }
  const version = raw["version"];
  if (typeof version !== "string" || version.length === 0) {
    throw new RuleLibraryError('Field "version" must be a non-empty string.', "INVALID_SHAPE");
  }
  const rawRules = raw["rules"];
  if (!Array.isArray(rawRules) || rawRules.length === 0) {
    throw new RuleLibraryError('Field "rules" must be a non-empty array.', "INVALID_SHAPE");
  }

  const policy = parsePolicy(raw["policy"] ?? {}, overrides);
  const seen = new Set<string>();
  const rules = rawRules.map((entry: unknown, index: number) => {
    const rule = parseRule(entry, index, policy);
    if (seen.has(rule.id)) {
      throw new RuleLibraryError("Duplicate rule id.", "INVALID_SHAPE", rule.id);
    }
    seen.add(rule.id);
    return Object.freeze(rule);
  });

  return Object.freeze({
    version,
    policy: Object.freeze(policy),
    rules: Object.freeze(rules),
  });
}

export async function loadRuleLibrary(path: string = DEFAULT_RULES_PATH, overrides: PolicyOverrides = {}): Promise<RuleLibrary> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new RuleLibraryError(`Cannot read rule library at ${path}: ${errorMessage(err)}`, "UNREADABLE");
  }
  const library = parseRuleLibrary(raw, overrides);
  devLog(`Loaded rule library v${library.version} (${library.rules.length} rules) from ${path}`);
  return library;
}
