export { RiskRuleEngine, compareFindings } from "./rule-engine.js";
export { DEFAULT_RULES_PATH, loadRuleLibrary, parseRuleLibrary } from "./rule-library.js";
export { formatQuantity, normalizeQuantity, parseAmount, parseCount } from "./quantities.js";
export type {
  AbsenceRule,
  Finding,
  PatternRule,
  PolicyEntry,
  PolicyOverrides,
  RiskRule,
  RuleLibrary,
  Severity,
  ThresholdComparison,
  ThresholdMeasure,
  ThresholdRule,
} from "./types.js";
