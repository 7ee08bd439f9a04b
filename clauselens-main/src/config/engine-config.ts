import { DEFAULT_RULES_PATH } from "../audit/rule-library.js";
import type { PolicyOverrides } from "../audit/types.js";
import { DEFAULT_DATA_DIR } from "../documents/file-document-store.js";
import { DEFAULT_CHUNK_SIZE, DEFAULT_OVERLAP_RATIO } from "../retrieval/chunker.js";
import { DEFAULT_PROXIMITY_WINDOW, DEFAULT_RELEVANCE_FLOOR, DEFAULT_TOP_K } from "../retrieval/relevance-scorer.js";
import { PROVIDER_NAMES, type ProviderName } from "./provider.js";

export interface CompletionConfig {
  enabled: boolean;
  provider: ProviderName;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  promptTokenBudget: number;
}

export interface RetrievalConfig {
  chunkSize: number;
  overlapRatio: number;
  topK: number;
  relevanceFloor: number;
  proximityWindow: number;
}

export interface AuditConfig {
  rulesPath: string;
  policyOverrides: PolicyOverrides;
}

export interface EngineConfig {
  completion: CompletionConfig;
  retrieval: RetrievalConfig;
  audit: AuditConfig;
  dataDir: string;
  port: number;
}

type Env = Readonly<Record<string, string | undefined>>;

const MAX_OVERLAP_RATIO = 0.45;

// ── Env-var parsing helpers ────────────────────────────────────────

export function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  if (value === "1" || value === "true" || value === "yes") return true;
  if (value === "0" || value === "false" || value === "no") return false;
  return fallback;
}

/** Positive finite numbers only; anything else keeps the fallback. */
export function parseNumber(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function parseNonNegative(raw: string | undefined, fallback: number): number {
  if (!raw || raw.trim().length === 0) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function parseRatio(raw: string | undefined, fallback: number, max: number): number {
  const n = parseNonNegative(raw, fallback);
  return Math.min(n, max);
}

export function parseChoice<T extends string>(raw: string | undefined, choices: readonly T[], fallback: T): T {
  const value = raw?.trim().toLowerCase();
  return choices.find((choice) => choice === value) ?? fallback;
}

function parseOptional(raw: string | undefined): number | undefined {
  if (!raw || raw.trim().length === 0) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

function parsePath(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    completion: {
      enabled: parseBool(env["LLM_ENABLED"], true),
      provider: parseChoice(env["LLM_PROVIDER"], PROVIDER_NAMES, "openai"),
      timeoutMs: parseNumber(env["LLM_TIMEOUT_MS"], 20_000),
      maxTokens: Math.floor(parseNumber(env["LLM_MAX_TOKENS"], 400)),
      temperature: parseNonNegative(env["LLM_TEMPERATURE"], 0.1),
      promptTokenBudget: Math.floor(parseNumber(env["LLM_PROMPT_TOKEN_BUDGET"], 1800)),
    },
    retrieval: {
      chunkSize: Math.floor(parseNumber(env["CHUNK_SIZE"], DEFAULT_CHUNK_SIZE)),
      overlapRatio: parseRatio(env["CHUNK_OVERLAP"], DEFAULT_OVERLAP_RATIO, MAX_OVERLAP_RATIO),
      topK: Math.floor(parseNumber(env["RETRIEVAL_TOP_K"], DEFAULT_TOP_K)),
      relevanceFloor: parseNonNegative(env["RETRIEVAL_RELEVANCE_FLOOR"], DEFAULT_RELEVANCE_FLOOR),
      proximityWindow: Math.floor(parseNumber(env["RETRIEVAL_PROXIMITY_WINDOW"], DEFAULT_PROXIMITY_WINDOW)),
    },
    audit: {
      rulesPath: parsePath(env["AUDIT_RULES_PATH"], DEFAULT_RULES_PATH),
      policyOverrides: {
        minNoticeDays: parseOptional(env["AUDIT_MIN_NOTICE_DAYS"]),
        maxConfidentialityYears: parseOptional(env["AUDIT_MAX_CONFIDENTIALITY_YEARS"]),
        liabilityCapCeiling: parseOptional(env["AUDIT_LIABILITY_CAP_CEILING"]),
      },
    },
    dataDir: parsePath(env["CLAUSELENS_DATA_DIR"], DEFAULT_DATA_DIR),
    port: Math.floor(parseNumber(env["CLAUSELENS_PORT"], 8080)),
  };
}
