import { describe, it, expect } from "vitest";
import { DEFAULT_RULES_PATH } from "../../src/audit/rule-library.js";
import {
  loadEngineConfig,
  parseBool,
  parseChoice,
  parseNonNegative,
  parseNumber,
  parseRatio,
} from "../../src/config/engine-config.js";
import { DEFAULT_DATA_DIR } from "../../src/documents/file-document-store.js";

describe("env parsing helpers", () => {
  it("should read booleans and keep the fallback on junk", () => {
    expect(parseBool("YES", false)).toBe(true);
    expect(parseBool(" 0 ", true)).toBe(false);
    expect(parseBool("maybe", true)).toBe(true);
    expect(parseBool(undefined, false)).toBe(false);
  });

  it("should only accept positive numbers", () => {
    expect(parseNumber("250", 1)).toBe(250);
    expect(parseNumber("0", 7)).toBe(7);
    expect(parseNumber("-3", 7)).toBe(7);
    expect(parseNumber("abc", 7)).toBe(7);
  });

  it("should accept zero where it is meaningful", () => {
    expect(parseNonNegative("0", 0.1)).toBe(0);
    expect(parseNonNegative("  ", 0.1)).toBe(0.1);
  });

  it("should cap ratios", () => {
    expect(parseRatio("0.9", 0.2, 0.45)).toBe(0.45);
    expect(parseRatio("0.3", 0.2, 0.45)).toBe(0.3);
  });

  it("should match choices case-insensitively", () => {
    expect(parseChoice(" Anthropic ", ["openai", "anthropic"], "openai")).toBe("anthropic");
    expect(parseChoice("mistral", ["openai", "anthropic"], "openai")).toBe("openai");
  });
});

describe("loadEngineConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual({
      completion: {
        enabled: true,
        provider: "openai",
        timeoutMs: 20_000,
        maxTokens: 400,
        temperature: 0.1,
        promptTokenBudget: 1800,
      },
      retrieval: {
        chunkSize: 500,
        overlapRatio: 0.2,
        topK: 5,
        relevanceFloor: 0,
        proximityWindow: 8,
      },
      audit: {
        rulesPath: DEFAULT_RULES_PATH,
        policyOverrides: {
          minNoticeDays: undefined,
          maxConfidentialityYears: undefined,
          liabilityCapCeiling: undefined,
        },
      },
      dataDir: DEFAULT_DATA_DIR,
      port: 8080,
    });
  });

  it("should read overrides from the environment", () => {
    const config = loadEngineConfig({
      LLM_ENABLED: "false",
      LLM_PROVIDER: "anthropic",
      LLM_MAX_TOKENS: "256.7",
      CHUNK_SIZE: "300",
      CHUNK_OVERLAP: "0.6",
      RETRIEVAL_TOP_K: "3",
      AUDIT_MIN_NOTICE_DAYS: "45",
      AUDIT_LIABILITY_CAP_CEILING: "not-a-number",
      CLAUSELENS_DATA_DIR: " /tmp/contracts ",
      CLAUSELENS_PORT: "9090",
    });

    expect(config.completion).toMatchObject({ enabled: false, provider: "anthropic", maxTokens: 256 });
    expect(config.retrieval).toMatchObject({ chunkSize: 300, overlapRatio: 0.45, topK: 3 });
    expect(config.audit.policyOverrides).toEqual({
      minNoticeDays: 45,
      maxConfidentialityYears: undefined,
      liabilityCapCeiling: undefined,
    });
    expect(config.dataDir).toBe("/tmp/contracts");
    expect(config.port).toBe(9090);
  });
});
