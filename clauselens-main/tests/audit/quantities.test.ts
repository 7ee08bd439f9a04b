import { describe, it, expect } from "vitest";
import { Decimal } from "decimal.js";
import { formatQuantity, normalizeQuantity, parseAmount, parseCount } from "../../src/audit/quantities.js";

describe("parseCount", () => {
  it("should read digits and number words", () => {
    expect(parseCount("12")?.toNumber()).toBe(12);
    expect(parseCount("Thirty")?.toNumber()).toBe(30);
    expect(parseCount("forty-five")?.toNumber()).toBe(45);
  });

  it("should return null for anything else", () => {
    expect(parseCount("several")).toBeNull();
  });
});

describe("parseAmount", () => {
  it("should strip separators and apply scale words", () => {
    expect(parseAmount("$1,500,000")?.toNumber()).toBe(1_500_000);
    expect(parseAmount("US$ 2.5 million")?.toNumber()).toBe(2_500_000);
    expect(parseAmount("250000 USD")?.toNumber()).toBe(250_000);
  });

  it("should return null without digits", () => {
    expect(parseAmount("no cap")).toBeNull();
  });
});

describe("normalizeQuantity", () => {
  it("should convert notice windows to days", () => {
    expect(normalizeQuantity("days", "two", "weeks")?.toNumber()).toBe(14);
    expect(normalizeQuantity("days", "3", "months")?.toNumber()).toBe(90);
    expect(normalizeQuantity("days", "10", "days")?.toNumber()).toBe(10);
  });

  it("should convert survival periods to years", () => {
    expect(normalizeQuantity("years", "18", "months")?.toNumber()).toBe(1.5);
    expect(normalizeQuantity("years", "seven", "years")?.toNumber()).toBe(7);
  });
});

describe("formatQuantity", () => {
  it("should group thousands and round to two decimals", () => {
    expect(formatQuantity(new Decimal("1500000"))).toBe("1,500,000");
    expect(formatQuantity(new Decimal(1).dividedBy(3))).toBe("0.33");
    expect(formatQuantity(30)).toBe("30");
  });
});
