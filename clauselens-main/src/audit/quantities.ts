import { Decimal } from "decimal.js";
import type { ThresholdMeasure } from "./types.js";

const NUMBER_WORDS: Readonly<Record<string, number>> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  fifteen: 15,
  twenty: 20,
  "twenty-four": 24,
  thirty: 30,
  "thirty-six": 36,
  forty: 40,
  "forty-five": 45,
  sixty: 60,
  ninety: 90,
};

const SCALE_WORDS: Readonly<Record<string, number>> = {
  thousand: 1_000,
  million: 1_000_000,
  billion: 1_000_000_000,
};

const DISPLAY = new Intl.NumberFormat("en-US", { maximumFractionDigits: 2 });

/** Digits or a spelled-out number word; null when neither. */
export function parseCount(raw: string): Decimal | null {
  const text = raw.trim().toLowerCase();
  if (/^\d+(?:\.\d+)?$/.test(text)) return new Decimal(text);
  const word = NUMBER_WORDS[text];
  return word === undefined ? null : new Decimal(word);
}

/** "$1,500,000", "US$ 2.5 million", "250000 USD". */
export function parseAmount(raw: string): Decimal | null {
  const text = raw.toLowerCase();
  const digits = /\d[\d,]*(?:\.\d+)?/.exec(text);
  if (!digits) return null;
  let amount = new Decimal(digits[0].replace(/,/g, ""));
  const scale = /\b(thousand|million|billion)\b/.exec(text);
  const factor = scale ? SCALE_WORDS[scale[1] ?? ""] : undefined;
  if (factor !== undefined) amount = amount.times(factor);
  return amount;
}

/**
 * Brings a captured value into the unit its policy is expressed in:
 * days for notice windows, years for survival periods, dollars for caps.
 */
export function normalizeQuantity(measure: ThresholdMeasure, value: string, unit: string | undefined): Decimal | null {
  if (measure === "amount") return parseAmount(value);

  const count = parseCount(value);
  if (!count) return null;
  const u = (unit ?? "").toLowerCase();

  if (measure === "days") {
    if (u.startsWith("week")) return count.times(7);
    if (u.startsWith("month")) return count.times(30);
    if (u.startsWith("year")) return count.times(365);
    return count;
  }
  if (u.startsWith("month")) return count.dividedBy(12);
  if (u.startsWith("day")) return count.dividedBy(365);
  return count;
}

export function formatQuantity(value: Decimal | number): string {
  return DISPLAY.format(typeof value === "number" ? value : value.toNumber());
}
