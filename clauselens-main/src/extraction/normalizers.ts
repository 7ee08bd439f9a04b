export interface TextMatch {
  start: number;
  end: number;
  text: string;
}

export interface DateMatch extends TextMatch {
  /** `YYYY-MM-DD` */
  iso: string;
}

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const MONTH_NAME =
  "(?<month>jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)";

const DATE_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b${MONTH_NAME}\\.?\\s+(?<day>\\d{1,2})(?:st|nd|rd|th)?,?\\s+(?<year>\\d{4})\\b`, "gi"),
  new RegExp(`\\b(?<day>\\d{1,2})(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?${MONTH_NAME}\\.?,?\\s+(?<year>\\d{4})\\b`, "gi"),
  /\b(?<year>\d{4})-(?<monthNumber>\d{2})-(?<day>\d{2})\b/g,
  /\b(?<monthNumber>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{4})\b/g,
];

const AMOUNT_PATTERN =
  /(?:\bUS)?\$\s?\d[\d,]*(?:\.\d{1,2})?(?:\s*(?:thousand|million|billion)\b)?|\b\d[\d,]*(?:\.\d{1,2})?\s*(?:USD|dollars)\b/gi;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function toIso(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

function monthFromGroups(groups: Record<string, string | undefined>): number {
  const name = groups["month"];
  if (name) return MONTHS[name.slice(0, 3).toLowerCase()] ?? 0;
  return Number(groups["monthNumber"] ?? 0);
}

/** All calendar dates in `text`, in order of appearance. */
export function findDates(text: string): DateMatch[] {
  const found: DateMatch[] = [];
  for (const pattern of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const groups = match.groups;
      if (!groups || match.index === undefined) continue;
      const iso = toIso(Number(groups["year"]), monthFromGroups(groups), Number(groups["day"]));
      if (!iso) continue;
      const start = match.index;
      const end = start + match[0].length;
      if (found.some((other) => start < other.end && other.start < end)) continue;
      found.push({ start, end, text: match[0], iso });
    }
  }
  return found.sort((a, b) => a.start - b.start);
}

export function findDate(text: string): DateMatch | null {
  return findDates(text)[0] ?? null;
}

export function findAmount(text: string): TextMatch | null {
  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    if (match.index === undefined) continue;
    return { start: match.index, end: match.index + match[0].length, text: match[0].trim() };
  }
  return null;
}
