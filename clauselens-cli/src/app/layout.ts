import type { ChatMessage } from "./types.js";

export type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "gray";
  readonly bold?: boolean;
};

const ROLE_LABELS: Record<ChatMessage["role"], { label: string; color: DisplayLine["color"] }> = {
  user: { label: "You", color: "green" },
  assistant: { label: "ClauseLens", color: "cyan" },
  system: { label: "Info", color: "gray" },
};

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function splitLong(word: string, width: number): string[] {
  const pieces: string[] = [];
  for (let index = 0; index < word.length; index += width) {
    pieces.push(word.slice(index, index + width));
  }
  return pieces;
}

/** Greedy word wrap; words wider than the line are hard-split. */
export function wrapSegment(segment: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of segment.split(/\s+/)) {
    if (word.length === 0) continue;

    const candidate = current.length === 0 ? word : `${current} ${word}`;
    if (candidate.length <= width) {
      current = candidate;
      continue;
    }
    if (current.length > 0) lines.push(current);

    if (word.length <= width) {
      current = word;
    } else {
      const pieces = splitLong(word, width);
      current = pieces.pop() ?? "";
      lines.push(...pieces);
    }
  }

  if (current.length > 0) lines.push(current);
  return lines.length > 0 ? lines : [""];
}

export function wrapContent(content: string, width: number): string[] {
  const safeWidth = Math.max(1, width);
  return content.split(/\r?\n/).flatMap((line) => wrapSegment(line, safeWidth));
}

export function toDisplayLines(messages: readonly ChatMessage[], width: number): DisplayLine[] {
  const contentWidth = Math.max(1, width - 2);
  const lines: DisplayLine[] = [];

  for (const message of messages) {
    const role = ROLE_LABELS[message.role];
    lines.push({ text: role.label, bold: true, color: role.color });
    for (const line of wrapContent(message.content, contentWidth)) {
      lines.push({ text: `  ${line}` });
    }
    lines.push({ text: "" });
  }

  return lines;
}

export type ScrollKey = "up" | "down" | "pageUp" | "pageDown" | "home" | "end";

export interface ScrollWindow {
  readonly viewport: number;
  readonly maxTop: number;
}

export function scrollTo(top: number, key: ScrollKey, view: ScrollWindow): number {
  switch (key) {
    case "up":
      return clamp(top - 1, 0, view.maxTop);
    case "down":
      return clamp(top + 1, 0, view.maxTop);
    case "pageUp":
      return clamp(top - view.viewport, 0, view.maxTop);
    case "pageDown":
      return clamp(top + view.viewport, 0, view.maxTop);
    case "home":
      return 0;
    case "end":
      return view.maxTop;
  }
}

/** A viewport pinned to the bottom keeps following new lines; one scrolled up stays put. */
export function followTail(top: number, previousMaxTop: number, maxTop: number): number {
  return top >= previousMaxTop ? maxTop : Math.min(top, maxTop);
}
