import type { Page } from "../core/contracts/document-store.js";
import type { Chunk, ChunkerOptions } from "./types.js";

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_OVERLAP_RATIO = 0.2;
const MIN_CHUNK_SIZE = 40;
const MAX_OVERLAP_RATIO = 0.45;

const SOFT_BREAK_CHARS = new Set([".", "!", "?", "\n"]);

interface ResolvedChunkerOptions {
  chunkSize: number;
  overlap: number;
}

function resolveOptions(options?: ChunkerOptions): ResolvedChunkerOptions {
  const chunkSize = Math.max(MIN_CHUNK_SIZE, Math.floor(options?.chunkSize ?? DEFAULT_CHUNK_SIZE));
  const ratio = options?.overlapRatio ?? DEFAULT_OVERLAP_RATIO;
  const safeRatio = Number.isFinite(ratio) ? Math.min(MAX_OVERLAP_RATIO, Math.max(0, ratio)) : DEFAULT_OVERLAP_RATIO;
  return { chunkSize, overlap: Math.floor(chunkSize * safeRatio) };
}

/**
 * Splits page text into overlapping windows. Windows never cross a page, and
 * consecutive windows on a page share exactly `overlap` characters, so any
 * phrase no longer than the overlap lies whole inside at least one chunk.
 */
export function chunkPages(documentId: string, pages: readonly Page[], options?: ChunkerOptions): Chunk[] {
  const resolved = resolveOptions(options);
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
  const chunks: Chunk[] = [];

  for (const page of ordered) {
    chunks.push(...chunkPage(documentId, page, resolved));
  }

  return chunks;
}

function chunkPage(documentId: string, page: Page, options: ResolvedChunkerOptions): Chunk[] {
  const text = page.text;
  if (text.trim().length === 0) return [];

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + options.chunkSize, text.length);
    if (end < text.length) {
      end = softBreak(text, start, end, options);
    }

    chunks.push(Object.freeze({
      id: `${documentId}:p${page.pageNumber}:${start}`,
      documentId,
      page: page.pageNumber,
      startOffset: start,
      endOffset: end,
      text: text.slice(start, end),
    }));

    if (end >= text.length) break;
    start = end - options.overlap;
  }

  return chunks;
}

// Pulls the window end back to a sentence terminator past the midpoint; the
// window stays longer than the overlap so the next start always advances.
function softBreak(text: string, start: number, end: number, options: ResolvedChunkerOptions): number {
  const floor = start + Math.max(Math.floor(options.chunkSize / 2), options.overlap + 1);
  for (let index = end - 1; index >= floor; index--) {
    if (SOFT_BREAK_CHARS.has(text.charAt(index))) {
      return index + 1;
    }
  }
  return end;
}
