import { createHash } from "node:crypto";
import { extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import type { DocumentRepository, Page, StoredDocument } from "../core/contracts/document-store.js";
import { InputError, type DataTruncationWarning } from "../core/errors.js";
import { devLog, devWarn } from "../shared/index.js";
import { PdfExtractor } from "./extractors/pdf-extractor.js";
import { TextExtractor } from "./extractors/text-extractor.js";
import type {
  DocumentExtractor,
  DocumentKind,
  IngestionInput,
  IngestionLimits,
  IngestionResult,
} from "./types.js";

export const DEFAULT_MAX_PAGE_CHARS = 50_000;
export const DEFAULT_MAX_DOCUMENT_CHARS = 500_000;
const SNIFF_BYTES = 4096;

export interface DocumentIngestorOptions extends Partial<IngestionLimits> {
  extractors?: DocumentExtractor[];
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `yyyyMMddHHmmss_<16 hex of sha256>`, timestamp in UTC. */
export function createDocumentId(bytes: Buffer, at: Date): string {
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const digest = createHash("sha256").update(bytes).digest("hex").slice(0, 16);
  return `${stamp}_${digest}`;
}

function extensionToKind(fileName: string): DocumentKind | null {
  switch (extname(fileName).toLowerCase()) {
    case ".pdf":
      return "pdf";
    case ".txt":
    case ".text":
    case ".md":
      return "txt";
    default:
      return null;
  }
}

function looksLikeText(bytes: Buffer): boolean {
  return !bytes.subarray(0, SNIFF_BYTES).includes(0);
}

export async function detectDocumentKind(fileName: string, bytes: Buffer): Promise<DocumentKind> {
  const byExt = extensionToKind(fileName);
  if (byExt) return byExt;

  const typed = await fileTypeFromBuffer(bytes);
  if (typed?.mime === "application/pdf") return "pdf";
  if (!typed && looksLikeText(bytes)) return "txt";

  throw new InputError(`Unsupported document type for ${fileName}${typed ? ` (${typed.mime})` : ""}.`, "INVALID_REQUEST");
}

/**
 * Applies the per-page and per-document character caps. Every cut is
 * recorded; nothing is dropped silently.
 */
export function applyLimits(pages: readonly Page[], limits: IngestionLimits): { pages: Page[]; warnings: DataTruncationWarning[] } {
  const kept: Page[] = [];
  const warnings: DataTruncationWarning[] = [];
  let remaining = limits.maxDocumentChars;

  for (const [index, page] of pages.entries()) {
    if (remaining <= 0) {
      const dropped = pages.slice(index);
      warnings.push({
        code: "pages_dropped",
        message: `Document text limit of ${limits.maxDocumentChars} characters reached; ${dropped.length} trailing page(s) dropped.`,
        page: page.pageNumber,
        originalLength: dropped.reduce((sum, entry) => sum + entry.text.length, 0),
        keptLength: 0,
      });
      break;
    }

    let text = page.text;
    if (text.length > limits.maxPageChars) {
      warnings.push({
        code: "page_truncated",
        message: `Page ${page.pageNumber} exceeded ${limits.maxPageChars} characters and was truncated.`,
        page: page.pageNumber,
        originalLength: text.length,
        keptLength: limits.maxPageChars,
      });
      text = text.slice(0, limits.maxPageChars);
    }
    if (text.length > remaining) {
      warnings.push({
        code: "document_truncated",
        message: `Document text limit of ${limits.maxDocumentChars} characters reached on page ${page.pageNumber}.`,
        page: page.pageNumber,
        originalLength: text.length,
        keptLength: remaining,
      });
      text = text.slice(0, remaining);
    }

    kept.push({ pageNumber: page.pageNumber, text });
    remaining -= text.length;
  }

  return { pages: kept, warnings };
}

export class DocumentIngestor {
  private readonly extractors: DocumentExtractor[];
  private readonly limits: IngestionLimits;
  private readonly now: () => Date;

  constructor(
    private readonly repository: DocumentRepository,
    options?: DocumentIngestorOptions,
  ) {
    this.extractors = options?.extractors ?? [new PdfExtractor(), new TextExtractor()];
    this.limits = {
      maxPageChars: options?.maxPageChars ?? DEFAULT_MAX_PAGE_CHARS,
      maxDocumentChars: options?.maxDocumentChars ?? DEFAULT_MAX_DOCUMENT_CHARS,
    };
    this.now = options?.now ?? (() => new Date());
  }

  async ingest(input: IngestionInput): Promise<IngestionResult> {
    const fileName = input.fileName.trim();
    if (fileName.length === 0) {
      throw new InputError("fileName is required.", "INVALID_REQUEST");
    }
    if (input.bytes.length === 0) {
      throw new InputError(`${fileName} is empty.`, "INVALID_REQUEST");
    }

    const kind = await detectDocumentKind(fileName, input.bytes);
    const extractor = this.extractors.find((entry) => entry.supports(kind));
    if (!extractor) {
      throw new InputError(`No extractor for ${kind} documents.`, "INVALID_REQUEST");
    }

    const raw = await extractor.extract({ fileName, bytes: input.bytes });
    const limited = applyLimits(
      [...raw.pages].sort((a, b) => a.pageNumber - b.pageNumber),
      this.limits,
    );
    const warnings = [...raw.warnings, ...limited.warnings];
    if (!warnings.some((w) => w.code === "no_text") && limited.pages.every((page) => page.text.trim().length === 0)) {
      warnings.push({ code: "no_text", message: `${fileName} contains no text.`, originalLength: 0, keptLength: 0 });
    }

    const ingestedAt = this.now();
    const document: StoredDocument = {
      documentId: createDocumentId(input.bytes, ingestedAt),
      fileName,
      ingestedAt: ingestedAt.toISOString(),
      pages: limited.pages,
      metadata: {
        kind,
        sizeBytes: input.bytes.length,
        ...(raw.title ? { title: raw.title } : {}),
        ...(raw.author ? { author: raw.author } : {}),
      },
      warnings,
    };
    await this.repository.save(document);

    for (const warning of warnings) {
      devWarn(`[${document.documentId}] ${warning.code}: ${warning.message}`);
    }
    devLog(`Ingested ${fileName} as ${document.documentId} (${kind}, ${document.pages.length} pages)`);

    return {
      documentId: document.documentId,
      fileName,
      pageCount: document.pages.length,
      warnings,
    };
  }
}
