import type { Page } from "../../core/contracts/document-store.js";
import type { DataTruncationWarning } from "../../core/errors.js";
import type { DocumentExtractor, DocumentKind, ExtractorInput, ExtractorOutput } from "../types.js";

const PDFJS_MODULE = "pdfjs-dist/legacy/build/pdf.mjs";

interface PdfTextItem {
  str: string;
  hasEOL?: boolean;
}

interface PdfPage {
  getTextContent(): Promise<{ items: unknown[] }>;
}

interface PdfDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
  getMetadata(): Promise<{ info?: unknown }>;
  destroy(): Promise<void>;
}

interface PdfLoadingTask {
  promise: Promise<unknown>;
}

interface PdfModule {
  getDocument(source: {
    data: Uint8Array;
    useWorkerFetch: boolean;
    isEvalSupported: boolean;
    disableFontFace: boolean;
  }): PdfLoadingTask;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isPdfModule(value: unknown): value is PdfModule {
  return isObject(value) && typeof value["getDocument"] === "function";
}

function isPdfDocument(value: unknown): value is PdfDocument {
  return (
    isObject(value) &&
    typeof value["numPages"] === "number" &&
    typeof value["getPage"] === "function" &&
    typeof value["getMetadata"] === "function" &&
    typeof value["destroy"] === "function"
  );
}

function isTextItem(value: unknown): value is PdfTextItem {
  return isObject(value) && typeof value["str"] === "string";
}

function readInfoString(info: unknown, key: string): string | undefined {
  if (!isObject(info)) return undefined;
  const value = info[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/** Page text with line ends preserved, so sentence detection sees them. */
function renderPageText(items: unknown[]): string {
  let text = "";
  for (const item of items) {
    if (!isTextItem(item)) continue;
    text += item.str;
    if (item.hasEOL) text += "\n";
  }
  return text
    .replace(/[ \t]+\n/g, "\n")
    .replace(/[ \t]{2,}/g, " ")
    .trim();
}

export class PdfExtractor implements DocumentExtractor {
  supports(kind: DocumentKind): boolean {
    return kind === "pdf";
  }

  async extract(input: ExtractorInput): Promise<ExtractorOutput> {
    const module: unknown = await import(PDFJS_MODULE);
    if (!isPdfModule(module)) {
      throw new Error("pdfjs-dist did not expose getDocument().");
    }

    const loaded = await module.getDocument({
      data: new Uint8Array(input.bytes),
      useWorkerFetch: false,
      isEvalSupported: false,
      disableFontFace: true,
    }).promise;
    if (!isPdfDocument(loaded)) {
      throw new Error(`Could not open ${input.fileName} as a PDF.`);
    }

    try {
      const pages: Page[] = [];
      for (let pageNumber = 1; pageNumber <= loaded.numPages; pageNumber++) {
        const page = await loaded.getPage(pageNumber);
        const content = await page.getTextContent();
        pages.push({ pageNumber, text: renderPageText(content.items) });
      }

      const warnings: DataTruncationWarning[] = [];
      if (pages.every((page) => page.text.length === 0)) {
        warnings.push({
          code: "no_text",
          message: "No extractable text found in PDF. This may be a scanned document (OCR disabled).",
          originalLength: 0,
          keptLength: 0,
        });
      }

      const { info } = await loaded.getMetadata();
      const title = readInfoString(info, "Title");
      const author = readInfoString(info, "Author");
      return {
        kind: "pdf",
        pages,
        warnings,
        ...(title ? { title } : {}),
        ...(author ? { author } : {}),
      };
    } finally {
      await loaded.destroy();
    }
  }
}
