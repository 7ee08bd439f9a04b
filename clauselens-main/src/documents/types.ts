import type { DocumentMetadata, Page } from "../core/contracts/document-store.js";
import type { DataTruncationWarning } from "../core/errors.js";

export type DocumentKind = DocumentMetadata["kind"];

export interface ExtractorInput {
  fileName: string;
  bytes: Buffer;
}

export interface ExtractorOutput {
  kind: DocumentKind;
  pages: Page[];
  title?: string;
  author?: string;
  warnings: DataTruncationWarning[];
}

export interface DocumentExtractor {
  supports(kind: DocumentKind): boolean;
  extract(input: ExtractorInput): Promise<ExtractorOutput>;
}

export interface IngestionInput {
  fileName: string;
  bytes: Buffer;
}

export interface IngestionResult {
  documentId: string;
  fileName: string;
  pageCount: number;
  warnings: DataTruncationWarning[];
}

export interface IngestionLimits {
  maxPageChars: number;
  maxDocumentChars: number;
}
