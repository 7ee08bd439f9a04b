import type { DataTruncationWarning } from "../errors.js";

export interface Page {
  pageNumber: number;
  text: string;
}

export interface DocumentMetadata {
  title?: string;
  author?: string;
  kind: "pdf" | "txt";
  sizeBytes: number;
}

export interface StoredDocument {
  documentId: string;
  fileName: string;
  ingestedAt: string;
  pages: Page[];
  metadata: DocumentMetadata;
  warnings: DataTruncationWarning[];
}

/** Read side consumed by the engine. Unknown ids reject with DocumentNotFoundError. */
export interface DocumentStore {
  getPages(documentId: string): Promise<Page[]>;
  getDocument(documentId: string): Promise<StoredDocument>;
  listDocumentIds(): Promise<string[]>;
}

/** Write side, used by ingestion only. */
export interface DocumentRepository extends DocumentStore {
  save(document: StoredDocument): Promise<void>;
}
