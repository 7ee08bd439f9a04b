export { FileDocumentStore, DEFAULT_DATA_DIR } from "./file-document-store.js";
export type { FileDocumentStoreOptions } from "./file-document-store.js";
export { InMemoryDocumentStore } from "./memory-document-store.js";
export {
  DocumentIngestor,
  DEFAULT_MAX_DOCUMENT_CHARS,
  DEFAULT_MAX_PAGE_CHARS,
  applyLimits,
  createDocumentId,
  detectDocumentKind,
} from "./ingestion.js";
export type { DocumentIngestorOptions } from "./ingestion.js";
export { PdfExtractor } from "./extractors/pdf-extractor.js";
export { TextExtractor, decodeText } from "./extractors/text-extractor.js";
export type { DocumentExtractor, DocumentKind, ExtractorInput, ExtractorOutput, IngestionInput, IngestionResult, IngestionLimits } from "./types.js";
