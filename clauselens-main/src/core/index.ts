export type { CompletionProvider } from "./contracts/provider.js";
export type { CompletionOptions, CompletionPrompt } from "./contracts/completion-protocol.js";
export type {
  DocumentMetadata,
  DocumentRepository,
  DocumentStore,
  Page,
  StoredDocument,
} from "./contracts/document-store.js";
export {
  CitationRangeError,
  DocumentNotFoundError,
  InputError,
  ProviderError,
  RuleLibraryError,
  errorMessage,
} from "./errors.js";
export type {
  DataTruncationCode,
  DataTruncationWarning,
  InputErrorCode,
  ProviderErrorCode,
  RuleLibraryErrorCode,
} from "./errors.js";
export { loadProvider } from "./runtime/provider-loader.js";
export type { ProviderFactory } from "./runtime/provider-loader.js";
