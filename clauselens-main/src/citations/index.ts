export { resolveCitation, verifyCitation, expandToSentence } from "./citation-resolver.js";
export type { ResolveOptions } from "./citation-resolver.js";
export { sentenceSpans } from "./sentences.js";
export type { Citation, ChunkSpan, CitationBoundary, SentenceSpan } from "./types.js";
