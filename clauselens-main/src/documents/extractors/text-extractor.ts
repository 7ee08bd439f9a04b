import jschardet from "jschardet";
import iconv from "iconv-lite";
import { errorMessage } from "../../core/errors.js";
import { devDebug } from "../../shared/index.js";
import type { DocumentKind, DocumentExtractor, ExtractorInput, ExtractorOutput } from "../types.js";

const PAGE_BREAK = "\f";

/** Plain-text contracts; a form feed starts a new page. */
export class TextExtractor implements DocumentExtractor {
  supports(kind: DocumentKind): boolean {
    return kind === "txt";
  }

  async extract(input: ExtractorInput): Promise<ExtractorOutput> {
    const decoded = decodeText(input.bytes).replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    const pages = decoded.split(PAGE_BREAK).map((text, index) => ({ pageNumber: index + 1, text }));
    return { kind: "txt", pages, warnings: [] };
  }
}

export function decodeText(bytes: Buffer): string {
  const detection = jschardet.detect(bytes);
  const encoding = typeof detection.encoding === "string" ? detection.encoding : "utf-8";

  try {
    if (iconv.encodingExists(encoding)) {
      return iconv.decode(bytes, encoding);
    }
  } catch (err) {
    devDebug(`Decoding as ${encoding} failed, reading as UTF-8: ${errorMessage(err)}`);
  }

  return bytes.toString("utf8");
}
