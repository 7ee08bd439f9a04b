import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { DocumentRepository, Page, StoredDocument } from "../core/contracts/document-store.js";
import { DocumentNotFoundError, type DataTruncationWarning } from "../core/errors.js";

const thisDir = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(thisDir, "..", "..");
export const DEFAULT_DATA_DIR = resolve(projectRoot, "data");

const STORE_VERSION = 1;
const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const WARNING_CODES = new Set(["page_truncated", "document_truncated", "pages_dropped", "no_text"]);

interface DocumentFile {
  version: typeof STORE_VERSION;
  document: StoredDocument;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPage(value: unknown): value is Page {
  return isObject(value) && typeof value["pageNumber"] === "number" && typeof value["text"] === "string";
}

function isWarning(value: unknown): value is DataTruncationWarning {
  if (!isObject(value)) return false;
  if (typeof value["code"] !== "string" || !WARNING_CODES.has(value["code"])) return false;
  if (typeof value["message"] !== "string") return false;
  if (value["page"] !== undefined && typeof value["page"] !== "number") return false;
  return typeof value["originalLength"] === "number" && typeof value["keptLength"] === "number";
}

function isStoredDocument(value: unknown): value is StoredDocument {
  if (!isObject(value)) return false;
  if (typeof value["documentId"] !== "string") return false;
  if (typeof value["fileName"] !== "string") return false;
  if (typeof value["ingestedAt"] !== "string") return false;
  if (!Array.isArray(value["pages"]) || !value["pages"].every(isPage)) return false;
  if (!Array.isArray(value["warnings"]) || !value["warnings"].every(isWarning)) return false;
  const metadata = value["metadata"];
  if (!isObject(metadata)) return false;
  if (metadata["kind"] !== "pdf" && metadata["kind"] !== "txt") return false;
  if (typeof metadata["sizeBytes"] !== "number") return false;
  if (metadata["title"] !== undefined && typeof metadata["title"] !== "string") return false;
  if (metadata["author"] !== undefined && typeof metadata["author"] !== "string") return false;
  return true;
}

function isDocumentFile(value: unknown): value is DocumentFile {
  return isObject(value) && value["version"] === STORE_VERSION && isStoredDocument(value["document"]);
}

function isMissingFile(err: unknown): boolean {
  return isObject(err) && err["code"] === "ENOENT";
}

export interface FileDocumentStoreOptions {
  dataDir?: string;
}

/** One JSON file per document under `<dataDir>/documents`. Writes are atomic and serialized. */
export class FileDocumentStore implements DocumentRepository {
  private readonly documentsDir: string;
  private operationLock: Promise<void> = Promise.resolve();

  constructor(options?: FileDocumentStoreOptions) {
    this.documentsDir = join(resolve(options?.dataDir ?? DEFAULT_DATA_DIR), "documents");
  }

  async save(document: StoredDocument): Promise<void> {
    if (!DOCUMENT_ID_PATTERN.test(document.documentId)) {
      throw new Error(`Refusing to store document with unsafe id: ${document.documentId}`);
    }
    await this.withLock(async () => {
      const filePath = this.pathFor(document.documentId);
      await mkdir(dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp-${randomUUID()}`;
      const payload: DocumentFile = { version: STORE_VERSION, document };
      await writeFile(tmpPath, JSON.stringify(payload, null, 2), "utf8");
      await rename(tmpPath, filePath);
    });
  }

  async getDocument(documentId: string): Promise<StoredDocument> {
    if (!DOCUMENT_ID_PATTERN.test(documentId)) throw new DocumentNotFoundError(documentId);

    let raw: string;
    try {
      raw = await readFile(this.pathFor(documentId), "utf8");
    } catch (err) {
      if (isMissingFile(err)) throw new DocumentNotFoundError(documentId);
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isDocumentFile(parsed)) {
      throw new Error(`Stored document ${documentId} has invalid shape.`);
    }
    return parsed.document;
  }

  async getPages(documentId: string): Promise<Page[]> {
    return (await this.getDocument(documentId)).pages;
  }

  async listDocumentIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.documentsDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return entries
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .filter((id) => DOCUMENT_ID_PATTERN.test(id))
      .sort();
  }

  private pathFor(documentId: string): string {
    return join(this.documentsDir, `${documentId}.json`);
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.operationLock;
    let release: () => void = () => undefined;
    this.operationLock = new Promise<void>((resolveLock) => {
      release = resolveLock;
    });
    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
