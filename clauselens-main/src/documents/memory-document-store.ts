import type { DocumentRepository, Page, StoredDocument } from "../core/contracts/document-store.js";
import { DocumentNotFoundError } from "../core/errors.js";

export class InMemoryDocumentStore implements DocumentRepository {
  private readonly documents = new Map<string, StoredDocument>();

  constructor(initial: StoredDocument[] = []) {
    for (const document of initial) this.documents.set(document.documentId, document);
  }

  async save(document: StoredDocument): Promise<void> {
    this.documents.set(document.documentId, document);
  }

  async getDocument(documentId: string): Promise<StoredDocument> {
    const document = this.documents.get(documentId);
    if (!document) throw new DocumentNotFoundError(documentId);
    return document;
  }

  async getPages(documentId: string): Promise<Page[]> {
    return (await this.getDocument(documentId)).pages;
  }

  async listDocumentIds(): Promise<string[]> {
    return [...this.documents.keys()].sort();
  }
}
