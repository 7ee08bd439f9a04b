import { describe, it, expect } from "vitest";
import { DocumentNotFoundError } from "../../src/core/errors.js";
import { InMemoryDocumentStore } from "../../src/documents/memory-document-store.js";

describe("InMemoryDocumentStore", () => {
  it("should serve seeded documents and sort ids", async () => {
    const store = new InMemoryDocumentStore([
      {
        documentId: "b",
        fileName: "b.txt",
        ingestedAt: "2024-01-01T00:00:00.000Z",
        pages: [{ pageNumber: 1, text: "B" }],
        metadata: { kind: "txt", sizeBytes: 1 },
        warnings: [],
      },
    ]);
    await store.save({ ...(await store.getDocument("b")), documentId: "a" });

    expect(await store.listDocumentIds()).toEqual(["a", "b"]);
    expect(await store.getPages("a")).toEqual([{ pageNumber: 1, text: "B" }]);
  });

  it("should reject unknown ids", async () => {
    await expect(new InMemoryDocumentStore().getPages("nope")).rejects.toBeInstanceOf(DocumentNotFoundError);
  });
});
