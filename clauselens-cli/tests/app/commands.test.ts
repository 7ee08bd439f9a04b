import { describe, it, expect } from "vitest";
import { parseCommand } from "../../src/app/commands.js";

describe("parseCommand", () => {
  it("should treat plain text as a question", () => {
    expect(parseCommand("  What is the term?  ")).toEqual({ kind: "ask", question: "What is the term?" });
  });

  it("should keep spaces inside ingest paths", () => {
    expect(parseCommand("/ingest ./my contract.pdf")).toEqual({ kind: "ingest", path: "./my contract.pdf" });
  });

  it("should dedupe ids given to /use", () => {
    expect(parseCommand("/use doc-a doc-b doc-a")).toEqual({ kind: "use", documentIds: ["doc-a", "doc-b"] });
  });

  it("should reset the scope with /use all", () => {
    expect(parseCommand("/use ALL")).toEqual({ kind: "use", documentIds: null });
  });

  it("should match command names case-insensitively", () => {
    expect(parseCommand("/DOCS")).toEqual({ kind: "docs" });
    expect(parseCommand("/Cancel")).toEqual({ kind: "cancel" });
  });

  it("should report usage when an id is missing", () => {
    expect(parseCommand("/audit")).toEqual({ kind: "invalid", message: "Usage: /audit <id>" });
    expect(parseCommand("/fields   ")).toEqual({ kind: "invalid", message: "Usage: /fields <id>" });
  });

  it("should reject unknown commands", () => {
    expect(parseCommand("/frobnicate now")).toEqual({
      kind: "invalid",
      message: "Unknown command /frobnicate. Type /help for the list.",
    });
  });
});
