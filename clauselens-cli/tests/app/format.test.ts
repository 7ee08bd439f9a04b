import { describe, it, expect } from "vitest";
import { formatAudit, formatCitation, formatCitations, formatDocuments, formatFields } from "../../src/app/format.js";
import type { AuditMessage, WireCitation } from "../../src/app/types.js";

const evidence: WireCitation = {
  document_id: "doc-1",
  page: 1,
  char_range: [0, 29],
  text_snippet: "Renews unless 10 days notice.",
};

function audit(findings: AuditMessage["findings"]): AuditMessage {
  return {
    type: "audit",
    request_id: "req-1",
    document_id: "doc-1",
    findings,
    count: findings.length,
    rule_library_version: "1.0.0",
  };
}

describe("formatCitation", () => {
  it("should number citations from one and collapse whitespace", () => {
    const citation: WireCitation = { ...evidence, page: 2, char_range: [10, 40], text_snippet: "The term is   two\nyears." };
    expect(formatCitation(citation, 0)).toBe('[1] doc-1 p.2 (10-40): "The term is two years."');
  });

  it("should clip long snippets", () => {
    const line = formatCitation({ ...evidence, text_snippet: "a".repeat(130) }, 1);
    expect(line).toBe(`[2] doc-1 p.1 (0-29): "${"a".repeat(117)}..."`);
  });

  it("should say when there are no sources", () => {
    expect(formatCitations([])).toBe("Sources: none");
  });
});

describe("formatAudit", () => {
  it("should list each finding with its evidence", () => {
    const text = formatAudit(
      audit([
        {
          rule_id: "AR-001",
          risk_type: "auto_renewal_short_notice",
          severity: "high",
          description: "Auto-renewal notice period of 10 days is below the 30-day policy minimum.",
          document_id: "doc-1",
          evidence,
        },
      ]),
    );
    expect(text).toBe(
      [
        "1 finding(s) in doc-1 (rules v1.0.0):",
        "HIGH AR-001 auto_renewal_short_notice",
        "  Auto-renewal notice period of 10 days is below the 30-day policy minimum.",
        '  p.1: "Renews unless 10 days notice."',
      ].join("\n"),
    );
  });

  it("should report a clean audit", () => {
    expect(formatAudit(audit([]))).toBe("No risks found in doc-1 (rules v1.0.0).");
  });
});

describe("formatFields", () => {
  it("should show normalized values and missing fields", () => {
    const text = formatFields({
      type: "fields",
      request_id: "req-2",
      document_id: "doc-1",
      fields: {
        parties: [{ value: "Acme Corp", normalized: null, citation: evidence }],
        effective_date: { value: "January 1, 2024", normalized: "2024-01-01", citation: evidence },
        governing_law: null,
      },
    });
    expect(text).toBe(
      [
        "Fields for doc-1:",
        "  parties: Acme Corp (p.1)",
        "  effective date: January 1, 2024 => 2024-01-01 (p.1)",
        "  governing law: not found",
      ].join("\n"),
    );
  });
});

describe("formatDocuments", () => {
  it("should mark the documents questions are limited to", () => {
    const text = formatDocuments({ type: "documents", request_id: "r", document_ids: ["a", "b"], count: 2 }, ["b"]);
    expect(text).toBe("2 document(s):\n  a\n* b");
  });
});
