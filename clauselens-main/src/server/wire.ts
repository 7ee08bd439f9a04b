import type { Finding } from "../audit/types.js";
import type { Citation } from "../citations/types.js";
import { InputError, type DataTruncationWarning } from "../core/errors.js";
import type { IngestionResult } from "../documents/types.js";
import type { ContractFields, ExtractedField } from "../extraction/field-extractor.js";
import type { CitationsEvent } from "../streaming/types.js";
import type { Answer } from "../synthesis/types.js";

// ── Requests ───────────────────────────────────────────────────────

export type ClientRequest =
  | { type: "ask"; requestId: string; question: string; documentIds?: string[]; stream: boolean }
  | { type: "cancel"; requestId: string }
  | { type: "audit"; requestId: string; documentId: string }
  | { type: "extract"; requestId: string; documentId: string }
  | { type: "ingest"; requestId: string; fileName: string; bytes: Buffer }
  | { type: "list_documents"; requestId: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(message: Record<string, unknown>, key: string): string {
  const value = message[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InputError(`"${key}" must be a non-empty string.`, "INVALID_REQUEST");
  }
  return value.trim();
}

function optionalIds(message: Record<string, unknown>): string[] | undefined {
  const value = message["document_ids"];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((id): id is string => typeof id === "string")) {
    throw new InputError('"document_ids" must be an array of strings.', "INVALID_REQUEST");
  }
  return value.length > 0 ? value : undefined;
}

/** The request id of a malformed message, when it carries one, so errors can be correlated. */
export function peekRequestId(data: unknown): string | undefined {
  return isObject(data) && typeof data["request_id"] === "string" ? data["request_id"] : undefined;
}

export function parseRequest(data: unknown): ClientRequest {
  if (!isObject(data)) {
    throw new InputError("Message must be a JSON object.", "INVALID_REQUEST");
  }
  const requestId = requireString(data, "request_id");

  switch (data["type"]) {
    case "ask": {
      const question = typeof data["question"] === "string" ? data["question"] : "";
      const documentIds = optionalIds(data);
      return {
        type: "ask",
        requestId,
        question,
        stream: data["stream"] === true,
        ...(documentIds ? { documentIds } : {}),
      };
    }
    case "cancel":
      return { type: "cancel", requestId };
    case "audit":
      return { type: "audit", requestId, documentId: requireString(data, "document_id") };
    case "extract":
      return { type: "extract", requestId, documentId: requireString(data, "document_id") };
    case "ingest":
      return {
        type: "ingest",
        requestId,
        fileName: requireString(data, "file_name"),
        bytes: Buffer.from(requireString(data, "content_base64"), "base64"),
      };
    case "list_documents":
      return { type: "list_documents", requestId };
    default:
      throw new InputError(`Unknown message type: ${String(data["type"])}`, "INVALID_REQUEST");
  }
}

// ── Responses ──────────────────────────────────────────────────────

export interface WireCitation {
  document_id: string;
  page: number;
  char_range: [number, number];
  text_snippet: string;
}

export interface WireFinding {
  rule_id: string;
  risk_type: string;
  severity: string;
  description: string;
  document_id: string;
  evidence: WireCitation;
}

export interface WireField {
  value: string;
  normalized: string | null;
  citation: WireCitation;
}

export function toWireCitation(citation: Citation): WireCitation {
  return {
    document_id: citation.documentId,
    page: citation.page,
    char_range: [citation.charRange[0], citation.charRange[1]],
    text_snippet: citation.textSnippet,
  };
}

export function toWireAnswer(requestId: string, answer: Answer): Record<string, unknown> {
  return {
    type: "answer",
    request_id: requestId,
    answer: answer.text,
    citations: answer.citations.map(toWireCitation),
    strategy: answer.strategy,
    relevance_signal: answer.relevanceSignal,
  };
}

export function toWireFragment(requestId: string, text: string): Record<string, unknown> {
  return { type: "fragment", request_id: requestId, text };
}

export function toWireCitationsEvent(requestId: string, event: CitationsEvent): Record<string, unknown> {
  return {
    type: "citations",
    request_id: requestId,
    citations: event.citations.map(toWireCitation),
    strategy: event.strategy,
  };
}

export function toWireFinding(finding: Finding): WireFinding {
  return {
    rule_id: finding.ruleId,
    risk_type: finding.riskType,
    severity: finding.severity,
    description: finding.description,
    document_id: finding.documentId,
    evidence: toWireCitation(finding.evidence),
  };
}

export function toWireAudit(
  requestId: string,
  documentId: string,
  findings: readonly Finding[],
  ruleLibraryVersion: string | undefined,
): Record<string, unknown> {
  return {
    type: "audit",
    request_id: requestId,
    document_id: documentId,
    findings: findings.map(toWireFinding),
    count: findings.length,
    rule_library_version: ruleLibraryVersion ?? null,
  };
}

function toWireField(field: ExtractedField | null): WireField | null {
  if (!field) return null;
  return { value: field.value, normalized: field.normalized ?? null, citation: toWireCitation(field.citation) };
}

export function toWireFields(requestId: string, documentId: string, fields: ContractFields): Record<string, unknown> {
  return {
    type: "fields",
    request_id: requestId,
    document_id: documentId,
    fields: {
      parties: fields.parties.map((party) => toWireField(party)),
      effective_date: toWireField(fields.effectiveDate),
      term: toWireField(fields.term),
      governing_law: toWireField(fields.governingLaw),
      payment_terms: toWireField(fields.paymentTerms),
      termination: toWireField(fields.termination),
      auto_renewal: toWireField(fields.autoRenewal),
      confidentiality: toWireField(fields.confidentiality),
      indemnity: toWireField(fields.indemnity),
      liability_cap: toWireField(fields.liabilityCap),
    },
  };
}

function toWireWarning(warning: DataTruncationWarning): Record<string, unknown> {
  return {
    code: warning.code,
    message: warning.message,
    page: warning.page ?? null,
    original_length: warning.originalLength,
    kept_length: warning.keptLength,
  };
}

export function toWireIngested(requestId: string, result: IngestionResult): Record<string, unknown> {
  return {
    type: "ingested",
    request_id: requestId,
    document_id: result.documentId,
    file_name: result.fileName,
    page_count: result.pageCount,
    warnings: result.warnings.map(toWireWarning),
  };
}

export function toWireDocuments(requestId: string, documentIds: readonly string[]): Record<string, unknown> {
  return { type: "documents", request_id: requestId, document_ids: [...documentIds], count: documentIds.length };
}

export function toWireError(requestId: string | undefined, code: string, message: string): Record<string, unknown> {
  return { type: "error", request_id: requestId ?? null, code, message };
}
