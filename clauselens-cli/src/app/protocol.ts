import type { ServerMessage, WireCitation, WireField, WireFinding, WireWarning } from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function toCitation(value: unknown): WireCitation | null {
  if (!isObject(value)) return null;
  const range = value["char_range"];
  if (
    typeof value["document_id"] !== "string" ||
    !isNumber(value["page"]) ||
    typeof value["text_snippet"] !== "string" ||
    !Array.isArray(range) ||
    range.length !== 2
  ) {
    return null;
  }
  const [start, end] = range;
  if (!isNumber(start) || !isNumber(end)) return null;
  return {
    document_id: value["document_id"],
    page: value["page"],
    char_range: [start, end],
    text_snippet: value["text_snippet"],
  };
}

function toList<T>(value: unknown, convert: (item: unknown) => T | null): T[] | null {
  if (!Array.isArray(value)) return null;
  const out: T[] = [];
  for (const item of value) {
    const converted = convert(item);
    if (converted === null) return null;
    out.push(converted);
  }
  return out;
}

function toFinding(value: unknown): WireFinding | null {
  if (!isObject(value)) return null;
  const evidence = toCitation(value["evidence"]);
  const { rule_id, risk_type, severity, description, document_id } = value;
  if (
    !evidence ||
    typeof rule_id !== "string" ||
    typeof risk_type !== "string" ||
    typeof severity !== "string" ||
    typeof description !== "string" ||
    typeof document_id !== "string"
  ) {
    return null;
  }
  return { rule_id, risk_type, severity, description, document_id, evidence };
}

function toField(value: unknown): WireField | null {
  if (!isObject(value)) return null;
  const citation = toCitation(value["citation"]);
  const normalized = value["normalized"];
  if (!citation || typeof value["value"] !== "string") return null;
  return {
    value: value["value"],
    normalized: typeof normalized === "string" ? normalized : null,
    citation,
  };
}

function toFields(value: unknown): Record<string, WireField | WireField[] | null> | null {
  if (!isObject(value)) return null;
  const out: Record<string, WireField | WireField[] | null> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null) {
      out[key] = null;
      continue;
    }
    const converted = Array.isArray(entry) ? toList(entry, toField) : toField(entry);
    if (converted === null) return null;
    out[key] = converted;
  }
  return out;
}

function toWarning(value: unknown): WireWarning | null {
  if (!isObject(value)) return null;
  const { code, message, page, original_length, kept_length } = value;
  if (typeof code !== "string" || typeof message !== "string" || !isNumber(original_length) || !isNumber(kept_length)) {
    return null;
  }
  return { code, message, page: isNumber(page) ? page : null, original_length, kept_length };
}

function toStringList(value: unknown): string[] | null {
  return toList(value, (item) => (typeof item === "string" ? item : null));
}

/** Parses one frame from the server; null for anything not in the protocol. */
export function parseServerMessage(raw: string): ServerMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isObject(data)) return null;

  const requestId = data["request_id"];
  if (data["type"] === "error") {
    const { code, message } = data;
    if (typeof code !== "string" || typeof message !== "string") return null;
    return { type: "error", request_id: typeof requestId === "string" ? requestId : null, code, message };
  }
  if (typeof requestId !== "string") return null;

  switch (data["type"]) {
    case "answer": {
      const citations = toList(data["citations"], toCitation);
      const { answer, strategy, relevance_signal } = data;
      if (!citations || typeof answer !== "string" || typeof strategy !== "string") return null;
      return {
        type: "answer",
        request_id: requestId,
        answer,
        citations,
        strategy,
        relevance_signal: typeof relevance_signal === "string" ? relevance_signal : "lexical",
      };
    }
    case "fragment":
      return typeof data["text"] === "string" ? { type: "fragment", request_id: requestId, text: data["text"] } : null;
    case "citations": {
      const citations = toList(data["citations"], toCitation);
      if (!citations || typeof data["strategy"] !== "string") return null;
      return { type: "citations", request_id: requestId, citations, strategy: data["strategy"] };
    }
    case "cancelled":
      return { type: "cancelled", request_id: requestId };
    case "audit": {
      const findings = toList(data["findings"], toFinding);
      const version = data["rule_library_version"];
      if (!findings || typeof data["document_id"] !== "string") return null;
      return {
        type: "audit",
        request_id: requestId,
        document_id: data["document_id"],
        findings,
        count: findings.length,
        rule_library_version: typeof version === "string" ? version : null,
      };
    }
    case "fields": {
      const fields = toFields(data["fields"]);
      if (!fields || typeof data["document_id"] !== "string") return null;
      return { type: "fields", request_id: requestId, document_id: data["document_id"], fields };
    }
    case "ingested": {
      const warnings = toList(data["warnings"], toWarning);
      const { document_id, file_name, page_count } = data;
      if (!warnings || typeof document_id !== "string" || typeof file_name !== "string" || !isNumber(page_count)) {
        return null;
      }
      return { type: "ingested", request_id: requestId, document_id, file_name, page_count, warnings };
    }
    case "documents": {
      const ids = toStringList(data["document_ids"]);
      if (!ids) return null;
      return { type: "documents", request_id: requestId, document_ids: ids, count: ids.length };
    }
    default:
      return null;
  }
}
