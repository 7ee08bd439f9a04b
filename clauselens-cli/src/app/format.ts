import type {
  AuditMessage,
  DocumentsMessage,
  FieldsMessage,
  IngestedMessage,
  WireCitation,
  WireField,
} from "./types.js";

const SNIPPET_LIMIT = 120;

function clip(text: string, limit = SNIPPET_LIMIT): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > limit ? `${flat.slice(0, limit - 3)}...` : flat;
}

export function formatCitation(citation: WireCitation, index: number): string {
  const [start, end] = citation.char_range;
  return `[${index + 1}] ${citation.document_id} p.${citation.page} (${start}-${end}): "${clip(citation.text_snippet)}"`;
}

export function formatCitations(citations: readonly WireCitation[]): string {
  if (citations.length === 0) return "Sources: none";
  return ["Sources:", ...citations.map(formatCitation)].join("\n");
}

export function formatAudit(message: AuditMessage): string {
  const version = message.rule_library_version ? ` (rules v${message.rule_library_version})` : "";
  if (message.findings.length === 0) {
    return `No risks found in ${message.document_id}${version}.`;
  }
  const lines = [`${message.count} finding(s) in ${message.document_id}${version}:`];
  for (const finding of message.findings) {
    lines.push(`${finding.severity.toUpperCase()} ${finding.rule_id} ${finding.risk_type}`);
    lines.push(`  ${finding.description}`);
    lines.push(`  p.${finding.evidence.page}: "${clip(finding.evidence.text_snippet)}"`);
  }
  return lines.join("\n");
}

function fieldLabel(key: string): string {
  return key.replace(/_/g, " ");
}

function fieldValue(field: WireField): string {
  const normalized = field.normalized && field.normalized !== field.value ? ` => ${field.normalized}` : "";
  return `${clip(field.value, 80)}${normalized} (p.${field.citation.page})`;
}

export function formatFields(message: FieldsMessage): string {
  const lines = [`Fields for ${message.document_id}:`];
  for (const [key, entry] of Object.entries(message.fields)) {
    if (entry === null || (Array.isArray(entry) && entry.length === 0)) {
      lines.push(`  ${fieldLabel(key)}: not found`);
    } else if (Array.isArray(entry)) {
      lines.push(`  ${fieldLabel(key)}: ${entry.map(fieldValue).join("; ")}`);
    } else {
      lines.push(`  ${fieldLabel(key)}: ${fieldValue(entry)}`);
    }
  }
  return lines.join("\n");
}

export function formatIngested(message: IngestedMessage): string {
  const lines = [`Ingested ${message.file_name} as ${message.document_id} (${message.page_count} page(s)).`];
  for (const warning of message.warnings) {
    lines.push(`  warning ${warning.code}: ${warning.message}`);
  }
  return lines.join("\n");
}

export function formatDocuments(message: DocumentsMessage, selected: readonly string[] | null): string {
  if (message.document_ids.length === 0) {
    return "No documents stored yet. Use /ingest <path>.";
  }
  const active = new Set(selected ?? message.document_ids);
  const lines = [`${message.count} document(s):`];
  for (const id of message.document_ids) {
    lines.push(`${active.has(id) ? "*" : " "} ${id}`);
  }
  return lines.join("\n");
}
