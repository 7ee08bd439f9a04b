export type ChatMessage = {
  id: string;
  role: "user" | "assistant" | "system";
  content: string;
  timestamp: number;
  /** Set while fragments for this request are still arriving. */
  requestId?: string;
};

// ── Requests ───────────────────────────────────────────────────────

export interface AskRequest {
  type: "ask";
  request_id: string;
  question: string;
  document_ids?: string[];
  stream: boolean;
}

export interface CancelRequest {
  type: "cancel";
  request_id: string;
}

export interface AuditRequest {
  type: "audit";
  request_id: string;
  document_id: string;
}

export interface ExtractRequest {
  type: "extract";
  request_id: string;
  document_id: string;
}

export interface IngestRequest {
  type: "ingest";
  request_id: string;
  file_name: string;
  content_base64: string;
}

export interface ListDocumentsRequest {
  type: "list_documents";
  request_id: string;
}

export type ClientRequest =
  | AskRequest
  | CancelRequest
  | AuditRequest
  | ExtractRequest
  | IngestRequest
  | ListDocumentsRequest;

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

export interface WireWarning {
  code: string;
  message: string;
  page: number | null;
  original_length: number;
  kept_length: number;
}

export interface AnswerMessage {
  type: "answer";
  request_id: string;
  answer: string;
  citations: WireCitation[];
  strategy: string;
  relevance_signal: string;
}

export interface FragmentMessage {
  type: "fragment";
  request_id: string;
  text: string;
}

export interface CitationsMessage {
  type: "citations";
  request_id: string;
  citations: WireCitation[];
  strategy: string;
}

export interface CancelledMessage {
  type: "cancelled";
  request_id: string;
}

export interface AuditMessage {
  type: "audit";
  request_id: string;
  document_id: string;
  findings: WireFinding[];
  count: number;
  rule_library_version: string | null;
}

export interface FieldsMessage {
  type: "fields";
  request_id: string;
  document_id: string;
  fields: Record<string, WireField | WireField[] | null>;
}

export interface IngestedMessage {
  type: "ingested";
  request_id: string;
  document_id: string;
  file_name: string;
  page_count: number;
  warnings: WireWarning[];
}

export interface DocumentsMessage {
  type: "documents";
  request_id: string;
  document_ids: string[];
  count: number;
}

export interface ErrorMessage {
  type: "error";
  request_id: string | null;
  code: string;
  message: string;
}

export type ServerMessage =
  | AnswerMessage
  | FragmentMessage
  | CitationsMessage
  | CancelledMessage
  | AuditMessage
  | FieldsMessage
  | IngestedMessage
  | DocumentsMessage
  | ErrorMessage;
