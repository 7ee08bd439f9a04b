import { formatAudit, formatCitations, formatDocuments, formatFields, formatIngested } from "./format.js";
import type { ChatMessage, ServerMessage } from "./types.js";

export type PendingKind = "ask" | "audit" | "fields" | "ingest" | "docs";

export interface SessionState {
  messages: ChatMessage[];
  /** Request id to the kind of reply it awaits. */
  pending: Record<string, PendingKind>;
  /** Documents questions are limited to; null means every stored one. */
  scope: string[] | null;
}

export const INITIAL_SESSION: SessionState = { messages: [], pending: {}, scope: null };

const PENDING_LABELS: Record<PendingKind, string> = {
  ask: "Answering",
  audit: "Auditing",
  fields: "Extracting fields",
  ingest: "Ingesting",
  docs: "Listing documents",
};

let nextId = 1;

export function createMessage(role: ChatMessage["role"], content: string, requestId?: string): ChatMessage {
  return {
    id: String(nextId++),
    role,
    content,
    timestamp: Date.now(),
    ...(requestId ? { requestId } : {}),
  };
}

export function pushMessage(state: SessionState, message: ChatMessage): SessionState {
  return { ...state, messages: [...state.messages, message] };
}

/** Records an outgoing request; asks also open an empty reply that fragments fill. */
export function beginRequest(state: SessionState, requestId: string, kind: PendingKind): SessionState {
  const pending = { ...state.pending, [requestId]: kind };
  const messages = kind === "ask" ? [...state.messages, createMessage("assistant", "", requestId)] : state.messages;
  return { ...state, pending, messages };
}

export function pendingLabel(state: SessionState): string | null {
  const kinds = Object.values(state.pending);
  const first = kinds[0];
  return first ? PENDING_LABELS[first] : null;
}

/** The newest ask still streaming, which /cancel targets. */
export function activeAsk(state: SessionState): string | null {
  const asks = Object.entries(state.pending).filter(([, kind]) => kind === "ask");
  const last = asks[asks.length - 1];
  return last ? last[0] : null;
}

function settle(state: SessionState, requestId: string): Record<string, PendingKind> {
  const rest = { ...state.pending };
  delete rest[requestId];
  return rest;
}

function updateReply(
  messages: ChatMessage[],
  requestId: string,
  update: (content: string) => string,
  finished: boolean,
): ChatMessage[] | null {
  const index = messages.findIndex((message) => message.requestId === requestId);
  const target = messages[index];
  if (!target) return null;

  const next: ChatMessage = { id: target.id, role: target.role, content: update(target.content), timestamp: target.timestamp };
  if (!finished) next.requestId = requestId;
  return [...messages.slice(0, index), next, ...messages.slice(index + 1)];
}

function finishWith(state: SessionState, requestId: string, text: string): SessionState {
  return {
    ...state,
    pending: settle(state, requestId),
    messages: [...state.messages, createMessage("assistant", text)],
  };
}

export function applyServerMessage(state: SessionState, message: ServerMessage): SessionState {
  switch (message.type) {
    case "fragment": {
      const messages = updateReply(state.messages, message.request_id, (content) => content + message.text, false);
      return messages ? { ...state, messages } : state;
    }
    case "citations": {
      const suffix = formatCitations(message.citations);
      const messages = updateReply(state.messages, message.request_id, (content) => `${content}\n\n${suffix}`, true);
      return { ...state, pending: settle(state, message.request_id), messages: messages ?? state.messages };
    }
    case "answer": {
      const text = `${message.answer}\n\n${formatCitations(message.citations)}`;
      const messages = updateReply(state.messages, message.request_id, () => text, true);
      if (messages) return { ...state, pending: settle(state, message.request_id), messages };
      return finishWith(state, message.request_id, text);
    }
    case "cancelled": {
      const messages = updateReply(state.messages, message.request_id, (content) => `${content} [cancelled]`.trimStart(), true);
      return { ...state, pending: settle(state, message.request_id), messages: messages ?? state.messages };
    }
    case "audit":
      return finishWith(state, message.request_id, formatAudit(message));
    case "fields":
      return finishWith(state, message.request_id, formatFields(message));
    case "ingested":
      return finishWith(state, message.request_id, formatIngested(message));
    case "documents":
      return finishWith(state, message.request_id, formatDocuments(message, state.scope));
    case "error": {
      const text = `[${message.code}] ${message.message}`;
      if (message.request_id === null) {
        return pushMessage(state, createMessage("system", text));
      }
      const messages = updateReply(state.messages, message.request_id, () => text, true);
      if (messages) return { ...state, pending: settle(state, message.request_id), messages };
      return finishWith(state, message.request_id, text);
    }
  }
}
