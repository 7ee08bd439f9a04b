import { describe, it, expect } from "vitest";
import {
  INITIAL_SESSION,
  activeAsk,
  applyServerMessage,
  beginRequest,
  pendingLabel,
} from "../../src/app/session.js";

describe("session", () => {
  it("should accumulate fragments into the open reply", () => {
    let state = beginRequest(INITIAL_SESSION, "req-1", "ask");
    state = applyServerMessage(state, { type: "fragment", request_id: "req-1", text: "The term " });
    state = applyServerMessage(state, { type: "fragment", request_id: "req-1", text: "is two years." });

    expect(state.messages).toHaveLength(1);
    expect(state.messages[0]?.content).toBe("The term is two years.");
    expect(state.messages[0]?.requestId).toBe("req-1");
    expect(pendingLabel(state)).toBe("Answering");
  });

  it("should close the reply when citations arrive", () => {
    let state = beginRequest(INITIAL_SESSION, "req-1", "ask");
    state = applyServerMessage(state, { type: "fragment", request_id: "req-1", text: "Two years." });
    state = applyServerMessage(state, { type: "citations", request_id: "req-1", citations: [], strategy: "extractive" });

    expect(state.messages[0]?.content).toBe("Two years.\n\nSources: none");
    expect(state.messages[0]?.requestId).toBeUndefined();
    expect(state.pending).toEqual({});
    expect(pendingLabel(state)).toBeNull();
  });

  it("should mark cancelled replies", () => {
    let state = beginRequest(INITIAL_SESSION, "req-1", "ask");
    state = applyServerMessage(state, { type: "fragment", request_id: "req-1", text: "Partial" });
    state = applyServerMessage(state, { type: "cancelled", request_id: "req-1" });

    expect(state.messages[0]?.content).toBe("Partial [cancelled]");
    expect(activeAsk(state)).toBeNull();
  });

  it("should target the newest streaming ask for cancellation", () => {
    let state = beginRequest(INITIAL_SESSION, "req-1", "ask");
    state = beginRequest(state, "req-2", "audit");
    state = beginRequest(state, "req-3", "ask");
    expect(activeAsk(state)).toBe("req-3");
  });

  it("should report request errors as assistant messages", () => {
    let state = beginRequest(INITIAL_SESSION, "req-1", "audit");
    state = applyServerMessage(state, {
      type: "error",
      request_id: "req-1",
      code: "DOCUMENT_NOT_FOUND",
      message: "Document missing-doc not found.",
    });

    expect(state.pending).toEqual({});
    expect(state.messages).toHaveLength(1);
    expect(state.messages[0]?.role).toBe("assistant");
    expect(state.messages[0]?.content).toBe("[DOCUMENT_NOT_FOUND] Document missing-doc not found.");
  });

  it("should show uncorrelated errors as system notes", () => {
    const state = applyServerMessage(INITIAL_SESSION, {
      type: "error",
      request_id: null,
      code: "INVALID_REQUEST",
      message: "Message must be a JSON object.",
    });
    expect(state.messages[0]?.role).toBe("system");
  });

  it("should ignore fragments for unknown requests", () => {
    const state = applyServerMessage(INITIAL_SESSION, { type: "fragment", request_id: "nope", text: "x" });
    expect(state).toBe(INITIAL_SESSION);
  });
});
