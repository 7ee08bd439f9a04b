import { InputError, errorMessage } from "../core/errors.js";
import type { DocumentIngestor } from "../documents/ingestion.js";
import type { ContractEngine } from "../engine/index.js";
import { devError, devLog } from "../shared/index.js";
import {
  parseRequest,
  peekRequestId,
  toWireAnswer,
  toWireAudit,
  toWireCitationsEvent,
  toWireDocuments,
  toWireError,
  toWireFields,
  toWireFragment,
  toWireIngested,
  type ClientRequest,
} from "./wire.js";

export interface QaGatewayOptions {
  engine: ContractEngine;
  ingestor: DocumentIngestor;
  send: (clientId: string, data: unknown) => void;
}

/**
 * Routes client messages to the engine and replies with wire objects.
 * Streams in flight are tracked per (client, request) so `cancel` and
 * disconnects abort the provider call behind them.
 */
export class QaGateway {
  private readonly engine: ContractEngine;
  private readonly ingestor: DocumentIngestor;
  private readonly send: (clientId: string, data: unknown) => void;
  private readonly active = new Map<string, { clientId: string; controller: AbortController }>();

  constructor(options: QaGatewayOptions) {
    this.engine = options.engine;
    this.ingestor = options.ingestor;
    this.send = options.send;
  }

  get activeStreamCount(): number {
    return this.active.size;
  }

  handleMessage(clientId: string, data: unknown): void {
    let request: ClientRequest;
    try {
      request = parseRequest(data);
    } catch (err) {
      this.replyError(clientId, peekRequestId(data), err);
      return;
    }

    if (request.type === "cancel") {
      this.cancel(clientId, request.requestId);
      return;
    }
    void this.dispatch(clientId, request);
  }

  /** Aborts every stream the client still has open. */
  disconnect(clientId: string): void {
    for (const [key, entry] of this.active) {
      if (entry.clientId !== clientId) continue;
      entry.controller.abort();
      this.active.delete(key);
    }
  }

  private cancel(clientId: string, requestId: string): void {
    const entry = this.active.get(this.key(clientId, requestId));
    if (!entry) return;
    devLog(`Cancelling request ${requestId} for ${clientId}`);
    entry.controller.abort();
  }

  private async dispatch(clientId: string, request: Exclude<ClientRequest, { type: "cancel" }>): Promise<void> {
    const { requestId } = request;
    try {
      switch (request.type) {
        case "ask":
          if (request.stream) {
            await this.streamAnswer(clientId, requestId, request.question, request.documentIds);
          } else {
            const answer = await this.engine.getAnswer(request.question, request.documentIds);
            this.send(clientId, toWireAnswer(requestId, answer));
          }
          return;
        case "audit": {
          const findings = await this.engine.getAudit(request.documentId);
          this.send(clientId, toWireAudit(requestId, request.documentId, findings, this.engine.ruleLibraryVersion));
          return;
        }
        case "extract": {
          const fields = await this.engine.extractFields(request.documentId);
          this.send(clientId, toWireFields(requestId, request.documentId, fields));
          return;
        }
        case "ingest": {
          const result = await this.ingestor.ingest({ fileName: request.fileName, bytes: request.bytes });
          this.send(clientId, toWireIngested(requestId, result));
          return;
        }
        case "list_documents":
          this.send(clientId, toWireDocuments(requestId, await this.engine.listDocuments()));
          return;
      }
    } catch (err) {
      this.replyError(clientId, requestId, err);
    }
  }

  private async streamAnswer(
    clientId: string,
    requestId: string,
    question: string,
    documentIds: string[] | undefined,
  ): Promise<void> {
    const key = this.key(clientId, requestId);
    if (this.active.has(key)) {
      throw new InputError(`Request ${requestId} is already streaming.`, "INVALID_REQUEST");
    }
    const controller = new AbortController();
    this.active.set(key, { clientId, controller });

    try {
      const stream = await this.engine.getAnswerStream(question, documentIds, { signal: controller.signal });
      for await (const event of stream) {
        if (event.type === "fragment") {
          this.send(clientId, toWireFragment(requestId, event.text));
        } else {
          this.send(clientId, toWireCitationsEvent(requestId, event));
        }
      }
      if (controller.signal.aborted) {
        this.send(clientId, { type: "cancelled", request_id: requestId });
      }
    } finally {
      this.active.delete(key);
    }
  }

  private replyError(clientId: string, requestId: string | undefined, err: unknown): void {
    if (err instanceof InputError) {
      this.send(clientId, toWireError(requestId, err.code, err.message));
      return;
    }
    devError(`Request ${requestId ?? "(unknown)"} from ${clientId} failed:`, errorMessage(err));
    this.send(clientId, toWireError(requestId, "INTERNAL", errorMessage(err)));
  }

  private key(clientId: string, requestId: string): string {
    return `${clientId}:${requestId}`;
  }
}
