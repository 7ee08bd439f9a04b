import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { devDebug, devLog, devWarn, devError } from "../shared/index.js";
import { toWireError } from "./wire.js";

const DEFAULT_PORT = 8080;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30_000;
const MAX_RETRIES = 10;
/** Ingest uploads arrive base64-encoded inside a single frame. */
const DEFAULT_MAX_PAYLOAD_BYTES = 32 * 1024 * 1024;
const DEFAULT_HEARTBEAT_MS = 30_000;

export interface WsServerOptions {
  port?: number;
  host?: string;
  maxPayloadBytes?: number;
  /** Clients that miss a ping for this long are dropped; 0 disables pings. */
  heartbeatMs?: number;
  onMessage: (clientId: string, data: unknown) => void;
  onDisconnect?: (clientId: string) => void;
}

export type DecodedFrame = { ok: true; data: unknown } | { ok: false; text: string };

function frameText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export function decodeFrame(raw: RawData): DecodedFrame {
  const text = frameText(raw);
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, text };
  }
}

export function retryBackoff(attempt: number): number {
  return Math.min(INITIAL_BACKOFF_MS * 2 ** attempt, MAX_BACKOFF_MS);
}

interface Client {
  socket: WebSocket;
  alive: boolean;
}

export class WsServer {
  private readonly port: number;
  private readonly host?: string;
  private readonly maxPayloadBytes: number;
  private readonly heartbeatMs: number;
  private readonly onMessage: (clientId: string, data: unknown) => void;
  private readonly onDisconnect?: (clientId: string) => void;
  private wss: WebSocketServer | null = null;
  private readonly clients = new Map<string, Client>();
  private retryCount = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private stopping = false;

  constructor(options: WsServerOptions) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host;
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.onMessage = options.onMessage;
    this.onDisconnect = options.onDisconnect;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  async start(): Promise<void> {
    this.stopping = false;
    this.retryCount = 0;
    await this.bind();
    this.startHeartbeat();
  }

  private bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.port,
        maxPayload: this.maxPayloadBytes,
        ...(this.host ? { host: this.host } : {}),
      });
      this.wss = wss;

      wss.on("listening", () => {
        devLog(`WebSocket server listening on port ${this.port}`);
        this.retryCount = 0;
        resolve();
      });

      wss.on("connection", (socket) => this.accept(socket));

      wss.on("error", (err: NodeJS.ErrnoException) => {
        devError(`WebSocket server error: ${err.message}`);
        const first = this.retryCount === 0;
        this.scheduleRetry();
        // start() rejects on the first failure; retries continue in the background.
        if (first) reject(err);
      });
    });
  }

  private accept(socket: WebSocket): void {
    const clientId = randomUUID();
    const client: Client = { socket, alive: true };
    this.clients.set(clientId, client);
    devLog(`Client connected: ${clientId}`);

    socket.on("pong", () => {
      client.alive = true;
    });

    socket.on("message", (raw) => {
      const frame = decodeFrame(raw);
      if (!frame.ok) {
        devWarn(`Invalid JSON from ${clientId}: ${frame.text.slice(0, 200)}`);
        socket.send(JSON.stringify(toWireError(undefined, "INVALID_REQUEST", "Message is not valid JSON.")));
        return;
      }
      this.onMessage(clientId, frame.data);
    });

    socket.on("close", () => {
      this.clients.delete(clientId);
      devLog(`Client disconnected: ${clientId}`);
      this.onDisconnect?.(clientId);
    });

    socket.on("error", (err) => {
      devError(`Client error (${clientId}):`, err.message);
    });
  }

  private startHeartbeat(): void {
    if (this.heartbeatMs <= 0 || this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => {
      for (const [clientId, client] of this.clients) {
        if (!client.alive) {
          devWarn(`Client ${clientId} missed a heartbeat; dropping it`);
          client.socket.terminate();
          continue;
        }
        client.alive = false;
        client.socket.ping();
      }
    }, this.heartbeatMs);
    this.heartbeatTimer.unref();
  }

  private scheduleRetry(): void {
    if (this.stopping) return;

    if (this.retryCount >= MAX_RETRIES) {
      devError(`Max retries (${MAX_RETRIES}) reached. Giving up.`);
      return;
    }

    const backoff = retryBackoff(this.retryCount);
    this.retryCount++;
    devWarn(`Retrying in ${backoff}ms (attempt ${this.retryCount}/${MAX_RETRIES})...`);

    this.retryTimer = setTimeout(() => {
      if (this.stopping) return;
      devLog("Attempting to restart WebSocket server...");
      this.bind().then(
        () => this.startHeartbeat(),
        (err: unknown) => devDebug(`Rebind attempt failed: ${err instanceof Error ? err.message : String(err)}`),
      );
    }, backoff);
  }

  send(clientId: string, data: unknown): void {
    const client = this.clients.get(clientId);
    if (!client) {
      devDebug(`send(): client ${clientId} is gone`);
      return;
    }
    if (client.socket.readyState !== WebSocket.OPEN) return;
    client.socket.send(JSON.stringify(data));
  }

  async stop(): Promise<void> {
    this.stopping = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    for (const client of this.clients.values()) {
      client.socket.close(1001, "Server shutting down");
    }
    this.clients.clear();

    const wss = this.wss;
    if (!wss) return;
    await new Promise<void>((resolve) => {
      wss.close(() => {
        devLog("WebSocket server stopped");
        resolve();
      });
    });
    this.wss = null;
  }
}
