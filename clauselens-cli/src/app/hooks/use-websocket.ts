import { useState, useEffect, useRef, useCallback } from "react";
import WebSocket from "ws";
import { parseServerMessage } from "../protocol.js";
import type { ClientRequest, ServerMessage } from "../types.js";

const DEFAULT_URL = "ws://localhost:8080";
const INITIAL_RECONNECT_MS = 500;
const MAX_RECONNECT_MS = 10_000;

export function resolveServerUrl(env: Readonly<Record<string, string | undefined>> = process.env): string {
  const configured = env["CLAUSELENS_URL"]?.trim();
  return configured && configured.length > 0 ? configured : DEFAULT_URL;
}

export function reconnectDelay(attempt: number): number {
  return Math.min(INITIAL_RECONNECT_MS * 2 ** attempt, MAX_RECONNECT_MS);
}

type UseWebSocketOptions = {
  onMessage: (message: ServerMessage) => void;
  onProtocolError?: (detail: string) => void;
};

type UseWebSocketReturn = {
  send: (request: ClientRequest) => boolean;
  connected: boolean;
};

/** Keeps one socket to the server open, reconnecting with backoff after it drops. */
export function useWebSocket({ onMessage, onProtocolError }: UseWebSocketOptions): UseWebSocketReturn {
  const [connected, setConnected] = useState(false);
  const socket = useRef<WebSocket | null>(null);
  const handlers = useRef({ onMessage, onProtocolError });
  handlers.current = { onMessage, onProtocolError };

  useEffect(() => {
    const url = resolveServerUrl();
    let attempt = 0;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let disposed = false;

    const connect = (): void => {
      const ws = new WebSocket(url);
      socket.current = ws;

      ws.on("open", () => {
        attempt = 0;
        setConnected(true);
      });

      ws.on("message", (raw) => {
        const message = parseServerMessage(raw.toString());
        if (message) {
          handlers.current.onMessage(message);
        } else {
          handlers.current.onProtocolError?.("Ignored a message the server sent in an unknown shape.");
        }
      });

      ws.on("close", () => {
        setConnected(false);
        if (socket.current === ws) socket.current = null;
        if (disposed) return;
        timer = setTimeout(connect, reconnectDelay(attempt));
        attempt++;
      });

      // close follows; only the first failure in a row is reported
      ws.on("error", (err) => {
        if (attempt === 0) handlers.current.onProtocolError?.(`Connection error: ${err.message}`);
      });
    };

    connect();

    return () => {
      disposed = true;
      if (timer) clearTimeout(timer);
      socket.current?.close();
      socket.current = null;
    };
  }, []);

  const send = useCallback((request: ClientRequest): boolean => {
    const ws = socket.current;
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;
    ws.send(JSON.stringify(request));
    return true;
  }, []);

  return { send, connected };
}
