import React, { useState, useCallback, useEffect } from "react";
import { Box } from "ink";
import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { Header } from "./components/header.js";
import { MessageList } from "./components/message-list.js";
import { ChatInput } from "./components/chat-input.js";
import { StatusBar } from "./components/status-bar.js";
import { useWebSocket } from "./hooks/use-websocket.js";
import { HELP_TEXT, parseCommand, type Command } from "./commands.js";
import {
  INITIAL_SESSION,
  activeAsk,
  applyServerMessage,
  beginRequest,
  createMessage,
  pendingLabel,
  pushMessage,
  type PendingKind,
} from "./session.js";
import type { ClientRequest, ServerMessage } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_MESSAGE_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;

let nextRequest = 1;

function newRequestId(): string {
  return `req-${nextRequest++}`;
}

export function App(): React.JSX.Element {
  const [session, setSession] = useState(INITIAL_SESSION);
  const [inputValue, setInputValue] = useState("");
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(
        Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
      );
    };

    process.stdout.on("resize", handleResize);

    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  const note = useCallback((content: string) => {
    setSession((prev) => pushMessage(prev, createMessage("system", content)));
  }, []);

  const onMessage = useCallback((message: ServerMessage) => {
    setSession((prev) => applyServerMessage(prev, message));
  }, []);

  const { send, connected } = useWebSocket({ onMessage, onProtocolError: note });

  const dispatch = useCallback(
    (request: ClientRequest, kind: PendingKind) => {
      if (!send(request)) {
        note("Not connected to the ClauseLens server.");
        return;
      }
      setSession((prev) => beginRequest(prev, request.request_id, kind));
    },
    [send, note],
  );

  const ingest = useCallback(
    async (path: string) => {
      const absolutePath = resolve(path);
      const bytes = await readFile(absolutePath);
      dispatch(
        {
          type: "ingest",
          request_id: newRequestId(),
          file_name: basename(absolutePath),
          content_base64: bytes.toString("base64"),
        },
        "ingest",
      );
    },
    [dispatch],
  );

  const runCommand = useCallback(
    (command: Command) => {
      switch (command.kind) {
        case "ask": {
          setSession((prev) => pushMessage(prev, createMessage("user", command.question)));
          const documentIds = session.scope;
          dispatch(
            {
              type: "ask",
              request_id: newRequestId(),
              question: command.question,
              stream: true,
              ...(documentIds ? { document_ids: documentIds } : {}),
            },
            "ask",
          );
          return;
        }
        case "ingest":
          ingest(command.path).catch((err: unknown) => {
            note(`Could not read ${command.path}: ${err instanceof Error ? err.message : String(err)}`);
          });
          return;
        case "docs":
          dispatch({ type: "list_documents", request_id: newRequestId() }, "docs");
          return;
        case "use":
          setSession((prev) => ({ ...prev, scope: command.documentIds }));
          note(command.documentIds ? `Asking over: ${command.documentIds.join(", ")}` : "Asking over all documents.");
          return;
        case "audit":
          dispatch({ type: "audit", request_id: newRequestId(), document_id: command.documentId }, "audit");
          return;
        case "fields":
          dispatch({ type: "extract", request_id: newRequestId(), document_id: command.documentId }, "fields");
          return;
        case "cancel": {
          const requestId = activeAsk(session);
          if (!requestId) {
            note("Nothing to cancel.");
            return;
          }
          send({ type: "cancel", request_id: requestId });
          return;
        }
        case "help":
          note(HELP_TEXT);
          return;
        case "invalid":
          note(command.message);
          return;
      }
    },
    [dispatch, ingest, note, send, session],
  );

  const handleSubmit = useCallback(
    (value: string) => {
      if (value.trim().length === 0) return;
      setInputValue("");
      runCommand(parseCommand(value));
    },
    [runCommand],
  );

  const messageViewportHeight = Math.max(
    MIN_MESSAGE_ROWS,
    terminalRows - RESERVED_ROWS,
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header scope={session.scope} />
      <MessageList
        messages={session.messages}
        height={messageViewportHeight}
        width={terminalColumns - 2}
      />
      <StatusBar pendingLabel={pendingLabel(session)} connected={connected} />
      <ChatInput
        value={inputValue}
        streaming={activeAsk(session) !== null}
        onChange={setInputValue}
        onSubmit={handleSubmit}
      />
    </Box>
  );
}
