export type Command =
  | { kind: "ask"; question: string }
  | { kind: "ingest"; path: string }
  | { kind: "docs" }
  | { kind: "use"; documentIds: string[] | null }
  | { kind: "audit"; documentId: string }
  | { kind: "fields"; documentId: string }
  | { kind: "cancel" }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

export const HELP_TEXT = [
  "Commands:",
  "  /ingest <path>      upload a PDF or text contract",
  "  /docs               list stored documents",
  "  /use <id...|all>    limit questions to some documents",
  "  /audit <id>         run the risk rules over a document",
  "  /fields <id>        extract key contract fields",
  "  /cancel             stop the answer being streamed",
  "Anything else is asked as a question.",
].join("\n");

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) {
    return { kind: "ask", question: trimmed };
  }

  const [name, ...rest] = trimmed.split(/\s+/);
  const args = rest.filter((arg) => arg.length > 0);
  const first = args[0];

  switch ((name ?? "").toLowerCase()) {
    case "/ingest": {
      // Paths may contain spaces, so everything after the command is kept.
      const path = trimmed.slice((name ?? "").length).trim();
      return path.length > 0 ? { kind: "ingest", path } : { kind: "invalid", message: "Usage: /ingest <path>" };
    }
    case "/docs":
      return { kind: "docs" };
    case "/use":
      if (!first) return { kind: "invalid", message: "Usage: /use <id...|all>" };
      return { kind: "use", documentIds: first.toLowerCase() === "all" ? null : [...new Set(args)] };
    case "/audit":
      return first ? { kind: "audit", documentId: first } : { kind: "invalid", message: "Usage: /audit <id>" };
    case "/fields":
      return first ? { kind: "fields", documentId: first } : { kind: "invalid", message: "Usage: /fields <id>" };
    case "/cancel":
      return { kind: "cancel" };
    case "/help":
      return { kind: "help" };
    default:
      return { kind: "invalid", message: `Unknown command ${name ?? ""}. Type /help for the list.` };
  }
}
