import React, { useEffect, useMemo, useRef, useState } from "react";
import { Box, Text, useInput, type Key } from "ink";
import { clamp, followTail, scrollTo, toDisplayLines, type ScrollKey } from "../layout.js";
import type { ChatMessage } from "../types.js";

type Props = {
  readonly messages: ChatMessage[];
  readonly height: number;
  readonly width: number;
};

const EMPTY_HINT = "Ingest a contract with /ingest <path>, then ask a question.";

function toScrollKey(key: Key): ScrollKey | null {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.pageUp) return "pageUp";
  if (key.pageDown) return "pageDown";
  if (key.home) return "home";
  if (key.end) return "end";
  return null;
}

export function MessageList({ messages, height, width }: Props): React.JSX.Element {
  const lines = useMemo(() => toDisplayLines(messages, width), [messages, width]);
  const viewport = Math.max(1, height);
  const maxTop = Math.max(0, lines.length - viewport);

  const [scrollTop, setScrollTop] = useState(0);
  const previousMaxTop = useRef(0);

  useEffect(() => {
    const next = followTail(scrollTop, previousMaxTop.current, maxTop);
    previousMaxTop.current = maxTop;
    if (next !== scrollTop) setScrollTop(next);
  }, [maxTop, scrollTop]);

  useInput((_, key) => {
    const scrollKey = toScrollKey(key);
    if (!scrollKey || lines.length === 0) return;
    setScrollTop((top) => scrollTo(top, scrollKey, { viewport, maxTop }));
  });

  if (messages.length === 0) {
    return (
      <Box justifyContent="center" alignItems="center" height={viewport}>
        <Text dimColor>{EMPTY_HINT}</Text>
      </Box>
    );
  }

  const start = clamp(scrollTop, 0, maxTop);
  const visible = lines.slice(start, start + viewport);

  return (
    <Box flexDirection="column" paddingX={1} height={viewport}>
      {visible.map((line, index) => (
        <Text key={`${start}-${index}`} color={line.color} bold={line.bold}>
          {line.text.length > 0 ? line.text : " "}
        </Text>
      ))}
    </Box>
  );
}
