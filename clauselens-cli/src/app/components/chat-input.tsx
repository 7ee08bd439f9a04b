import React from "react";
import { Box, Text } from "ink";
import TextInput from "ink-text-input";

type Props = {
  readonly value: string;
  readonly streaming: boolean;
  readonly onChange: (value: string) => void;
  readonly onSubmit: (value: string) => void;
};

// Stays focused while an answer streams so /cancel can be typed.
export function ChatInput({ value, streaming, onChange, onSubmit }: Props): React.JSX.Element {
  return (
    <Box borderStyle="single" borderColor={streaming ? "yellow" : "gray"} paddingX={1}>
      <Text color={streaming ? "yellow" : "green"} bold>
        {streaming ? "…" : "?"}{" "}
      </Text>
      <TextInput
        value={value}
        onChange={onChange}
        onSubmit={onSubmit}
        placeholder={streaming ? "Answer streaming; /cancel stops it" : "Ask about your contracts, or /help"}
        showCursor
      />
    </Box>
  );
}
