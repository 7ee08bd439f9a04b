import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

type Props = {
  readonly pendingLabel: string | null;
  readonly connected: boolean;
};

export function StatusBar({ pendingLabel, connected }: Props): React.JSX.Element {
  return (
    <Box paddingX={1} height={1}>
      {pendingLabel ? (
        <Text color="yellow">
          <Spinner type="dots" /> {pendingLabel} (/cancel to stop)
        </Text>
      ) : (
        <Text dimColor>
          {connected ? "" : "[disconnected] "}
          Enter: ask | /help | Up/Down/PgUp/PgDn: scroll | Ctrl+C: exit
        </Text>
      )}
    </Box>
  );
}
