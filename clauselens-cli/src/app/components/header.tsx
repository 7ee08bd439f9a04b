import React from "react";
import { Box, Text } from "ink";

type Props = {
  readonly scope: readonly string[] | null;
};

export function Header({ scope }: Props): React.JSX.Element {
  const scopeLabel = scope === null ? "all documents" : `${scope.length} document(s)`;
  return (
    <Box
      borderStyle="single"
      borderColor="cyan"
      paddingX={1}
      justifyContent="space-between"
    >
      <Text bold color="cyan">
        ClauseLens
      </Text>
      <Text dimColor>asking over {scopeLabel}</Text>
    </Box>
  );
}
