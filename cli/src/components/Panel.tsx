import React from "react";
import { Box, Text } from "ink";
import type { LabelledValue } from "../format.js";

interface PanelProps {
  title: string;
  width?: string | number;
  children: React.ReactNode;
}

export default function Panel({ title, width, children }: PanelProps) {
  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor="gray"
      paddingX={1}
      width={width}
    >
      <Text color="blue" bold>
        {title}
      </Text>
      {children}
    </Box>
  );
}

interface ValueListProps {
  items: LabelledValue[];
}

export function ValueList({ items }: ValueListProps) {
  return (
    <Box flexDirection="column">
      {items.map((item) => (
        <Box key={item.label}>
          <Text color="white">{item.label}: </Text>
          <Text color={item.value === "--" ? "gray" : "cyan"}>{item.value}</Text>
        </Box>
      ))}
    </Box>
  );
}
