import React from "react";
import { Box, Text } from "ink";
import type { CoreRow } from "../format.js";

const COLUMNS: Array<{ key: keyof CoreRow; title: string; width: number }> = [
  { key: "core", title: "Core", width: 9 },
  { key: "frequency", title: "Freq (MHz)", width: 11 },
  { key: "power", title: "Power (W)", width: 10 },
  { key: "voltage", title: "Voltage (V)", width: 12 },
  { key: "temp", title: "Temp (°C)", width: 10 },
  { key: "c0", title: "C0 %", width: 7 },
  { key: "cc1", title: "C1 %", width: 7 },
  { key: "cc6", title: "C6 %", width: 7 },
];

function frequencyColor(label: string): string {
  if (label === "Disabled") return "red";
  if (label === "Sleeping") return "gray";
  return "green";
}

interface CoreTableProps {
  rows: CoreRow[];
}

export default function CoreTable({ rows }: CoreTableProps) {
  return (
    <Box flexDirection="column">
      <Box>
        {COLUMNS.map((column) => (
          <Box key={column.key} width={column.width}>
            <Text bold color="white">
              {column.title}
            </Text>
          </Box>
        ))}
      </Box>

      {rows.map((row) => (
        <Box key={row.core}>
          {COLUMNS.map((column) => (
            <Box key={column.key} width={column.width}>
              <Text
                color={
                  column.key === "frequency"
                    ? frequencyColor(row.frequency)
                    : column.key === "core"
                    ? "magenta"
                    : undefined
                }
                wrap="truncate"
              >
                {row[column.key]}
              </Text>
            </Box>
          ))}
        </Box>
      ))}
    </Box>
  );
}
