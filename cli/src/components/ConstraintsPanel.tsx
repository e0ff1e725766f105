import React from "react";
import { Box, Text } from "ink";
import type { ConstraintBar, LabelledValue } from "../format.js";
import Panel, { ValueList } from "./Panel.js";
import ProgressBar from "./ProgressBar.js";

interface ConstraintsPanelProps {
  peakTemp: string;
  bars: ConstraintBar[];
  details: LabelledValue[];
  width?: string | number;
}

export default function ConstraintsPanel({
  peakTemp,
  bars,
  details,
  width,
}: ConstraintsPanelProps) {
  return (
    <Panel title="Constraints" width={width}>
      <Box>
        <Text color="white">Peak Temp: </Text>
        <Text color={peakTemp === "--" ? "gray" : "cyan"}>{peakTemp}</Text>
      </Box>
      {bars.map((bar) => (
        <Box key={bar.name}>
          <ProgressBar
            label={bar.name}
            labelWidth={9}
            percent={bar.percent}
            width={14}
          />
          <Text> {bar.label}</Text>
        </Box>
      ))}
      {details.length > 0 && <ValueList items={details} />}
    </Panel>
  );
}
