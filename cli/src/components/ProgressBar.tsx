import React, { useState, useEffect } from "react";
import { Box, Text } from "ink";

export type BarColor = "green" | "yellow" | "red";

interface ProgressBarProps {
  percent: number;
  width?: number;
  color?: BarColor;
  showPercent?: boolean;
  label?: string;
  labelWidth?: number;
}

// Load colour for a constraint: green below 70%, yellow below 90%
export function barColor(percent: number): BarColor {
  if (percent < 70) return "green";
  if (percent < 90) return "yellow";
  return "red";
}

export default function ProgressBar({
  percent,
  width = 20,
  color,
  showPercent = true,
  label,
  labelWidth,
}: ProgressBarProps) {
  const clampedPercent = Math.min(100, Math.max(0, percent));
  const filledWidth = Math.round((clampedPercent / 100) * width);
  const emptyWidth = width - filledWidth;

  const filledChar = "█";
  const emptyChar = "░";

  return (
    <Box>
      {label && (
        <Box width={labelWidth}>
          <Text>{label}</Text>
        </Box>
      )}
      <Text>
        <Text color={color ?? barColor(clampedPercent)}>
          {filledChar.repeat(filledWidth)}
        </Text>
        {emptyChar.repeat(emptyWidth)}
      </Text>
      {showPercent && (
        <Box width={5} justifyContent="flex-end">
          <Text color="gray">{Math.round(clampedPercent)}%</Text>
        </Box>
      )}
    </Box>
  );
}

const DOT_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

interface SpinnerProps {
  text: string;
  color?: string;
  frames?: readonly string[];
  frameMs?: number;
}

/** Shown while the first sensor read is outstanding. */
export function Spinner({
  text,
  color = "green",
  frames = DOT_FRAMES,
  frameMs = 100,
}: SpinnerProps) {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => {
      setFrame((f) => (f + 1) % frames.length);
    }, frameMs);
    return () => clearInterval(timer);
  }, [frames, frameMs]);

  return (
    <Text color={color}>
      {frames[frame % frames.length] ?? ""} {text}
    </Text>
  );
}
