import React, { useEffect, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import type { FullSnapshot, SystemInfo, TelemetryPoller } from "@ryzen-dash/monitor";
import { buildDashboardView, systemLines } from "../format.js";
import ConstraintsPanel from "./ConstraintsPanel.js";
import CoreTable from "./CoreTable.js";
import Panel, { ValueList } from "./Panel.js";
import { Spinner } from "./ProgressBar.js";

interface DashboardProps {
  poller: TelemetryPoller;
  system: SystemInfo | null;
  detailed?: boolean;
  // Reads q from stdin; off when stdin is not a terminal
  interactive?: boolean;
}

/**
 * Live view of the poller's last good snapshot. Failed reads never reach
 * this component, so the screen keeps the previous values.
 */
export default function Dashboard({
  poller,
  system,
  detailed = false,
  interactive = true,
}: DashboardProps) {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<FullSnapshot | null>(() =>
    poller.getLastSnapshot()
  );

  useEffect(() => {
    const onSnapshot = (next: FullSnapshot) => setSnapshot(next);
    poller.on("snapshot", onSnapshot);
    return () => {
      poller.off("snapshot", onSnapshot);
    };
  }, [poller]);

  useInput(
    (input) => {
      if (input === "q") {
        exit();
      }
    },
    { isActive: interactive }
  );

  if (!snapshot) {
    return (
      <Box flexDirection="column">
        <Panel title="System Information">
          <ValueList items={systemLines(system)} />
        </Panel>
        <Spinner text="Waiting for first sensor read..." />
      </Box>
    );
  }

  const view = buildDashboardView(system, snapshot, { detailed });

  return (
    <Box flexDirection="column">
      <Box>
        <Panel title="System Information" width="50%">
          <ValueList items={view.system} />
        </Panel>
        <Panel title="Core Statistics (Calculated)" width="50%">
          <ValueList items={view.stats} />
        </Panel>
      </Box>

      <Panel title={`Core Statistics (Live) - ${view.cores.length} cores`}>
        <CoreTable rows={view.cores} />
      </Panel>

      <Box>
        <ConstraintsPanel
          peakTemp={view.peakTemp}
          bars={view.constraints}
          details={view.constraintDetails}
          width="60%"
        />
        <Panel title="Memory Interface" width="40%">
          <ValueList items={view.memory} />
        </Panel>
      </Box>

      <Box>
        <Panel title="Power Consumption" width="50%">
          <ValueList items={view.power} />
        </Panel>
        <Panel title="Graphics" width="50%">
          <ValueList items={view.graphics} />
        </Panel>
      </Box>

      <Text color="gray">
        Updated {snapshot.capturedAt.toLocaleTimeString()}
        {interactive ? " - press q to quit" : ""}
      </Text>
    </Box>
  );
}
