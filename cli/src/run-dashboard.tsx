import React from "react";
import { render as inkRender } from "ink";
import {
  ReadError,
  TelemetryPoller,
  type Logger,
  type SystemInfo,
  type TelemetryReader,
} from "@ryzen-dash/monitor";
import Dashboard from "./components/Dashboard.js";
import { setupSignalHandler } from "./utils.js";

export interface DashboardInstance {
  unmount(): void;
  waitUntilExit(): Promise<void>;
}

export interface RunDashboardOptions {
  reader: TelemetryReader;
  logger: Logger;
  maxCores: number;
  intervalMs: number;
  detailed?: boolean;
  interactive?: boolean;
  render?: (tree: React.ReactElement) => DashboardInstance;
}

// The dashboard still runs without identity info; one-shot commands do not
export function readSystemInfo(reader: TelemetryReader, logger: Logger): SystemInfo | null {
  try {
    return reader.getSystemInfo();
  } catch (error) {
    if (error instanceof ReadError) {
      logger.warn("System info unavailable", { code: error.code });
      return null;
    }
    throw error;
  }
}

/**
 * Polls and draws until the UI exits or a signal arrives, then stops the
 * poller and tears the reader down. The reader is torn down on every path.
 */
export async function runDashboard({
  reader,
  logger,
  maxCores,
  intervalMs,
  detailed = false,
  interactive = true,
  render = inkRender,
}: RunDashboardOptions): Promise<void> {
  try {
    const system = readSystemInfo(reader, logger);
    const poller = new TelemetryPoller(reader, maxCores, logger);
    poller.start(intervalMs);

    try {
      const instance = render(
        <Dashboard
          poller={poller}
          system={system}
          detailed={detailed}
          interactive={interactive}
        />
      );
      const signals = setupSignalHandler(() => instance.unmount());

      try {
        await instance.waitUntilExit();
      } finally {
        signals.cleanup();
      }
    } finally {
      poller.stop();
    }
  } finally {
    reader.teardown();
  }
}
