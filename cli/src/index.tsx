#!/usr/bin/env tsx
import { Command } from "commander";
import chalk from "chalk";
import { tmpdir } from "os";
import { join } from "path";
import {
  createLogger,
  initialize,
  loadConfig,
  pollOnce,
  type ConfigOverrides,
  type Logger,
  type MonitorConfig,
  type TelemetryReader,
} from "@ryzen-dash/monitor";
import { systemLines } from "./format.js";
import { runDashboard } from "./run-dashboard.js";
import { handleError as handleErrorUtil, warnIfUnprivileged } from "./utils.js";

interface GlobalOptions {
  lib?: string;
  maxCores?: string;
  logLevel?: string;
  logFile?: string;
}

interface DashboardOptions {
  interval?: string;
  detailed?: boolean;
}

const DASHBOARD_LOG_FILE = join(tmpdir(), "ryzen-dash.log");

// Error handler wrapper
function handleError<A extends unknown[]>(fn: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      handleErrorUtil(
        error instanceof Error ? error : new Error(String(error))
      );
    }
  };
}

const program = new Command();

program
  .name("ryzen-dash")
  .description("Live AMD Ryzen SMU telemetry from libryzen_monitor")
  .version("0.1.0")
  .option(
    "--lib <path>",
    "Path to libryzen_monitor.so (default: ./libryzen_monitor.so, then the loader path)"
  )
  .option("--max-cores <n>", "Size of the per-core read buffer")
  .option("--log-level <level>", "pino log level")
  .option("--log-file <path>", "Write logs to this file instead of stderr");

function resolveConfig(extra: ConfigOverrides = {}): MonitorConfig {
  const opts = program.opts<GlobalOptions>();
  return loadConfig({
    libraryPath: opts.lib,
    maxCores: opts.maxCores,
    logLevel: opts.logLevel,
    logFile: opts.logFile,
    ...extra,
  });
}

function openReader(config: MonitorConfig, logger: Logger): TelemetryReader {
  warnIfUnprivileged();
  return initialize({ libraryPath: config.libraryPath, logger });
}

program
  .command("dashboard", { isDefault: true })
  .description("Show live telemetry")
  .option("-i, --interval <ms>", "Poll interval in milliseconds")
  .option("-d, --detailed", "Show every constraint, rail and graphics field")
  .action(
    handleError(async (options: DashboardOptions) => {
      const config = resolveConfig({ pollIntervalMs: options.interval });
      const logger = createLogger({
        level: config.logLevel,
        destination: config.logFile ?? DASHBOARD_LOG_FILE,
      });

      await runDashboard({
        reader: openReader(config, logger),
        logger,
        maxCores: config.maxCores,
        intervalMs: config.pollIntervalMs,
        detailed: options.detailed ?? false,
        interactive: process.stdin.isTTY === true,
      });
    })
  );

program
  .command("info")
  .description("Print CPU identity and topology")
  .action(
    handleError(async () => {
      const config = resolveConfig();
      const logger = createLogger({ level: config.logLevel, destination: config.logFile });

      const reader = openReader(config, logger);
      try {
        const info = reader.getSystemInfo();
        console.log(chalk.blue("System Information"));
        for (const line of systemLines(info)) {
          console.log(`${chalk.white(`${line.label}:`)} ${line.value}`);
        }
        console.log(
          `${chalk.white("Topology:")} ${info.cores} cores, ${info.ccxs} CCXs, ${info.coresPerCcx} cores per CCX`
        );
        console.log(
          `${chalk.white("SMU interface:")} ${info.ifVersion > 0 ? `v${info.ifVersion}` : "unknown"}`
        );
      } finally {
        reader.teardown();
      }
    })
  );

program
  .command("snapshot")
  .description("Poll once and print the readings as JSON")
  .action(
    handleError(async () => {
      const config = resolveConfig();
      const logger = createLogger({ level: config.logLevel, destination: config.logFile });

      const reader = openReader(config, logger);
      try {
        const result = pollOnce(reader, config.maxCores);
        if (!result.ok) {
          throw result.error;
        }
        // NaN serializes as null
        console.log(JSON.stringify(result.snapshot, null, 2));
      } finally {
        reader.teardown();
      }
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  handleErrorUtil(error instanceof Error ? error : new Error(String(error)));
});
