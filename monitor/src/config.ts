import { DEFAULT_LIBRARY_PATH } from "./native/library.js";
import { ConfigError } from "./utils/errors.js";
import { isLogLevel, type LogLevel } from "./utils/logger.js";

export interface MonitorConfig {
  libraryPath: string;
  pollIntervalMs: number;
  maxCores: number;
  logLevel: LogLevel;
  logFile?: string;
}

// Values given on the command line; unset keys fall back to the environment
export type ConfigOverrides = Partial<Record<keyof MonitorConfig, string>>;

// Largest delay setInterval honours; anything above fires after 1 ms
export const MAX_POLL_INTERVAL_MS = 2_147_483_647;
export const MAX_CORES_LIMIT = 1024;

function parsePositiveInt(
  name: string,
  raw: string | undefined,
  fallback: number,
  max: number
): number {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value <= 0 || value > max) {
    throw new ConfigError(`${name} must be an integer from 1 to ${max}, got "${raw}"`, {
      key: name,
      value: raw,
    });
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === "") {
    return "info";
  }
  if (!isLogLevel(raw)) {
    throw new ConfigError(`unknown log level "${raw}"`, { key: "logLevel", value: raw });
  }
  return raw;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): MonitorConfig {
  const logFile = overrides.logFile || env.LOG_FILE;

  return {
    libraryPath:
      overrides.libraryPath || env.RYZEN_MONITOR_LIB || DEFAULT_LIBRARY_PATH,
    pollIntervalMs: parsePositiveInt(
      "pollIntervalMs",
      overrides.pollIntervalMs ?? env.POLL_INTERVAL_MS,
      2000
    ),
    maxCores: parsePositiveInt("maxCores", overrides.maxCores ?? env.MAX_CORES, 32),
    logLevel: parseLogLevel(overrides.logLevel ?? env.LOG_LEVEL),
    ...(logFile ? { logFile } : {}),
  };
}
