export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "MonitorError";
  }
}

export class LibraryLoadError extends MonitorError {
  constructor(path: string, cause?: Error) {
    super(`Failed to load sensor library: ${path}`, "LIBRARY_LOAD_ERROR", {
      path,
      cause: cause?.message,
    });
    this.name = "LibraryLoadError";
  }
}

export type InitFailureReason = "smu_unavailable" | "pm_table_unsupported" | "unknown";

export function describeInitStatus(status: number): InitFailureReason {
  switch (status) {
    case -1:
      return "smu_unavailable";
    case -2:
      return "pm_table_unsupported";
    default:
      return "unknown";
  }
}

const INIT_MESSAGES: Record<InitFailureReason, string> = {
  smu_unavailable: "could not open the SMU driver",
  pm_table_unsupported: "PM table is not supported on this CPU",
  unknown: "unexpected status",
};

export class InitError extends MonitorError {
  readonly status: number;
  readonly reason: InitFailureReason;

  constructor(status: number) {
    const reason = describeInitStatus(status);
    super(
      `Failed to initialize sensor library: ${INIT_MESSAGES[reason]} (status ${status})`,
      "INIT_ERROR",
      { status, reason }
    );
    this.name = "InitError";
    this.status = status;
    this.reason = reason;
  }
}

export type ReadErrorCode = "READ_FAILED" | "NOT_INITIALIZED" | "SYSTEM_INFO_FAILED";

export class ReadError extends MonitorError {
  declare readonly code: ReadErrorCode;

  constructor(code: ReadErrorCode, message: string, status?: number) {
    super(message, code, { status });
    this.name = "ReadError";
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_INVALID", details);
    this.name = "ConfigError";
  }
}
