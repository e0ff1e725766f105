import pino from "pino";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LogContext {
  libraryPath?: string;
  [key: string]: unknown;
}

// Logger Service Interface
export interface Logger {
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>): void;
  error(message: string, error?: unknown, context?: Partial<LogContext>): void;
  debug(message: string, context?: Partial<LogContext>): void;
  fatal(message: string, error?: unknown, context?: Partial<LogContext>): void;
  child(additionalContext: Partial<LogContext>): Logger;

  // Reader lifecycle
  libraryLoaded(libraryPath: string): void;
  readerInitialized(): void;
  systemIdentified(cpuName: string, codename: string, cores: number): void;
  readerTornDown(): void;

  // Polling
  pollerStarted(intervalMs: number, maxCores: number): void;
  pollerStopped(): void;
  pollFailed(status: number | undefined, consecutiveFailures: number): void;
  pollRecovered(failedPolls: number): void;
}

export interface PinoLoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  // Log file path; stderr when omitted
  destination?: string;
  // Shared pino instance for child loggers
  instance?: pino.Logger;
}

export class PinoLogger implements Logger {
  private logger: pino.Logger;
  private context: LogContext;

  constructor(options: PinoLoggerOptions = {}) {
    this.logger =
      options.instance ??
      pino(
        {
          level: options.level || "info",
          timestamp: pino.stdTimeFunctions.isoTime,
          formatters: {
            level: (label: string) => {
              return { level: label };
            },
          },
        },
        pino.destination({ dest: options.destination ?? 2, sync: true })
      );
    this.context = options.context || {};
  }

  get level(): string {
    return this.logger.level;
  }

  private enrichContext(additionalContext: Partial<LogContext> = {}): LogContext {
    return {
      ...this.context,
      ...additionalContext,
    };
  }

  private errorContext(
    error: unknown,
    context: Partial<LogContext>
  ): LogContext {
    if (error instanceof Error) {
      return this.enrichContext({
        ...context,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    }
    if (error === undefined) {
      return this.enrichContext(context);
    }
    return this.enrichContext({ ...context, error: String(error) });
  }

  info(message: string, context: Partial<LogContext> = {}): void {
    this.logger.info(this.enrichContext(context), message);
  }

  warn(message: string, context: Partial<LogContext> = {}): void {
    this.logger.warn(this.enrichContext(context), message);
  }

  error(message: string, error?: unknown, context: Partial<LogContext> = {}): void {
    this.logger.error(this.errorContext(error, context), message);
  }

  debug(message: string, context: Partial<LogContext> = {}): void {
    this.logger.debug(this.enrichContext(context), message);
  }

  fatal(message: string, error?: unknown, context: Partial<LogContext> = {}): void {
    this.logger.fatal(this.errorContext(error, context), message);
  }

  // Child loggers share the parent's destination
  child(additionalContext: Partial<LogContext>): Logger {
    return new PinoLogger({
      instance: this.logger,
      context: this.enrichContext(additionalContext),
    });
  }

  libraryLoaded(libraryPath: string): void {
    this.info("Sensor library loaded", {
      libraryPath,
      event: "library_loaded",
    });
  }

  readerInitialized(): void {
    this.info("Telemetry reader initialized", { event: "reader_initialized" });
  }

  systemIdentified(cpuName: string, codename: string, cores: number): void {
    this.info("CPU identified", {
      cpuName,
      codename,
      cores,
      event: "system_identified",
    });
  }

  readerTornDown(): void {
    this.info("Telemetry reader torn down", { event: "reader_torn_down" });
  }

  pollerStarted(intervalMs: number, maxCores: number): void {
    this.info("Started telemetry polling", {
      intervalMs,
      maxCores,
      event: "poller_started",
    });
  }

  pollerStopped(): void {
    this.info("Stopped telemetry polling", { event: "poller_stopped" });
  }

  pollFailed(status: number | undefined, consecutiveFailures: number): void {
    const context = { status, consecutiveFailures, event: "poll_failed" };
    if (consecutiveFailures === 1) {
      this.warn("Sensor read failed, keeping last values", context);
    } else {
      this.debug("Sensor read failed again", context);
    }
  }

  pollRecovered(failedPolls: number): void {
    this.info("Sensor reads recovered", {
      failedPolls,
      event: "poll_recovered",
    });
  }
}

export function createLogger(options: PinoLoggerOptions = {}): Logger {
  return new PinoLogger(options);
}
