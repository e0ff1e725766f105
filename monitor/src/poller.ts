import { EventEmitter } from "events";
import { MAX_POLL_INTERVAL_MS } from "./config.js";
import type { TelemetryReader } from "./reader.js";
import type { FullSnapshot } from "./types.js";
import { ReadError } from "./utils/errors.js";
import type { Logger } from "./utils/logger.js";

export type PollResult =
  | { ok: true; snapshot: FullSnapshot }
  | { ok: false; error: ReadError };

/**
 * Runs one sensor read. Only read failures become an `ok: false` result;
 * anything else is a bug and is rethrown.
 */
export function pollOnce(reader: TelemetryReader, maxCores: number): PollResult {
  try {
    return { ok: true, snapshot: reader.pollSnapshot(maxCores) };
  } catch (error) {
    if (error instanceof ReadError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export interface TelemetryPoller {
  on(event: "snapshot", listener: (snapshot: FullSnapshot) => void): this;
  on(event: "readError", listener: (error: ReadError) => void): this;
  off(event: "snapshot", listener: (snapshot: FullSnapshot) => void): this;
  off(event: "readError", listener: (error: ReadError) => void): this;
  emit(event: "snapshot", snapshot: FullSnapshot): boolean;
  emit(event: "readError", error: ReadError): boolean;
}

/**
 * Drives pollOnce on an interval and keeps the last good snapshot, so a
 * failed cycle leaves the previous values on screen.
 */
export class TelemetryPoller extends EventEmitter {
  private lastSnapshot: FullSnapshot | null = null;
  private pollingInterval: NodeJS.Timeout | null = null;
  private consecutiveFailures = 0;

  constructor(
    private readonly reader: TelemetryReader,
    private readonly maxCores: number,
    private readonly logger: Logger
  ) {
    super();
  }

  getLastSnapshot(): FullSnapshot | null {
    return this.lastSnapshot;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  isRunning(): boolean {
    return this.pollingInterval !== null;
  }

  pollNow(): PollResult {
    const result = pollOnce(this.reader, this.maxCores);

    if (result.ok) {
      if (this.consecutiveFailures > 0) {
        this.logger.pollRecovered(this.consecutiveFailures);
        this.consecutiveFailures = 0;
      }
      this.lastSnapshot = result.snapshot;
      this.emit("snapshot", result.snapshot);
    } else {
      this.consecutiveFailures++;
      const status = result.error.details?.status;
      this.logger.pollFailed(
        typeof status === "number" ? status : undefined,
        this.consecutiveFailures
      );
      this.emit("readError", result.error);
    }

    return result;
  }

  start(intervalMs: number): void {
    if (this.pollingInterval) {
      return; // Already polling
    }
    if (!Number.isInteger(intervalMs) || intervalMs <= 0 || intervalMs > MAX_POLL_INTERVAL_MS) {
      throw new RangeError(`intervalMs must be an integer from 1 to ${MAX_POLL_INTERVAL_MS}`);
    }

    this.pollNow();

    this.pollingInterval = setInterval(() => {
      this.pollNow();
    }, intervalMs);

    this.logger.pollerStarted(intervalMs, this.maxCores);
  }

  stop(): void {
    if (this.pollingInterval) {
      clearInterval(this.pollingInterval);
      this.pollingInterval = null;
      this.logger.pollerStopped();
    }
  }
}
