import {
  CONSTRAINT_SNAPSHOT_SIZE,
  CORE_READING_SIZE,
  DERIVED_STATS_SIZE,
  GRAPHICS_SNAPSHOT_SIZE,
  MEMORY_SNAPSHOT_SIZE,
  POWER_SNAPSHOT_SIZE,
  SYSTEM_INFO_SIZE,
  decodeConstraints,
  decodeCores,
  decodeGraphics,
  decodeMemory,
  decodePower,
  decodeStats,
  decodeSystemInfo,
} from "./native/layout.js";
import {
  DEFAULT_LIBRARY_PATH,
  loadSensorLibrary,
  type SensorLibrary,
} from "./native/library.js";
import type { FullSnapshot, ReaderState, SystemInfo } from "./types.js";
import { InitError, ReadError } from "./utils/errors.js";
import type { Logger } from "./utils/logger.js";

export interface InitializeOptions {
  libraryPath?: string;
  logger: Logger;
  // Replaces the koffi loader, mainly for tests
  loadLibrary?: (path: string) => SensorLibrary;
}

/**
 * Owns the hardware channel opened by the sensor library.
 *
 * uninitialized -> initialized -> torn_down; only `initialized` may read.
 */
export class TelemetryReader {
  private state: ReaderState = "uninitialized";

  constructor(
    private readonly library: SensorLibrary,
    private readonly logger: Logger
  ) {}

  getState(): ReaderState {
    return this.state;
  }

  open(): void {
    if (this.state !== "uninitialized") {
      return;
    }

    const status = this.library.init();
    if (status !== 0) {
      const error = new InitError(status);
      this.logger.error("Sensor library init failed", error, {
        status,
        reason: error.reason,
      });
      throw error;
    }

    this.state = "initialized";
    this.logger.readerInitialized();
  }

  getSystemInfo(): SystemInfo {
    this.assertInitialized();

    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    const status = this.library.getSystemInfo(buffer);
    if (status !== 0) {
      throw new ReadError(
        "SYSTEM_INFO_FAILED",
        `Failed to read system info (status ${status})`,
        status
      );
    }

    const info = decodeSystemInfo(buffer);
    this.logger.systemIdentified(info.cpuName, info.codename, info.cores);
    return info;
  }

  pollSnapshot(maxCores: number): FullSnapshot {
    this.assertInitialized();
    if (!Number.isInteger(maxCores) || maxCores <= 0) {
      throw new RangeError(`maxCores must be a positive integer, got ${maxCores}`);
    }

    const cores = Buffer.alloc(maxCores * CORE_READING_SIZE);
    const constraints = Buffer.alloc(CONSTRAINT_SNAPSHOT_SIZE);
    const memory = Buffer.alloc(MEMORY_SNAPSHOT_SIZE);
    const power = Buffer.alloc(POWER_SNAPSHOT_SIZE);
    const graphics = Buffer.alloc(GRAPHICS_SNAPSHOT_SIZE);
    const stats = Buffer.alloc(DERIVED_STATS_SIZE);

    const count = this.library.readData(
      cores,
      maxCores,
      constraints,
      memory,
      power,
      graphics,
      stats
    );
    if (count <= 0) {
      throw new ReadError(
        "READ_FAILED",
        `Sensor read returned ${count} cores`,
        count
      );
    }

    const coreCount = Math.min(count, maxCores);
    return {
      coreCount,
      cores: decodeCores(cores, coreCount),
      constraints: decodeConstraints(constraints),
      memory: decodeMemory(memory),
      power: decodePower(power),
      graphics: decodeGraphics(graphics),
      stats: decodeStats(stats),
      capturedAt: new Date(),
    };
  }

  /**
   * Releases the hardware channel. Safe to call more than once.
   */
  teardown(): void {
    if (this.state === "torn_down") {
      return;
    }

    const wasInitialized = this.state === "initialized";
    this.state = "torn_down";
    if (wasInitialized) {
      this.library.cleanup();
      this.logger.readerTornDown();
    }
  }

  private assertInitialized(): void {
    if (this.state !== "initialized") {
      throw new ReadError(
        "NOT_INITIALIZED",
        `Telemetry reader is ${this.state.replace("_", " ")}`
      );
    }
  }
}

/**
 * Loads the sensor library and opens the hardware channel.
 * Throws LibraryLoadError or InitError.
 */
export function initialize(options: InitializeOptions): TelemetryReader {
  const libraryPath = options.libraryPath ?? DEFAULT_LIBRARY_PATH;
  const load = options.loadLibrary ?? loadSensorLibrary;
  const logger = options.logger.child({ libraryPath });

  const library = load(libraryPath);
  logger.libraryLoaded(libraryPath);

  const reader = new TelemetryReader(library, logger);
  reader.open();
  return reader;
}
