import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { TelemetryPoller, pollOnce } from "../src/poller.js";
import { TelemetryReader } from "../src/reader.js";
import { FakeSensorLibrary, sampleCore } from "../src/testing.js";
import { ReadError } from "../src/utils/errors.js";
import { PinoLogger, type Logger } from "../src/utils/logger.js";
import type { FullSnapshot } from "../src/types.js";

function openReader(library: FakeSensorLibrary, logger: Logger): TelemetryReader {
  const reader = new TelemetryReader(library, logger);
  reader.open();
  return reader;
}

describe("pollOnce", () => {
  const logger = new PinoLogger({ level: "silent" });

  test("wraps a snapshot", () => {
    const result = pollOnce(openReader(new FakeSensorLibrary(), logger), 16);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.snapshot.coreCount).toBe(8);
    }
  });

  test("wraps a failed read instead of throwing", () => {
    const library = new FakeSensorLibrary();
    library.failWith = -1;

    const result = pollOnce(openReader(library, logger), 16);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ReadError);
      expect(result.error.code).toBe("READ_FAILED");
    }
  });

  test("rethrows errors that are not read failures", () => {
    const reader = openReader(new FakeSensorLibrary(), logger);
    expect(() => pollOnce(reader, -4)).toThrow(RangeError);
  });
});

describe("TelemetryPoller", () => {
  let library: FakeSensorLibrary;
  let logger: PinoLogger;
  let poller: TelemetryPoller;

  beforeEach(() => {
    library = new FakeSensorLibrary();
    logger = new PinoLogger({ level: "silent" });
    poller = new TelemetryPoller(openReader(library, logger), 32, logger);
  });

  afterEach(() => {
    poller.stop();
    vi.useRealTimers();
  });

  test("has no snapshot before the first poll", () => {
    expect(poller.getLastSnapshot()).toBeNull();
  });

  test("emits and stores each good snapshot", () => {
    const seen: FullSnapshot[] = [];
    poller.on("snapshot", (snapshot) => seen.push(snapshot));

    poller.pollNow();

    expect(seen).toHaveLength(1);
    expect(poller.getLastSnapshot()).toBe(seen[0]);
  });

  test("keeps the previous snapshot when a read fails", () => {
    poller.pollNow();
    const previous = poller.getLastSnapshot();

    library.failWith = 0;
    const errors: ReadError[] = [];
    poller.on("readError", (error) => errors.push(error));
    const result = poller.pollNow();

    expect(result.ok).toBe(false);
    expect(errors).toHaveLength(1);
    expect(poller.getLastSnapshot()).toBe(previous);
    expect(poller.getLastSnapshot()?.cores).toHaveLength(8);
  });

  test("counts consecutive failures and resets on recovery", () => {
    const warn = vi.spyOn(logger, "warn");
    const info = vi.spyOn(logger, "info");

    library.failWith = -1;
    poller.pollNow();
    poller.pollNow();
    poller.pollNow();
    expect(poller.getConsecutiveFailures()).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Sensor read failed, keeping last values", {
      status: -1,
      consecutiveFailures: 1,
      event: "poll_failed",
    });

    library.failWith = null;
    poller.pollNow();
    expect(poller.getConsecutiveFailures()).toBe(0);
    expect(info).toHaveBeenCalledWith("Sensor reads recovered", {
      failedPolls: 3,
      event: "poll_recovered",
    });
  });

  test("replaces the snapshot in full on the next good read", () => {
    poller.pollNow();
    library.reading.cores = [sampleCore(0, { frequency: 3600 }), sampleCore(1)];
    poller.pollNow();

    const snapshot = poller.getLastSnapshot();
    expect(snapshot?.coreCount).toBe(2);
    expect(snapshot?.cores[0]?.frequency).toBe(3600);
  });

  test("polls immediately and then on every interval", () => {
    vi.useFakeTimers();

    poller.start(2000);
    expect(library.readCalls).toBe(1);
    expect(poller.isRunning()).toBe(true);

    vi.advanceTimersByTime(2000);
    expect(library.readCalls).toBe(2);

    vi.advanceTimersByTime(6000);
    expect(library.readCalls).toBe(5);
  });

  test("ignores a second start", () => {
    vi.useFakeTimers();

    poller.start(2000);
    poller.start(500);
    vi.advanceTimersByTime(2000);

    expect(library.readCalls).toBe(2);
  });

  test.each([0, 2.5, 3_000_000_000])("refuses an interval of %s", (intervalMs) => {
    vi.useFakeTimers();

    expect(() => poller.start(intervalMs)).toThrow(RangeError);
    vi.advanceTimersByTime(100);

    expect(library.readCalls).toBe(0);
    expect(poller.isRunning()).toBe(false);
  });

  test("stop halts polling", () => {
    vi.useFakeTimers();

    poller.start(1000);
    poller.stop();
    vi.advanceTimersByTime(5000);

    expect(library.readCalls).toBe(1);
    expect(poller.isRunning()).toBe(false);
  });
});
