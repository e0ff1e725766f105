import { describe, expect, test } from "vitest";
import {
  CONSTRAINT_SNAPSHOT_SIZE,
  CORE_READING_SIZE,
  DERIVED_STATS_SIZE,
  GRAPHICS_SNAPSHOT_SIZE,
  MEMORY_SNAPSHOT_SIZE,
  POWER_SNAPSHOT_SIZE,
  SYSTEM_INFO_SIZE,
  StructReader,
  StructWriter,
  decodeConstraints,
  decodeCoreReading,
  decodeCores,
  decodeGraphics,
  decodeMemory,
  decodeStats,
  decodeSystemInfo,
  encodeConstraints,
  encodeCoreReading,
  encodeGraphics,
  encodeMemory,
  encodePower,
  encodeStats,
  encodeSystemInfo,
} from "../src/native/layout.js";
import {
  sampleConstraints,
  sampleCore,
  sampleGraphics,
  sampleMemory,
  samplePower,
  sampleStats,
  sampleSystemInfo,
} from "../src/testing.js";

describe("record sizes", () => {
  test("match the C header", () => {
    expect(CORE_READING_SIZE).toBe(40);
    expect(SYSTEM_INFO_SIZE).toBe(376);
    expect(CONSTRAINT_SNAPSHOT_SIZE).toBe(104);
    expect(MEMORY_SNAPSHOT_SIZE).toBe(40);
    expect(POWER_SNAPSHOT_SIZE).toBe(92);
    expect(GRAPHICS_SNAPSHOT_SIZE).toBe(52);
    expect(DERIVED_STATS_SIZE).toBe(32);
  });

  test("encoders fill exactly one record", () => {
    const cases: Array<[number, (buffer: Buffer) => void]> = [
      [CORE_READING_SIZE, (b) => encodeCoreReading(sampleCore(0), b)],
      [SYSTEM_INFO_SIZE, (b) => encodeSystemInfo(sampleSystemInfo(), b)],
      [CONSTRAINT_SNAPSHOT_SIZE, (b) => encodeConstraints(sampleConstraints(), b)],
      [MEMORY_SNAPSHOT_SIZE, (b) => encodeMemory(sampleMemory(), b)],
      [POWER_SNAPSHOT_SIZE, (b) => encodePower(samplePower(), b)],
      [GRAPHICS_SNAPSHOT_SIZE, (b) => encodeGraphics(sampleGraphics(), b)],
      [DERIVED_STATS_SIZE, (b) => encodeStats(sampleStats(), b)],
    ];

    for (const [size, encode] of cases) {
      expect(() => encode(Buffer.alloc(size))).not.toThrow();
      expect(() => encode(Buffer.alloc(size - 1))).toThrow(RangeError);
    }
  });
});

describe("core_data_t", () => {
  test("decodes fields in header order", () => {
    const buffer = Buffer.alloc(CORE_READING_SIZE);
    buffer.writeInt32LE(3, 0);
    buffer.writeFloatLE(4425.5, 4);
    buffer.writeFloatLE(3.25, 8);
    buffer.writeFloatLE(1.125, 12);
    buffer.writeFloatLE(61.5, 16);
    buffer.writeFloatLE(12.5, 20);
    buffer.writeFloatLE(0.5, 24);
    buffer.writeFloatLE(87, 28);
    buffer.writeInt32LE(0, 32);
    buffer.writeInt32LE(1, 36);

    expect(decodeCoreReading(buffer)).toEqual({
      coreNum: 3,
      frequency: 4425.5,
      power: 3.25,
      voltage: 1.125,
      temp: 61.5,
      c0: 12.5,
      cc1: 0.5,
      cc6: 87,
      disabled: false,
      sleeping: true,
    });
  });

  test("treats any non-zero int as true", () => {
    const buffer = Buffer.alloc(CORE_READING_SIZE);
    buffer.writeInt32LE(-1, 32);
    expect(decodeCoreReading(buffer).disabled).toBe(true);
  });

  test("decodes consecutive cores", () => {
    const buffer = Buffer.alloc(3 * CORE_READING_SIZE);
    encodeCoreReading(sampleCore(0, { frequency: 3000 }), buffer, 0);
    encodeCoreReading(sampleCore(1, { disabled: true }), buffer, CORE_READING_SIZE);
    encodeCoreReading(sampleCore(2, { temp: 70.5 }), buffer, 2 * CORE_READING_SIZE);

    const cores = decodeCores(buffer, 3);
    expect(cores.map((c) => c.coreNum)).toEqual([0, 1, 2]);
    expect(cores[0]?.frequency).toBe(3000);
    expect(cores[1]?.disabled).toBe(true);
    expect(cores[2]?.temp).toBe(70.5);
  });

  test("decodes only the requested count", () => {
    const buffer = Buffer.alloc(4 * CORE_READING_SIZE);
    expect(decodeCores(buffer, 2)).toHaveLength(2);
  });
});

describe("system_data_t", () => {
  test("reads text up to the NUL terminator", () => {
    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    encodeSystemInfo(sampleSystemInfo({ cpuName: "AMD Ryzen 9 7950X" }), buffer);

    const info = decodeSystemInfo(buffer);
    expect(info.cpuName).toBe("AMD Ryzen 9 7950X");
    expect(info.codename).toBe("Vermeer");
    expect(info.smuFwVersion).toBe("56.53.0");
    expect(info.cores).toBe(8);
    expect(info.enabledCoresCount).toBe(8);
    expect(info.ifVersion).toBe(13);
  });

  test("integers follow the three text buffers", () => {
    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    buffer.writeInt32LE(16, 352);
    buffer.writeInt32LE(2, 356);
    buffer.writeInt32LE(2, 360);
    buffer.writeInt32LE(8, 364);
    buffer.writeInt32LE(11, 368);
    buffer.writeInt32LE(14, 372);

    expect(decodeSystemInfo(buffer)).toEqual({
      cpuName: "",
      codename: "",
      smuFwVersion: "",
      cores: 16,
      ccds: 2,
      ccxs: 2,
      coresPerCcx: 8,
      ifVersion: 11,
      enabledCoresCount: 14,
    });
  });

  test("uses the whole buffer when no terminator is present", () => {
    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    buffer.fill("x".charCodeAt(0), 256, 256 + 64);
    expect(decodeSystemInfo(buffer).codename).toBe("x".repeat(64));
  });

  test("decodes UTF-8 text", () => {
    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    encodeSystemInfo(sampleSystemInfo({ codename: "Granite Ridge™" }), buffer);
    expect(decodeSystemInfo(buffer).codename).toBe("Granite Ridge™");
  });

  test("encoder truncates to leave room for NUL", () => {
    const buffer = Buffer.alloc(SYSTEM_INFO_SIZE);
    encodeSystemInfo(sampleSystemInfo({ smuFwVersion: "9".repeat(40) }), buffer);
    expect(decodeSystemInfo(buffer).smuFwVersion).toBe("9".repeat(31));
  });
});

describe("aggregate records", () => {
  test("constraints keep field order", () => {
    const buffer = Buffer.alloc(CONSTRAINT_SNAPSHOT_SIZE);
    // ppt_value and ppt_limit are the 6th and 7th floats
    buffer.writeFloatLE(45.25, 5 * 4);
    buffer.writeFloatLE(88, 6 * 4);
    // fit_limit is last
    buffer.writeFloatLE(2, 25 * 4);

    const constraints = decodeConstraints(buffer);
    expect(constraints.pptValue).toBe(45.25);
    expect(constraints.pptLimit).toBe(88);
    expect(constraints.fitLimit).toBe(2);
    expect(constraints.peakTemp).toBe(0);
  });

  test("NaN floats survive decoding", () => {
    const buffer = Buffer.alloc(DERIVED_STATS_SIZE);
    encodeStats(sampleStats({ packageCc6: Number.NaN }), buffer);
    expect(decodeStats(buffer).packageCc6).toBeNaN();
  });

  test("memory coupled mode is the trailing int", () => {
    const buffer = Buffer.alloc(MEMORY_SNAPSHOT_SIZE);
    buffer.writeInt32LE(1, 36);
    buffer.writeFloatLE(2000, 0);

    const memory = decodeMemory(buffer);
    expect(memory.coupledMode).toBe(true);
    expect(memory.fclkFreq).toBe(2000);
  });

  test("graphics fields round trip", () => {
    const buffer = Buffer.alloc(GRAPHICS_SNAPSHOT_SIZE);
    encodeGraphics(sampleGraphics({ gfxFreq: 2200, fps: 144 }), buffer);

    const graphics = decodeGraphics(buffer);
    expect(graphics.gfxFreq).toBe(2200);
    expect(graphics.fps).toBe(144);
    expect(graphics.gfxTemp).toBeNaN();
  });
});

describe("StructReader", () => {
  test("throws when a field runs past the buffer", () => {
    const reader = new StructReader(Buffer.alloc(6));
    expect(reader.int32()).toBe(0);
    expect(() => reader.int32()).toThrow(RangeError);
  });

  test("tracks its offset", () => {
    const buffer = Buffer.alloc(16);
    const writer = new StructWriter(buffer, 4).int32(7).float32(1.5);
    expect(writer.offset).toBe(12);

    const reader = new StructReader(buffer, 4);
    expect(reader.int32()).toBe(7);
    expect(reader.float32()).toBe(1.5);
    expect(reader.offset).toBe(12);
  });
});
