/**
 * Byte layouts of the records exchanged with libryzen_monitor.
 *
 * Every record is a packed sequence of little-endian 32-bit ints, 32-bit
 * floats and fixed-size NUL-terminated UTF-8 buffers. All members are
 * 4-byte aligned so the C compiler inserts no padding; field order and
 * sizes below must match `ryzen_monitor_lib.h` exactly.
 */

import type {
  CoreReading,
  ConstraintSnapshot,
  DerivedStats,
  GraphicsSnapshot,
  MemoryInterfaceSnapshot,
  PowerRailSnapshot,
  SystemInfo,
} from "../types.js";

const WORD = 4;

export const CPU_NAME_LENGTH = 256;
export const CODENAME_LENGTH = 64;
export const SMU_FW_VERSION_LENGTH = 32;

export const CORE_READING_SIZE = 10 * WORD;
export const SYSTEM_INFO_SIZE =
  CPU_NAME_LENGTH + CODENAME_LENGTH + SMU_FW_VERSION_LENGTH + 6 * WORD;
export const CONSTRAINT_SNAPSHOT_SIZE = 26 * WORD;
export const MEMORY_SNAPSHOT_SIZE = 10 * WORD;
export const POWER_SNAPSHOT_SIZE = 23 * WORD;
export const GRAPHICS_SNAPSHOT_SIZE = 13 * WORD;
export const DERIVED_STATS_SIZE = 8 * WORD;

/**
 * Sequential reader over a native record. Each call consumes one field.
 */
export class StructReader {
  private cursor: number;

  constructor(private readonly buffer: Buffer, offset: number = 0) {
    this.cursor = offset;
  }

  get offset(): number {
    return this.cursor;
  }

  private take(length: number): number {
    const start = this.cursor;
    if (start + length > this.buffer.length) {
      throw new RangeError(
        `Record field at offset ${start} (${length} bytes) exceeds buffer of ${this.buffer.length} bytes`
      );
    }
    this.cursor += length;
    return start;
  }

  int32(): number {
    return this.buffer.readInt32LE(this.take(WORD));
  }

  float32(): number {
    return this.buffer.readFloatLE(this.take(WORD));
  }

  // C int used as a flag
  bool32(): boolean {
    return this.int32() !== 0;
  }

  cstring(length: number): string {
    const start = this.take(length);
    const field = this.buffer.subarray(start, start + length);
    const end = field.indexOf(0);
    return field.toString("utf8", 0, end === -1 ? length : end);
  }
}

/**
 * Mirror of StructReader, used to build records for fake libraries.
 */
export class StructWriter {
  private cursor: number;

  constructor(private readonly buffer: Buffer, offset: number = 0) {
    this.cursor = offset;
  }

  get offset(): number {
    return this.cursor;
  }

  private take(length: number): number {
    const start = this.cursor;
    if (start + length > this.buffer.length) {
      throw new RangeError(
        `Record field at offset ${start} (${length} bytes) exceeds buffer of ${this.buffer.length} bytes`
      );
    }
    this.cursor += length;
    return start;
  }

  int32(value: number): this {
    this.buffer.writeInt32LE(value, this.take(WORD));
    return this;
  }

  float32(value: number): this {
    this.buffer.writeFloatLE(value, this.take(WORD));
    return this;
  }

  bool32(value: boolean): this {
    return this.int32(value ? 1 : 0);
  }

  // Truncates to leave room for the terminating NUL
  cstring(value: string, length: number): this {
    const start = this.take(length);
    this.buffer.fill(0, start, start + length);
    const bytes = Buffer.from(value, "utf8").subarray(0, length - 1);
    bytes.copy(this.buffer, start);
    return this;
  }
}

// core_data_t

export function decodeCoreReading(buffer: Buffer, offset: number = 0): CoreReading {
  const r = new StructReader(buffer, offset);
  return {
    coreNum: r.int32(),
    frequency: r.float32(),
    power: r.float32(),
    voltage: r.float32(),
    temp: r.float32(),
    c0: r.float32(),
    cc1: r.float32(),
    cc6: r.float32(),
    disabled: r.bool32(),
    sleeping: r.bool32(),
  };
}

export function encodeCoreReading(
  core: CoreReading,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .int32(core.coreNum)
    .float32(core.frequency)
    .float32(core.power)
    .float32(core.voltage)
    .float32(core.temp)
    .float32(core.c0)
    .float32(core.cc1)
    .float32(core.cc6)
    .bool32(core.disabled)
    .bool32(core.sleeping);
}

export function decodeCores(buffer: Buffer, count: number): CoreReading[] {
  const cores: CoreReading[] = [];
  for (let i = 0; i < count; i++) {
    cores.push(decodeCoreReading(buffer, i * CORE_READING_SIZE));
  }
  return cores;
}

// system_data_t

export function decodeSystemInfo(buffer: Buffer, offset: number = 0): SystemInfo {
  const r = new StructReader(buffer, offset);
  return {
    cpuName: r.cstring(CPU_NAME_LENGTH),
    codename: r.cstring(CODENAME_LENGTH),
    smuFwVersion: r.cstring(SMU_FW_VERSION_LENGTH),
    cores: r.int32(),
    ccds: r.int32(),
    ccxs: r.int32(),
    coresPerCcx: r.int32(),
    ifVersion: r.int32(),
    enabledCoresCount: r.int32(),
  };
}

export function encodeSystemInfo(
  info: SystemInfo,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .cstring(info.cpuName, CPU_NAME_LENGTH)
    .cstring(info.codename, CODENAME_LENGTH)
    .cstring(info.smuFwVersion, SMU_FW_VERSION_LENGTH)
    .int32(info.cores)
    .int32(info.ccds)
    .int32(info.ccxs)
    .int32(info.coresPerCcx)
    .int32(info.ifVersion)
    .int32(info.enabledCoresCount);
}

// constraints_data_t

export function decodeConstraints(
  buffer: Buffer,
  offset: number = 0
): ConstraintSnapshot {
  const r = new StructReader(buffer, offset);
  return {
    peakTemp: r.float32(),
    socTemp: r.float32(),
    gfxTemp: r.float32(),
    vidValue: r.float32(),
    vidLimit: r.float32(),
    pptValue: r.float32(),
    pptLimit: r.float32(),
    pptApuValue: r.float32(),
    pptApuLimit: r.float32(),
    tdcValue: r.float32(),
    tdcLimit: r.float32(),
    tdcActual: r.float32(),
    tdcSocValue: r.float32(),
    tdcSocLimit: r.float32(),
    edcValue: r.float32(),
    edcLimit: r.float32(),
    edcSocValue: r.float32(),
    edcSocLimit: r.float32(),
    thmValue: r.float32(),
    thmLimit: r.float32(),
    thmSocValue: r.float32(),
    thmSocLimit: r.float32(),
    thmGfxValue: r.float32(),
    thmGfxLimit: r.float32(),
    fitValue: r.float32(),
    fitLimit: r.float32(),
  };
}

export function encodeConstraints(
  c: ConstraintSnapshot,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .float32(c.peakTemp)
    .float32(c.socTemp)
    .float32(c.gfxTemp)
    .float32(c.vidValue)
    .float32(c.vidLimit)
    .float32(c.pptValue)
    .float32(c.pptLimit)
    .float32(c.pptApuValue)
    .float32(c.pptApuLimit)
    .float32(c.tdcValue)
    .float32(c.tdcLimit)
    .float32(c.tdcActual)
    .float32(c.tdcSocValue)
    .float32(c.tdcSocLimit)
    .float32(c.edcValue)
    .float32(c.edcLimit)
    .float32(c.edcSocValue)
    .float32(c.edcSocLimit)
    .float32(c.thmValue)
    .float32(c.thmLimit)
    .float32(c.thmSocValue)
    .float32(c.thmSocLimit)
    .float32(c.thmGfxValue)
    .float32(c.thmGfxLimit)
    .float32(c.fitValue)
    .float32(c.fitLimit);
}

// memory_data_t

export function decodeMemory(
  buffer: Buffer,
  offset: number = 0
): MemoryInterfaceSnapshot {
  const r = new StructReader(buffer, offset);
  return {
    fclkFreq: r.float32(),
    fclkFreqEff: r.float32(),
    uclkFreq: r.float32(),
    memclkFreq: r.float32(),
    vVddm: r.float32(),
    vVddp: r.float32(),
    vVddg: r.float32(),
    vVddgIod: r.float32(),
    vVddgCcd: r.float32(),
    coupledMode: r.bool32(),
  };
}

export function encodeMemory(
  m: MemoryInterfaceSnapshot,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .float32(m.fclkFreq)
    .float32(m.fclkFreqEff)
    .float32(m.uclkFreq)
    .float32(m.memclkFreq)
    .float32(m.vVddm)
    .float32(m.vVddp)
    .float32(m.vVddg)
    .float32(m.vVddgIod)
    .float32(m.vVddgCcd)
    .bool32(m.coupledMode);
}

// power_data_t

export function decodePower(buffer: Buffer, offset: number = 0): PowerRailSnapshot {
  const r = new StructReader(buffer, offset);
  return {
    totalCorePower: r.float32(),
    vddcrSocPower: r.float32(),
    ioVddcrSocPower: r.float32(),
    gmi2VddgPower: r.float32(),
    rocPower: r.float32(),
    l3LogicPower: r.float32(),
    l3VddmPower: r.float32(),
    vddioMemPower: r.float32(),
    iodVddioMemPower: r.float32(),
    ddrVddpPower: r.float32(),
    ddrPhyPower: r.float32(),
    vdd18Power: r.float32(),
    ioDisplayPower: r.float32(),
    ioUsbPower: r.float32(),
    socketPower: r.float32(),
    packagePower: r.float32(),
    vddcrCpuPower: r.float32(),
    socTelemetryVoltage: r.float32(),
    socTelemetryCurrent: r.float32(),
    socTelemetryPower: r.float32(),
    cpuTelemetryVoltage: r.float32(),
    cpuTelemetryCurrent: r.float32(),
    cpuTelemetryPower: r.float32(),
  };
}

export function encodePower(
  p: PowerRailSnapshot,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .float32(p.totalCorePower)
    .float32(p.vddcrSocPower)
    .float32(p.ioVddcrSocPower)
    .float32(p.gmi2VddgPower)
    .float32(p.rocPower)
    .float32(p.l3LogicPower)
    .float32(p.l3VddmPower)
    .float32(p.vddioMemPower)
    .float32(p.iodVddioMemPower)
    .float32(p.ddrVddpPower)
    .float32(p.ddrPhyPower)
    .float32(p.vdd18Power)
    .float32(p.ioDisplayPower)
    .float32(p.ioUsbPower)
    .float32(p.socketPower)
    .float32(p.packagePower)
    .float32(p.vddcrCpuPower)
    .float32(p.socTelemetryVoltage)
    .float32(p.socTelemetryCurrent)
    .float32(p.socTelemetryPower)
    .float32(p.cpuTelemetryVoltage)
    .float32(p.cpuTelemetryCurrent)
    .float32(p.cpuTelemetryPower);
}

// graphics_data_t

export function decodeGraphics(buffer: Buffer, offset: number = 0): GraphicsSnapshot {
  const r = new StructReader(buffer, offset);
  return {
    gfxVoltage: r.float32(),
    rocPower: r.float32(),
    gfxTemp: r.float32(),
    gfxFreq: r.float32(),
    gfxFreqEff: r.float32(),
    gfxBusy: r.float32(),
    gfxEdcLimit: r.float32(),
    gfxEdcResidency: r.float32(),
    displayCount: r.float32(),
    fps: r.float32(),
    dgpuPower: r.float32(),
    dgpuFreqTarget: r.float32(),
    dgpuGfxBusy: r.float32(),
  };
}

export function encodeGraphics(
  g: GraphicsSnapshot,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .float32(g.gfxVoltage)
    .float32(g.rocPower)
    .float32(g.gfxTemp)
    .float32(g.gfxFreq)
    .float32(g.gfxFreqEff)
    .float32(g.gfxBusy)
    .float32(g.gfxEdcLimit)
    .float32(g.gfxEdcResidency)
    .float32(g.displayCount)
    .float32(g.fps)
    .float32(g.dgpuPower)
    .float32(g.dgpuFreqTarget)
    .float32(g.dgpuGfxBusy);
}

// calculated_stats_t

export function decodeStats(buffer: Buffer, offset: number = 0): DerivedStats {
  const r = new StructReader(buffer, offset);
  return {
    peakCoreFrequency: r.float32(),
    peakCoreTemp: r.float32(),
    peakCoreVoltage: r.float32(),
    avgCoreVoltage: r.float32(),
    avgCoreCc6: r.float32(),
    totalCorePower: r.float32(),
    peakCoreVoltageSmu: r.float32(),
    packageCc6: r.float32(),
  };
}

export function encodeStats(
  s: DerivedStats,
  buffer: Buffer,
  offset: number = 0
): void {
  new StructWriter(buffer, offset)
    .float32(s.peakCoreFrequency)
    .float32(s.peakCoreTemp)
    .float32(s.peakCoreVoltage)
    .float32(s.avgCoreVoltage)
    .float32(s.avgCoreCc6)
    .float32(s.totalCorePower)
    .float32(s.peakCoreVoltageSmu)
    .float32(s.packageCc6);
}
