/**
 * In-process stand-in for libryzen_monitor. It writes synthetic records into
 * the caller's buffers through the same layouts the reader decodes.
 */

import {
  CORE_READING_SIZE,
  encodeConstraints,
  encodeCoreReading,
  encodeGraphics,
  encodeMemory,
  encodePower,
  encodeStats,
  encodeSystemInfo,
} from "./native/layout.js";
import type { SensorLibrary } from "./native/library.js";
import type {
  ConstraintSnapshot,
  CoreReading,
  DerivedStats,
  GraphicsSnapshot,
  MemoryInterfaceSnapshot,
  PowerRailSnapshot,
  SystemInfo,
} from "./types.js";

export function sampleSystemInfo(overrides: Partial<SystemInfo> = {}): SystemInfo {
  return {
    cpuName: "AMD Ryzen 7 5800X 8-Core Processor",
    codename: "Vermeer",
    smuFwVersion: "56.53.0",
    cores: 8,
    ccds: 1,
    ccxs: 1,
    coresPerCcx: 8,
    ifVersion: 13,
    enabledCoresCount: 8,
    ...overrides,
  };
}

export function sampleCore(coreNum: number, overrides: Partial<CoreReading> = {}): CoreReading {
  return {
    coreNum,
    frequency: 4500,
    power: 2.5,
    voltage: 1.25,
    temp: 55.5,
    c0: 40,
    cc1: 10,
    cc6: 50,
    disabled: false,
    sleeping: false,
    ...overrides,
  };
}

export function sampleConstraints(
  overrides: Partial<ConstraintSnapshot> = {}
): ConstraintSnapshot {
  return {
    peakTemp: 72.5,
    socTemp: 48,
    gfxTemp: Number.NaN,
    vidValue: 1.5,
    vidLimit: 1.55,
    pptValue: 90,
    pptLimit: 142,
    pptApuValue: Number.NaN,
    pptApuLimit: Number.NaN,
    tdcValue: 60,
    tdcLimit: 95,
    tdcActual: 58,
    tdcSocValue: 10,
    tdcSocLimit: 25,
    edcValue: 100,
    edcLimit: 140,
    edcSocValue: 12,
    edcSocLimit: 30,
    thmValue: 72.5,
    thmLimit: 90,
    thmSocValue: Number.NaN,
    thmSocLimit: Number.NaN,
    thmGfxValue: Number.NaN,
    thmGfxLimit: Number.NaN,
    fitValue: 0.5,
    fitLimit: 1,
    ...overrides,
  };
}

export function sampleMemory(
  overrides: Partial<MemoryInterfaceSnapshot> = {}
): MemoryInterfaceSnapshot {
  return {
    fclkFreq: 1800,
    fclkFreqEff: 1800,
    uclkFreq: 1800,
    memclkFreq: 1800,
    vVddm: 0.875,
    vVddp: 0.9,
    vVddg: 0.95,
    vVddgIod: 0.95,
    vVddgCcd: 0.9,
    coupledMode: true,
    ...overrides,
  };
}

export function samplePower(overrides: Partial<PowerRailSnapshot> = {}): PowerRailSnapshot {
  return {
    totalCorePower: 20,
    vddcrSocPower: 12.5,
    ioVddcrSocPower: 3,
    gmi2VddgPower: 1,
    rocPower: 0.5,
    l3LogicPower: 1.5,
    l3VddmPower: 0.75,
    vddioMemPower: 2,
    iodVddioMemPower: 1,
    ddrVddpPower: 0.5,
    ddrPhyPower: 1,
    vdd18Power: 0.25,
    ioDisplayPower: 0,
    ioUsbPower: 0.5,
    socketPower: 45.25,
    packagePower: 40,
    vddcrCpuPower: 25,
    socTelemetryVoltage: 1.1,
    socTelemetryCurrent: 11,
    socTelemetryPower: 12.1,
    cpuTelemetryVoltage: 1.3,
    cpuTelemetryCurrent: 20,
    cpuTelemetryPower: 26,
    ...overrides,
  };
}

export function sampleGraphics(overrides: Partial<GraphicsSnapshot> = {}): GraphicsSnapshot {
  return {
    gfxVoltage: Number.NaN,
    rocPower: 0.5,
    gfxTemp: Number.NaN,
    gfxFreq: Number.NaN,
    gfxFreqEff: Number.NaN,
    gfxBusy: Number.NaN,
    gfxEdcLimit: Number.NaN,
    gfxEdcResidency: Number.NaN,
    displayCount: Number.NaN,
    fps: Number.NaN,
    dgpuPower: Number.NaN,
    dgpuFreqTarget: Number.NaN,
    dgpuGfxBusy: Number.NaN,
    ...overrides,
  };
}

export function sampleStats(overrides: Partial<DerivedStats> = {}): DerivedStats {
  return {
    peakCoreFrequency: 4650,
    peakCoreTemp: 60.25,
    peakCoreVoltage: 1.35,
    avgCoreVoltage: 1.2,
    avgCoreCc6: 45.5,
    totalCorePower: 20,
    peakCoreVoltageSmu: 1.3,
    packageCc6: Number.NaN,
    ...overrides,
  };
}

export interface FakeReading {
  // Count returned by read_data; defaults to cores.length
  count?: number;
  cores: CoreReading[];
  constraints: ConstraintSnapshot;
  memory: MemoryInterfaceSnapshot;
  power: PowerRailSnapshot;
  graphics: GraphicsSnapshot;
  stats: DerivedStats;
}

export function sampleReading(cores: number = 8): FakeReading {
  return {
    cores: Array.from({ length: cores }, (_, i) => sampleCore(i)),
    constraints: sampleConstraints(),
    memory: sampleMemory(),
    power: samplePower(),
    graphics: sampleGraphics(),
    stats: sampleStats(),
  };
}

export class FakeSensorLibrary implements SensorLibrary {
  initStatus = 0;
  systemInfoStatus = 0;
  system: SystemInfo = sampleSystemInfo();
  reading: FakeReading = sampleReading();
  // When set, read_data returns this instead of a core count
  failWith: number | null = null;

  initCalls = 0;
  cleanupCalls = 0;
  readCalls = 0;
  lastMaxCores: number | null = null;

  init(): number {
    this.initCalls++;
    return this.initStatus;
  }

  cleanup(): void {
    this.cleanupCalls++;
  }

  getSystemInfo(out: Buffer): number {
    if (this.systemInfoStatus !== 0) {
      return this.systemInfoStatus;
    }
    encodeSystemInfo(this.system, out);
    return 0;
  }

  readData(
    cores: Buffer,
    maxCores: number,
    constraints: Buffer,
    memory: Buffer,
    power: Buffer,
    graphics: Buffer,
    stats: Buffer
  ): number {
    this.readCalls++;
    this.lastMaxCores = maxCores;
    if (this.failWith !== null) {
      return this.failWith;
    }

    const written = Math.min(this.reading.cores.length, maxCores);
    this.reading.cores.slice(0, written).forEach((core, i) => {
      encodeCoreReading(core, cores, i * CORE_READING_SIZE);
    });
    encodeConstraints(this.reading.constraints, constraints);
    encodeMemory(this.reading.memory, memory);
    encodePower(this.reading.power, power);
    encodeGraphics(this.reading.graphics, graphics);
    encodeStats(this.reading.stats, stats);

    return this.reading.count ?? written;
  }
}
