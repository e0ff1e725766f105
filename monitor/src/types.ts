// Records filled in by libryzen_monitor. Any float may be NaN when the
// running silicon does not report that metric.

export interface SystemInfo {
  cpuName: string;
  codename: string;
  smuFwVersion: string;
  cores: number;
  ccds: number;
  ccxs: number;
  coresPerCcx: number;
  ifVersion: number; // SMU interface version, 0 when unknown
  enabledCoresCount: number;
}

export interface CoreReading {
  coreNum: number;
  frequency: number; // MHz
  power: number; // W
  voltage: number; // V
  temp: number; // Celsius
  c0: number; // residency %
  cc1: number; // residency %
  cc6: number; // residency %
  disabled: boolean;
  sleeping: boolean;
}

export interface ConstraintSnapshot {
  peakTemp: number;
  socTemp: number;
  gfxTemp: number;
  vidValue: number;
  vidLimit: number;
  pptValue: number; // W
  pptLimit: number;
  pptApuValue: number;
  pptApuLimit: number;
  tdcValue: number; // A
  tdcLimit: number;
  tdcActual: number;
  tdcSocValue: number;
  tdcSocLimit: number;
  edcValue: number; // A
  edcLimit: number;
  edcSocValue: number;
  edcSocLimit: number;
  thmValue: number; // Celsius
  thmLimit: number;
  thmSocValue: number;
  thmSocLimit: number;
  thmGfxValue: number;
  thmGfxLimit: number;
  fitValue: number;
  fitLimit: number;
}

export interface MemoryInterfaceSnapshot {
  fclkFreq: number; // MHz
  fclkFreqEff: number;
  uclkFreq: number;
  memclkFreq: number;
  vVddm: number; // V
  vVddp: number;
  vVddg: number;
  vVddgIod: number;
  vVddgCcd: number;
  coupledMode: boolean;
}

export interface PowerRailSnapshot {
  totalCorePower: number; // W
  vddcrSocPower: number;
  ioVddcrSocPower: number;
  gmi2VddgPower: number;
  rocPower: number;
  l3LogicPower: number;
  l3VddmPower: number;
  vddioMemPower: number;
  iodVddioMemPower: number;
  ddrVddpPower: number;
  ddrPhyPower: number;
  vdd18Power: number;
  ioDisplayPower: number;
  ioUsbPower: number;
  socketPower: number;
  packagePower: number;
  vddcrCpuPower: number;
  socTelemetryVoltage: number; // V
  socTelemetryCurrent: number; // A
  socTelemetryPower: number; // W
  cpuTelemetryVoltage: number;
  cpuTelemetryCurrent: number;
  cpuTelemetryPower: number;
}

export interface GraphicsSnapshot {
  gfxVoltage: number; // V
  rocPower: number; // W
  gfxTemp: number; // Celsius
  gfxFreq: number; // MHz
  gfxFreqEff: number;
  gfxBusy: number; // %
  gfxEdcLimit: number;
  gfxEdcResidency: number;
  displayCount: number;
  fps: number;
  dgpuPower: number;
  dgpuFreqTarget: number;
  dgpuGfxBusy: number;
}

export interface DerivedStats {
  peakCoreFrequency: number; // MHz
  peakCoreTemp: number;
  peakCoreVoltage: number;
  avgCoreVoltage: number;
  avgCoreCc6: number; // %
  totalCorePower: number; // W
  peakCoreVoltageSmu: number;
  packageCc6: number; // %, NaN without package C-state telemetry
}

export interface FullSnapshot {
  coreCount: number;
  cores: CoreReading[];
  constraints: ConstraintSnapshot;
  memory: MemoryInterfaceSnapshot;
  power: PowerRailSnapshot;
  graphics: GraphicsSnapshot;
  stats: DerivedStats;
  capturedAt: Date;
}

export type ReaderState = "uninitialized" | "initialized" | "torn_down";
