import type {
  ConstraintSnapshot,
  CoreReading,
  FullSnapshot,
  SystemInfo,
} from "@ryzen-dash/monitor";

export const PLACEHOLDER = "--";

/**
 * Fixed-precision value with an optional unit. NaN and infinities mean the
 * sensor is not reported on this CPU and render as the placeholder.
 */
export function formatValue(value: number, digits: number, unit?: string): string {
  if (!Number.isFinite(value)) {
    return PLACEHOLDER;
  }
  const text = value.toFixed(digits);
  return unit ? `${text} ${unit}` : text;
}

export function coreFrequencyLabel(core: CoreReading): string {
  if (core.disabled) return "Disabled";
  if (core.sleeping) return "Sleeping";
  return formatValue(core.frequency, 0);
}

export function constraintPercent(value: number, limit: number): number {
  if (!Number.isFinite(value) || !Number.isFinite(limit) || limit <= 0) {
    return 0;
  }
  return Math.max(0, Math.trunc((value / limit) * 100));
}

export function constraintLabel(value: number, limit: number, unit: string): string {
  return `${formatValue(value, 1)} / ${formatValue(limit, 0)} ${unit}`;
}

export interface CoreRow {
  core: string;
  frequency: string;
  power: string;
  voltage: string;
  temp: string;
  c0: string;
  cc1: string;
  cc6: string;
}

export interface LabelledValue {
  label: string;
  value: string;
}

export interface ConstraintBar {
  name: string;
  percent: number;
  label: string;
}

export interface DashboardView {
  system: LabelledValue[];
  stats: LabelledValue[];
  cores: CoreRow[];
  peakTemp: string;
  constraints: ConstraintBar[];
  constraintDetails: LabelledValue[];
  memory: LabelledValue[];
  power: LabelledValue[];
  graphics: LabelledValue[];
}

export interface ViewOptions {
  detailed?: boolean;
}

export function coreRow(core: CoreReading): CoreRow {
  return {
    core: `Core ${core.coreNum}`,
    frequency: coreFrequencyLabel(core),
    power: formatValue(core.power, 3),
    voltage: formatValue(core.voltage, 3),
    temp: formatValue(core.temp, 1),
    c0: formatValue(core.c0, 1),
    cc1: formatValue(core.cc1, 1),
    cc6: formatValue(core.cc6, 1),
  };
}

export function systemLines(system: SystemInfo | null): LabelledValue[] {
  if (!system) {
    return [
      { label: "CPU", value: PLACEHOLDER },
      { label: "Codename", value: PLACEHOLDER },
      { label: "Cores", value: PLACEHOLDER },
      { label: "SMU", value: PLACEHOLDER },
    ];
  }
  return [
    { label: "CPU", value: system.cpuName },
    { label: "Codename", value: system.codename },
    { label: "Cores", value: `${system.enabledCoresCount} / CCDs: ${system.ccds}` },
    { label: "SMU", value: `v${system.smuFwVersion}` },
  ];
}

function bar(name: string, value: number, limit: number, unit: string): ConstraintBar {
  return {
    name,
    percent: constraintPercent(value, limit),
    label: constraintLabel(value, limit, unit),
  };
}

function constraintBars(c: ConstraintSnapshot, detailed: boolean): ConstraintBar[] {
  const bars = [
    bar("PPT", c.pptValue, c.pptLimit, "W"),
    bar("TDC", c.tdcValue, c.tdcLimit, "A"),
    bar("EDC", c.edcValue, c.edcLimit, "A"),
    bar("THM", c.thmValue, c.thmLimit, "C"),
  ];
  if (detailed) {
    bars.push(
      bar("PPT APU", c.pptApuValue, c.pptApuLimit, "W"),
      bar("TDC SoC", c.tdcSocValue, c.tdcSocLimit, "A"),
      bar("EDC SoC", c.edcSocValue, c.edcSocLimit, "A"),
      bar("THM SoC", c.thmSocValue, c.thmSocLimit, "C"),
      bar("THM GFX", c.thmGfxValue, c.thmGfxLimit, "C")
    );
  }
  return bars;
}

export function buildDashboardView(
  system: SystemInfo | null,
  snapshot: FullSnapshot,
  options: ViewOptions = {}
): DashboardView {
  const detailed = options.detailed ?? false;
  const { stats, constraints, memory, power, graphics } = snapshot;

  const view: DashboardView = {
    system: systemLines(system),
    stats: [
      { label: "Highest Freq", value: formatValue(stats.peakCoreFrequency, 0, "MHz") },
      { label: "Highest Temp", value: formatValue(stats.peakCoreTemp, 1, "°C") },
      { label: "Highest Voltage", value: formatValue(stats.peakCoreVoltage, 3, "V") },
      { label: "Average Voltage", value: formatValue(stats.avgCoreVoltage, 3, "V") },
      { label: "Average CC6", value: formatValue(stats.avgCoreCc6, 1, "%") },
      { label: "Total Core Power", value: formatValue(stats.totalCorePower, 3, "W") },
      { label: "Peak Voltage (SMU)", value: formatValue(stats.peakCoreVoltageSmu, 3, "V") },
      { label: "Package CC6", value: formatValue(stats.packageCc6, 1, "%") },
    ],
    cores: snapshot.cores.map(coreRow),
    peakTemp: formatValue(constraints.peakTemp, 1, "°C"),
    constraints: constraintBars(constraints, detailed),
    constraintDetails: [],
    memory: [
      { label: "FCLK", value: formatValue(memory.fclkFreq, 0, "MHz") },
      { label: "FCLK (Eff)", value: formatValue(memory.fclkFreqEff, 0, "MHz") },
      { label: "UCLK", value: formatValue(memory.uclkFreq, 0, "MHz") },
      { label: "MEMCLK", value: formatValue(memory.memclkFreq, 0, "MHz") },
      { label: "Coupled", value: memory.coupledMode ? "ON" : "OFF" },
    ],
    power: [
      { label: "Socket", value: formatValue(power.socketPower, 3, "W") },
      { label: "Core Total", value: formatValue(power.totalCorePower, 3, "W") },
      { label: "SoC", value: formatValue(power.vddcrSocPower, 3, "W") },
    ],
    graphics: [
      { label: "GFX Clock", value: formatValue(graphics.gfxFreq, 0, "MHz") },
      { label: "GFX Temp", value: formatValue(graphics.gfxTemp, 1, "°C") },
    ],
  };

  if (!detailed) {
    return view;
  }

  view.constraintDetails.push(
    { label: "SoC Temp", value: formatValue(constraints.socTemp, 1, "°C") },
    { label: "GFX Temp", value: formatValue(constraints.gfxTemp, 1, "°C") },
    { label: "VID", value: `${formatValue(constraints.vidValue, 3)} / ${formatValue(constraints.vidLimit, 3)} V` },
    { label: "TDC Actual", value: formatValue(constraints.tdcActual, 1, "A") },
    { label: "FIT", value: `${formatValue(constraints.fitValue, 3)} / ${formatValue(constraints.fitLimit, 3)}` }
  );
  view.memory.push(
    { label: "VDDM", value: formatValue(memory.vVddm, 4, "V") },
    { label: "VDDP", value: formatValue(memory.vVddp, 4, "V") },
    { label: "VDDG", value: formatValue(memory.vVddg, 4, "V") },
    { label: "VDDG IOD", value: formatValue(memory.vVddgIod, 4, "V") },
    { label: "VDDG CCD", value: formatValue(memory.vVddgCcd, 4, "V") }
  );
  view.power.push(
    { label: "Package", value: formatValue(power.packagePower, 3, "W") },
    { label: "VDDCR CPU", value: formatValue(power.vddcrCpuPower, 3, "W") },
    {
      label: "CPU Telemetry",
      value: telemetry(power.cpuTelemetryVoltage, power.cpuTelemetryCurrent, power.cpuTelemetryPower),
    },
    {
      label: "SoC Telemetry",
      value: telemetry(power.socTelemetryVoltage, power.socTelemetryCurrent, power.socTelemetryPower),
    }
  );
  view.graphics.push(
    { label: "GFX Clock (Eff)", value: formatValue(graphics.gfxFreqEff, 0, "MHz") },
    { label: "GFX Voltage", value: formatValue(graphics.gfxVoltage, 3, "V") },
    { label: "GFX Busy", value: formatValue(graphics.gfxBusy, 1, "%") },
    { label: "FPS", value: formatValue(graphics.fps, 0) },
    { label: "Displays", value: formatValue(graphics.displayCount, 0) },
    { label: "dGPU Power", value: formatValue(graphics.dgpuPower, 3, "W") },
    { label: "dGPU Clock", value: formatValue(graphics.dgpuFreqTarget, 0, "MHz") },
    { label: "dGPU Busy", value: formatValue(graphics.dgpuGfxBusy, 1, "%") }
  );

  return view;
}

function telemetry(voltage: number, current: number, power: number): string {
  return [
    formatValue(voltage, 3, "V"),
    formatValue(current, 1, "A"),
    formatValue(power, 3, "W"),
  ].join(" / ");
}
