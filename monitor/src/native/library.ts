import koffi from "koffi";
import { join } from "path";
import { LibraryLoadError } from "../utils/errors.js";

/**
 * Calls exported by libryzen_monitor. Record arguments are caller-owned
 * buffers that the library fills in place.
 */
export interface SensorLibrary {
  /** 0 on success, negative on failure */
  init(): number;
  cleanup(): void;
  /** 0 on success */
  getSystemInfo(out: Buffer): number;
  /** Number of cores written, or <= 0 on failure */
  readData(
    cores: Buffer,
    maxCores: number,
    constraints: Buffer,
    memory: Buffer,
    power: Buffer,
    graphics: Buffer,
    stats: Buffer
  ): number;
}

export const DEFAULT_LIBRARY_PATH = "libryzen_monitor.so";

const PROTOTYPES = {
  init: "int ryzen_init()",
  cleanup: "void ryzen_cleanup()",
  getSystemInfo: "int ryzen_get_system_info(void *sysdata)",
  readData:
    "int ryzen_read_data(void *cores, int max_cores, void *constraints, void *memory, void *power, void *graphics, void *stats)",
} as const;

function toStatus(name: string, value: unknown): number {
  if (typeof value !== "number") {
    throw new TypeError(`${name} returned ${typeof value}, expected int`);
  }
  return value;
}

/**
 * Places to look for the shared object. A bare file name is tried in the
 * working directory first, since the dynamic loader never searches it.
 */
export function libraryCandidates(path: string, cwd: string = process.cwd()): string[] {
  if (path.includes("/")) {
    return [path];
  }
  return [join(cwd, path), path];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function openLibrary(path: string): ReturnType<typeof koffi.load> {
  let lastError: unknown;
  for (const candidate of libraryCandidates(path)) {
    try {
      return koffi.load(candidate);
    } catch (error) {
      lastError = error;
    }
  }
  throw new LibraryLoadError(path, toError(lastError));
}

/**
 * Opens the shared object and binds its four entry points.
 */
export function loadSensorLibrary(path: string = DEFAULT_LIBRARY_PATH): SensorLibrary {
  const lib = openLibrary(path);
  try {
    const init = lib.func(PROTOTYPES.init);
    const cleanup = lib.func(PROTOTYPES.cleanup);
    const getSystemInfo = lib.func(PROTOTYPES.getSystemInfo);
    const readData = lib.func(PROTOTYPES.readData);

    return {
      init: () => toStatus("ryzen_init", init()),
      cleanup: () => {
        cleanup();
      },
      getSystemInfo: (out) =>
        toStatus("ryzen_get_system_info", getSystemInfo(out)),
      readData: (cores, maxCores, constraints, memory, power, graphics, stats) =>
        toStatus(
          "ryzen_read_data",
          readData(cores, maxCores, constraints, memory, power, graphics, stats)
        ),
    };
  } catch (error) {
    throw new LibraryLoadError(path, toError(error));
  }
}
