import { beforeEach, describe, expect, test, vi } from "vitest";
import koffi from "koffi";
import { join } from "path";
import { libraryCandidates, loadSensorLibrary } from "../src/native/library.js";
import { LibraryLoadError } from "../src/utils/errors.js";

vi.mock("koffi", () => ({
  default: { load: vi.fn() },
}));

const mockLoad = vi.mocked(koffi.load);

function fakeLib(functions: Record<string, (...args: unknown[]) => unknown>) {
  return {
    func: vi.fn((prototype: string) => {
      const name = /\b(ryzen_\w+)\(/.exec(prototype)?.[1] ?? "";
      const fn = functions[name];
      if (!fn) {
        throw new Error(`Cannot find function '${name}' in shared library`);
      }
      return fn;
    }),
  };
}

describe("libraryCandidates", () => {
  test("tries the working directory before the loader path", () => {
    expect(libraryCandidates("libryzen_monitor.so", "/home/user/ryzen_monitor")).toEqual([
      "/home/user/ryzen_monitor/libryzen_monitor.so",
      "libryzen_monitor.so",
    ]);
  });

  test("keeps explicit paths as given", () => {
    expect(libraryCandidates("./build/libryzen_monitor.so", "/home/user")).toEqual([
      "./build/libryzen_monitor.so",
    ]);
    expect(libraryCandidates("/usr/local/lib/libryzen_monitor.so")).toEqual([
      "/usr/local/lib/libryzen_monitor.so",
    ]);
  });
});

describe("loadSensorLibrary", () => {
  beforeEach(() => {
    mockLoad.mockReset();
  });

  test("wraps a missing shared object in LibraryLoadError", () => {
    mockLoad.mockImplementation(() => {
      throw new Error("libryzen_monitor.so: cannot open shared object file");
    });

    let caught: unknown;
    try {
      loadSensorLibrary("libryzen_monitor.so");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LibraryLoadError);
    expect(caught instanceof LibraryLoadError && caught.details).toEqual({
      path: "libryzen_monitor.so",
      cause: "libryzen_monitor.so: cannot open shared object file",
    });
  });

  test("falls back to the loader path when the working directory has no copy", () => {
    const lib = fakeLib({
      ryzen_init: () => 0,
      ryzen_cleanup: () => undefined,
      ryzen_get_system_info: () => 0,
      ryzen_read_data: () => 0,
    });
    mockLoad
      .mockImplementationOnce(() => {
        throw new Error("cannot open shared object file");
      })
      .mockReturnValueOnce(lib as unknown as ReturnType<typeof koffi.load>);

    const library = loadSensorLibrary();

    expect(mockLoad.mock.calls).toEqual([
      [join(process.cwd(), "libryzen_monitor.so")],
      ["libryzen_monitor.so"],
    ]);
    expect(library.init()).toBe(0);
  });

  test("fails when an entry point is missing", () => {
    mockLoad.mockReturnValue(
      fakeLib({ ryzen_init: () => 0, ryzen_cleanup: () => undefined }) as unknown as ReturnType<
        typeof koffi.load
      >
    );

    expect(() => loadSensorLibrary("old.so")).toThrow("Failed to load sensor library: old.so");
  });

  test("forwards calls and buffers to the native functions", () => {
    const readData = vi.fn((..._args: unknown[]) => 6);
    const cleanup = vi.fn();
    const lib = fakeLib({
      ryzen_init: () => 0,
      ryzen_cleanup: cleanup,
      ryzen_get_system_info: () => 0,
      ryzen_read_data: readData,
    });
    mockLoad.mockReturnValue(lib as unknown as ReturnType<typeof koffi.load>);

    const library = loadSensorLibrary("/opt/libryzen_monitor.so");
    expect(mockLoad).toHaveBeenCalledWith("/opt/libryzen_monitor.so");
    expect(lib.func).toHaveBeenCalledWith(
      "int ryzen_read_data(void *cores, int max_cores, void *constraints, void *memory, void *power, void *graphics, void *stats)"
    );

    const cores = Buffer.alloc(40 * 8);
    const count = library.readData(
      cores,
      8,
      Buffer.alloc(104),
      Buffer.alloc(40),
      Buffer.alloc(92),
      Buffer.alloc(52),
      Buffer.alloc(32)
    );

    expect(count).toBe(6);
    expect(readData.mock.calls[0]?.[0]).toBe(cores);
    expect(readData.mock.calls[0]?.[1]).toBe(8);
    expect(library.init()).toBe(0);

    library.cleanup();
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  test("rejects a non-numeric status", () => {
    mockLoad.mockReturnValue(
      fakeLib({
        ryzen_init: () => "0",
        ryzen_cleanup: () => undefined,
        ryzen_get_system_info: () => 0,
        ryzen_read_data: () => 0,
      }) as unknown as ReturnType<typeof koffi.load>
    );

    const library = loadSensorLibrary();
    expect(() => library.init()).toThrow("ryzen_init returned string, expected int");
  });
});
