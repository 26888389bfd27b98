import { availableParallelism } from "node:os";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SystemInfoCollector } from "../../src/core/collector.js";
import { CollectContext, type CollectOptions } from "../../src/core/context.js";
import { cpuCollector } from "../../src/collectors/index.js";
import type { CommandExecutor } from "../../src/utils/shell.js";

const V8_HEADER = [
  "#define V8_MAJOR_VERSION 11",
  "#define V8_MINOR_VERSION 3",
  "#define V8_BUILD_NUMBER 244",
  "#define V8_PATCH_LEVEL 8",
].join("\n");

const OUTPUTS: Record<string, string> = {
  "cat /proc/cpuinfo": "processor\t: 0\nmodel name\t: Intel(R) Core(TM) i7 @ 2.6GHz\n",
  "cat /proc/meminfo": "MemTotal:       16384000 kB\nMemFree:         2048000 kB\n",
  "sysctl -n machdep.cpu.brand_string": "Apple M2\n",
  "sysctl -n hw.memsize": "17179869184\n",
};

function fixtureExecutor(calls: string[] = []): CommandExecutor {
  return (command, args) => {
    const line = [command, ...args].join(" ");
    calls.push(line);
    const stdout = OUTPUTS[line];
    return stdout === undefined ? { stdout: `not found: ${line}`, exitCode: 127 } : { stdout, exitCode: 0 };
  };
}

function createLogger() {
  return { warn: vi.fn(), debug: vi.fn() };
}

function context(opts: CollectOptions): CollectContext {
  return new CollectContext({ readFile: () => V8_HEADER, installDir: "/opt/node", ...opts });
}

describe("SystemInfoCollector", () => {
  const collector = new SystemInfoCollector();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a snapshot for Linux", () => {
    const snapshot = collector.collect(
      context({ executor: fixtureExecutor(), platform: "linux", logger: createLogger() }),
    );

    expect(snapshot).toEqual({
      runtimeVersion: process.versions.node,
      platformVersion: "11.3.244.8",
      coreCount: availableParallelism(),
      osFamily: "Linux",
      cpuModel: "Intel(R) Core(TM) i7 @ 2.6GHz",
      availableMemory: "15.63 GB",
    });
  });

  it("uses the detected family for both queries", () => {
    const calls: string[] = [];
    const snapshot = collector.collect(
      context({ executor: fixtureExecutor(calls), platform: "darwin", logger: createLogger() }),
    );

    expect(calls).toEqual(["sysctl -n machdep.cpu.brand_string", "sysctl -n hw.memsize"]);
    expect(snapshot.osFamily).toBe("macOS");
    expect(snapshot.cpuModel).toBe("Apple M2");
    expect(snapshot.availableMemory).toBe("16 GB");
  });

  it("degrades failed queries to N/A and still fills the other fields", () => {
    const logger = createLogger();
    const snapshot = collector.collect(
      context({ executor: fixtureExecutor(), platform: "win32", logger }),
    );

    expect(snapshot.osFamily).toBe("Windows");
    expect(snapshot.cpuModel).toBe("N/A");
    expect(snapshot.availableMemory).toBe("N/A");
    expect(snapshot.platformVersion).toBe("11.3.244.8");
    expect(snapshot.coreCount).toBeGreaterThan(0);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("keeps collecting when a collector throws", () => {
    vi.spyOn(cpuCollector, "collect").mockImplementation(() => {
      throw new Error("boom");
    });
    const logger = createLogger();

    const snapshot = collector.collect(
      context({ executor: fixtureExecutor(), platform: "linux", logger }),
    );

    expect(snapshot.cpuModel).toBe("N/A");
    expect(snapshot.availableMemory).toBe("15.63 GB");
    expect(logger.warn).toHaveBeenCalledWith("Could not determine cpuModel: boom");
  });

  it("returns a frozen snapshot", () => {
    const snapshot = collector.collect(
      context({ executor: fixtureExecutor(), platform: "linux", logger: createLogger() }),
    );

    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it("reports progress for the command-backed fields", () => {
    const onFieldStart = vi.fn();
    const onFieldComplete = vi.fn();

    collector.collect(
      context({
        executor: fixtureExecutor(),
        platform: "linux",
        logger: createLogger(),
        callbacks: { onFieldStart, onFieldComplete },
      }),
    );

    expect(onFieldStart.mock.calls).toEqual([["cpuModel"], ["availableMemory"]]);
    expect(onFieldComplete).toHaveBeenCalledTimes(2);
    expect(onFieldComplete).toHaveBeenNthCalledWith(1, "cpuModel", expect.any(Number));
  });
});
