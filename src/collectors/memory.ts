import { NOT_AVAILABLE, type OsFamily } from "../core/models.js";
import { convert, formatMemory } from "../conversion/memory.js";
import { BaseCollector, type SystemCommand } from "./base.js";

export class MemoryCollector extends BaseCollector {
  readonly field = "availableMemory" as const;

  protected readonly commands: Record<OsFamily, SystemCommand> = {
    Windows: { command: "WMIC", args: ["COMPUTERSYSTEM", "GET", "TOTALPHYSICALMEMORY"] },
    macOS: { command: "sysctl", args: ["-n", "hw.memsize"] },
    FreeBSD: { command: "sysctl", args: ["-n", "hw.physmem"] },
    Linux: { command: "cat", args: ["/proc/meminfo"] },
  };

  /** Total physical memory in bytes, or undefined when the output has an unexpected shape. */
  parseBytes(family: OsFamily, raw: string): number | undefined {
    switch (family) {
      case "Windows": {
        // TotalPhysicalMemory is reported in bytes below its header
        const digits = raw.match(/\d+/);
        return digits ? parseInt(digits[0], 10) : undefined;
      }
      case "macOS":
      case "FreeBSD": {
        const bytes = parseInt(raw.trim(), 10);
        return Number.isNaN(bytes) ? undefined : bytes;
      }
      case "Linux": {
        const line = raw.match(/MemTotal:\s*(\d+)\s*kB/);
        return line ? convert(parseInt(line[1], 10), "kilobyte", "byte") : undefined;
      }
    }
  }

  protected parseOutput(family: OsFamily, raw: string): string {
    const bytes = this.parseBytes(family, raw);
    return bytes === undefined ? NOT_AVAILABLE : formatMemory(bytes);
  }
}
