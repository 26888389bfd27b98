import { UNRECOGNIZED_PROCESSOR, type OsFamily } from "../core/models.js";
import { BaseCollector, type SystemCommand } from "./base.js";

const WINDOWS_HEADER = "Name";
const CPUINFO_MODEL_NAME = /model name.*:([\w ()\-@.]*)/i;

export class CpuCollector extends BaseCollector {
  readonly field = "cpuModel" as const;

  protected readonly commands: Record<OsFamily, SystemCommand> = {
    Windows: { command: "WMIC", args: ["CPU", "GET", "NAME"] },
    macOS: { command: "sysctl", args: ["-n", "machdep.cpu.brand_string"] },
    FreeBSD: { command: "sysctl", args: ["-n", "hw.model"] },
    Linux: { command: "cat", args: ["/proc/cpuinfo"] },
  };

  protected parseOutput(family: OsFamily, raw: string): string {
    switch (family) {
      case "Windows":
        return this.parseWmic(raw);
      case "macOS":
      case "FreeBSD":
        return raw.trim();
      case "Linux":
        return this.parseCpuinfo(raw);
    }
  }

  // WMIC prints a "Name" column header above the value. A localized header is
  // left in place, so the result then still contains it.
  private parseWmic(raw: string): string {
    const body = raw.startsWith(WINDOWS_HEADER) ? raw.slice(WINDOWS_HEADER.length) : raw;
    return body.trim();
  }

  private parseCpuinfo(raw: string): string {
    const match = raw.match(CPUINFO_MODEL_NAME);
    if (!match) return UNRECOGNIZED_PROCESSOR;
    return match[1].trim();
  }
}
