export type OsFamily = "macOS" | "Windows" | "FreeBSD" | "Linux";

export const OS_FAMILIES: OsFamily[] = ["macOS", "Windows", "FreeBSD", "Linux"];

export const NOT_AVAILABLE = "N/A";
export const UNRECOGNIZED_PROCESSOR = "Unrecognized processor";

export interface SystemSnapshot {
  readonly runtimeVersion: string;
  readonly platformVersion: string;
  readonly coreCount: number;
  readonly osFamily: OsFamily;
  readonly cpuModel: string;
  readonly availableMemory: string;
}

/** Snapshot fields that are resolved by running an external command. */
export type CommandField = "cpuModel" | "availableMemory";

export type OutputFormat = "terminal" | "json" | "markdown";

export const OUTPUT_FORMATS: OutputFormat[] = ["terminal", "json", "markdown"];

