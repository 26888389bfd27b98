/**
 * host-snapshot: runtime, OS, CPU and memory of the current machine
 *
 * @example
 * ```typescript
 * import { collect, formatSnapshot } from 'host-snapshot';
 *
 * const snapshot = collect();
 * console.log(snapshot.cpuModel); // "Apple M2" | "N/A" | ...
 *
 * const markdown = formatSnapshot(snapshot, 'markdown');
 * ```
 */

import type { SystemSnapshot, OutputFormat } from "./core/models.js";
import { CollectContext, type CollectOptions } from "./core/context.js";
import { SystemInfoCollector } from "./core/collector.js";
import { renderReport } from "./report/index.js";

export function collect(options: CollectOptions = {}): SystemSnapshot {
  return new SystemInfoCollector().collect(new CollectContext(options));
}

export function formatSnapshot(snapshot: SystemSnapshot, format: OutputFormat): string {
  return renderReport(snapshot, format);
}

export {
  type SystemSnapshot,
  type OsFamily,
  type OutputFormat,
  type CommandField,
  OS_FAMILIES,
  OUTPUT_FORMATS,
  NOT_AVAILABLE,
  UNRECOGNIZED_PROCESSOR,
} from "./core/models.js";
export { type CollectOptions, type CollectCallbacks, CollectContext } from "./core/context.js";
export { SystemInfoCollector } from "./core/collector.js";
export {
  CommandRunner,
  processExecutor,
  consoleLogger,
  silentLogger,
  detectOsFamily,
  platformVersion,
  runtimeVersion,
  type CommandExecutor,
  type ShellResult,
  type Logger,
  type FileReader,
} from "./utils/index.js";
export { cpuCollector, memoryCollector } from "./collectors/index.js";
export { convert, formatMemory, scale, MEMORY_UNITS, type MemoryUnit } from "./conversion/memory.js";
