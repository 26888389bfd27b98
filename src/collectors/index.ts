import type { CommandField } from "../core/models.js";
import type { BaseCollector } from "./base.js";
import { CpuCollector } from "./cpu.js";
import { MemoryCollector } from "./memory.js";

export const cpuCollector = new CpuCollector();
export const memoryCollector = new MemoryCollector();

export const COLLECTOR_REGISTRY: Record<CommandField, BaseCollector> = {
  cpuModel: cpuCollector,
  availableMemory: memoryCollector,
};

export { BaseCollector, type SystemCommand } from "./base.js";
export { CpuCollector } from "./cpu.js";
export { MemoryCollector } from "./memory.js";
