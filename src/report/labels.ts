import type { SystemSnapshot } from "../core/models.js";

export const FIELD_LABELS: Record<keyof SystemSnapshot, string> = {
  runtimeVersion: "Node.js",
  platformVersion: "V8",
  coreCount: "Cores",
  osFamily: "Operating system",
  cpuModel: "CPU",
  availableMemory: "Memory",
};

export const FIELD_ORDER: (keyof SystemSnapshot)[] = [
  "runtimeVersion",
  "platformVersion",
  "osFamily",
  "cpuModel",
  "coreCount",
  "availableMemory",
];
