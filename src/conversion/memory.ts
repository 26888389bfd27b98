export type MemoryUnit = "byte" | "kilobyte" | "megabyte" | "gigabyte" | "terabyte";

export interface UnitInfo {
  name: MemoryUnit;
  label: string;
  magnitude: number;
}

// Ascending; each step is 1024 times the previous one.
export const MEMORY_UNITS: UnitInfo[] = [
  { name: "byte", label: "B", magnitude: 1 },
  { name: "kilobyte", label: "KB", magnitude: 1024 },
  { name: "megabyte", label: "MB", magnitude: 1024 ** 2 },
  { name: "gigabyte", label: "GB", magnitude: 1024 ** 3 },
  { name: "terabyte", label: "TB", magnitude: 1024 ** 4 },
];

const UNIT_BY_NAME = new Map(MEMORY_UNITS.map((u) => [u.name, u]));

export function unitInfo(name: MemoryUnit): UnitInfo {
  const info = UNIT_BY_NAME.get(name);
  if (!info) throw new Error(`Unknown memory unit: ${name}`);
  return info;
}

export function convert(value: number, from: MemoryUnit, to: MemoryUnit): number {
  return (value * unitInfo(from).magnitude) / unitInfo(to).magnitude;
}

/** Largest unit that keeps the value at or above 1. */
export function bestUnit(bytes: number): UnitInfo {
  let best = MEMORY_UNITS[0];
  for (const unit of MEMORY_UNITS) {
    if (bytes >= unit.magnitude) best = unit;
  }
  return best;
}

export function scale(bytes: number): { value: number; unit: UnitInfo } {
  const unit = bestUnit(bytes);
  return { value: bytes / unit.magnitude, unit };
}

export interface FormatOptions {
  precision?: number;
}

/**
 * Renders a byte count in its best unit, rounded to `precision` decimals with
 * trailing zeros dropped: 1024 -> "1 KB", 1536 -> "1.5 KB".
 */
export function formatMemory(bytes: number, opts: FormatOptions = {}): string {
  const precision = opts.precision ?? 2;
  let { value, unit } = scale(bytes);
  let rounded = Number(value.toFixed(precision));

  // 1023.999 KB rounds to 1024 and is shown as 1 MB
  const next = MEMORY_UNITS[MEMORY_UNITS.indexOf(unit) + 1];
  if (rounded >= 1024 && next) {
    unit = next;
    value = bytes / unit.magnitude;
    rounded = Number(value.toFixed(precision));
  }

  return `${rounded} ${unit.label}`;
}
