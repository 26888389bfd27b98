import { platform } from "node:os";
import type { OsFamily } from "../core/models.js";

const FAMILY_BY_TAG: Record<string, OsFamily> = {
  darwin: "macOS",
  win32: "Windows",
  freebsd: "FreeBSD",
};

/** Maps a Node.js platform tag onto an OS family. Anything unknown counts as Linux. */
export function detectOsFamily(tag: string = platform()): OsFamily {
  return Object.hasOwn(FAMILY_BY_TAG, tag) ? FAMILY_BY_TAG[tag] : "Linux";
}
