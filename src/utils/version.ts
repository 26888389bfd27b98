import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { consoleLogger, type Logger } from "./logger.js";

export type FileReader = (path: string) => string;

export interface PlatformVersionOptions {
  readFile?: FileReader;
  installDir?: string;
  engineVersion?: string;
  logger?: Logger;
}

const V8_DEFINES = ["V8_MAJOR_VERSION", "V8_MINOR_VERSION", "V8_BUILD_NUMBER", "V8_PATCH_LEVEL"];

export function runtimeVersion(): string {
  return process.versions.node;
}

export function defaultInstallDir(): string {
  return resolve(dirname(process.execPath), "..");
}

export function versionHeaderPath(installDir: string): string {
  return join(installDir, "include", "node", "v8-version.h");
}

/** "11.3.244.8-node.16" -> "11.3" */
export function coarseEngineVersion(engineVersion: string): string {
  return engineVersion.split(".").slice(0, 2).join(".");
}

export function parseVersionHeader(header: string): string | null {
  const parts: string[] = [];
  for (const name of V8_DEFINES) {
    const match = header.match(new RegExp(`^#define\\s+${name}\\s+(\\d+)`, "m"));
    if (!match) return null;
    parts.push(match[1]);
  }
  return parts.join(".");
}

/**
 * Precise V8 version taken from the headers shipped with the Node.js
 * installation. When the headers are missing (Windows zips, some distro
 * packages) only the release line, major.minor of `process.versions.v8`, is
 * reported, so a fallback value never passes for one read from the headers.
 */
export function platformVersion(opts: PlatformVersionOptions = {}): string {
  const readFile = opts.readFile ?? ((path: string) => readFileSync(path, "utf-8"));
  const logger = opts.logger ?? consoleLogger;
  const engineVersion = opts.engineVersion ?? process.versions.v8;
  const file = versionHeaderPath(opts.installDir ?? defaultInstallDir());

  let reason: string;
  try {
    const version = parseVersionHeader(readFile(file));
    if (version) return version;
    reason = `no version defines in ${file}`;
  } catch (err) {
    reason = err instanceof Error ? err.message : String(err);
  }

  logger.warn(`Error trying to determine V8 version (${reason}), falling back to overall engine version`);
  return coarseEngineVersion(engineVersion);
}
