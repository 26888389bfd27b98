import { execFileSync } from "node:child_process";
import { NOT_AVAILABLE } from "../core/models.js";
import { consoleLogger, type Logger } from "./logger.js";

export interface ShellResult {
  stdout: string;
  exitCode: number;
  stderr?: string;
  /** Why the program could not be run or what it died of. */
  error?: string;
}

/**
 * Runs a program to completion and reports what it printed. Implementations
 * may throw; {@link CommandRunner} turns that into a failed result.
 */
export type CommandExecutor = (command: string, args: readonly string[]) => ShellResult;

export const processExecutor: CommandExecutor = (command, args) => {
  try {
    const stdout = execFileSync(command, args, {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      maxBuffer: 10 * 1024 * 1024,
      windowsHide: true,
    });
    return { stdout, exitCode: 0 };
  } catch (err: unknown) {
    const e = err as { stdout?: string | null; stderr?: string | null; status?: number | null; message?: string };
    return {
      stdout: typeof e.stdout === "string" ? e.stdout : "",
      exitCode: typeof e.status === "number" && e.status !== 0 ? e.status : 1,
      stderr: typeof e.stderr === "string" ? e.stderr : "",
      // the message repeats stderr after its first line
      error: typeof e.message === "string" ? e.message.split("\n")[0] : String(err),
    };
  }
};

function failureDetails(result: ShellResult): string {
  return [result.stdout, result.stderr, result.error]
    .filter((part): part is string => part !== undefined && part.trim().length > 0)
    .map((part) => part.trimEnd())
    .join("\n");
}

export interface CommandRunnerOptions {
  executor?: CommandExecutor;
  logger?: Logger;
}

export class CommandRunner {
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;

  constructor(opts: CommandRunnerOptions = {}) {
    this.executor = opts.executor ?? processExecutor;
    this.logger = opts.logger ?? consoleLogger;
  }

  /** Returns the program's stdout untouched, or "N/A" if it could not be run or exited non-zero. */
  run(command: string, args: readonly string[]): string {
    const commandLine = [command, ...args].join(" ");
    let result: ShellResult;

    try {
      result = this.executor(command, args);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Something went wrong trying to get system information (${commandLine}):\n${reason}`);
      return NOT_AVAILABLE;
    }

    if (result.exitCode !== 0) {
      this.logger.warn(
        `Something went wrong trying to get system information (${commandLine}):\n${failureDetails(result)}`,
      );
      return NOT_AVAILABLE;
    }

    this.logger.debug(`${commandLine} exited with 0`);
    return result.stdout;
  }
}
