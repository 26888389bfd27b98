import { NOT_AVAILABLE, type CommandField, type OsFamily } from "../core/models.js";
import type { CommandRunner } from "../utils/shell.js";

export interface SystemCommand {
  command: string;
  args: string[];
}

export abstract class BaseCollector {
  abstract readonly field: CommandField;
  protected abstract readonly commands: Record<OsFamily, SystemCommand>;

  /** Turns the command output for `family` into the snapshot value. Only called with real output. */
  protected abstract parseOutput(family: OsFamily, raw: string): string;

  commandFor(family: OsFamily): SystemCommand {
    return this.commands[family];
  }

  parse(family: OsFamily, raw: string): string {
    if (raw === NOT_AVAILABLE) return NOT_AVAILABLE;
    return this.parseOutput(family, raw);
  }

  collect(family: OsFamily, runner: CommandRunner): string {
    const { command, args } = this.commandFor(family);
    return this.parse(family, runner.run(command, args));
  }
}
