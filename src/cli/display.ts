import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { CommandField } from "../core/models.js";
import type { CollectCallbacks } from "../core/context.js";

const FIELD_LABELS: Record<CommandField, string> = {
  cpuModel: "Querying CPU model",
  availableMemory: "Querying physical memory",
};

export function createProgressCallbacks(): CollectCallbacks {
  let spinner: Ora | null = null;
  let step = 0;
  const total = Object.keys(FIELD_LABELS).length;

  return {
    onFieldStart(field: CommandField) {
      step++;
      spinner = ora({
        text: chalk.dim(`[${step}/${total}] `) + FIELD_LABELS[field],
        stream: process.stderr,
      }).start();
    },
    onFieldComplete(field: CommandField, durationMs: number) {
      if (spinner) {
        spinner.succeed(`${FIELD_LABELS[field]} ${chalk.dim(`(${durationMs}ms)`)}`);
        spinner = null;
      }
    },
  };
}
