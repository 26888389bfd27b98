import chalk from "chalk";
import { NOT_AVAILABLE, UNRECOGNIZED_PROCESSOR, type SystemSnapshot } from "../core/models.js";
import { FIELD_LABELS, FIELD_ORDER } from "./labels.js";

const LABEL_WIDTH = Math.max(...FIELD_ORDER.map((f) => FIELD_LABELS[f].length)) + 1;

function colorValue(value: string): string {
  if (value === NOT_AVAILABLE || value === UNRECOGNIZED_PROCESSOR) {
    return chalk.yellow(value);
  }
  return value;
}

export function renderTerminal(snapshot: SystemSnapshot): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(chalk.bold("System Information"));
  lines.push("");

  for (const field of FIELD_ORDER) {
    const label = `${FIELD_LABELS[field]}:`.padEnd(LABEL_WIDTH);
    lines.push(`  ${chalk.dim(label)} ${colorValue(String(snapshot[field]))}`);
  }

  lines.push("");
  return lines.join("\n");
}
