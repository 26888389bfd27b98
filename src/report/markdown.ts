import type { SystemSnapshot } from "../core/models.js";
import { FIELD_LABELS, FIELD_ORDER } from "./labels.js";

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

export function renderMarkdown(snapshot: SystemSnapshot): string {
  const lines = ["## System Information", "", "| Property | Value |", "| --- | --- |"];
  for (const field of FIELD_ORDER) {
    lines.push(`| ${FIELD_LABELS[field]} | ${escapeCell(String(snapshot[field]))} |`);
  }
  return lines.join("\n");
}
