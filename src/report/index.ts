import type { SystemSnapshot, OutputFormat } from "../core/models.js";
import { renderTerminal } from "./terminal.js";
import { renderJSON } from "./json.js";
import { renderMarkdown } from "./markdown.js";

export type Renderer = (snapshot: SystemSnapshot) => string;

export const RENDERERS: Record<OutputFormat, Renderer> = {
  terminal: renderTerminal,
  json: renderJSON,
  markdown: renderMarkdown,
};

export function renderReport(snapshot: SystemSnapshot, format: OutputFormat): string {
  return RENDERERS[format](snapshot);
}

export { renderTerminal, renderJSON, renderMarkdown };
