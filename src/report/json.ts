import type { SystemSnapshot } from "../core/models.js";

export function renderJSON(snapshot: SystemSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}
