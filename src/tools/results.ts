/**
 * Result content helpers
 */

import type { TextContent, ToolContent } from "./types.js";

export function textContent(text: string): ToolContent {
  return [{ type: "text", text }];
}

export function jsonContent(value: unknown): ToolContent {
  return [{ type: "text", text: JSON.stringify(value, null, 2) }];
}

/** One block per item, so agents can page through long listings */
export function listContent(items: readonly unknown[]): ToolContent {
  if (items.length === 0) {
    return textContent("[]");
  }
  return items.map((item): TextContent => ({ type: "text", text: JSON.stringify(item, null, 2) }));
}
