import { accessorFlag, ENCODE_FIELDS } from "./tags.js";
import { trackFunctionName } from "./track-function.js";
import type { TrackEntry } from "./track-id.js";

export const CONCATENATE_FUNCTION = "concatenate_all";
export const ITEMIZE_FUNCTION = "itemize_all";
export const ITEM_EXTENSION = ".mp3";

/**
 * Stream every track, in ascending order, as one uninterrupted raw stream.
 * A failing track is reported and skipped; the rest still play.
 */
export function renderConcatenate(entries: readonly TrackEntry[]): string {
  const lines = [`${CONCATENATE_FUNCTION}() {`, "  local status=0"];
  for (const entry of ascending(entries)) {
    lines.push(`  ${trackFunctionName(entry)} || status=1`);
  }
  lines.push('  return "$status"', "}");
  return `${lines.join("\n")}\n`;
}

/**
 * Encode each track to its own tagged file named
 * `slug(ascii("<track> <artist> <title>")).mp3`.
 */
export function renderItemize(entries: readonly TrackEntry[]): string {
  const lines = [`${ITEMIZE_FUNCTION}() {`, "  local status=0"];
  for (const entry of ascending(entries)) {
    lines.push(...renderItem(trackFunctionName(entry)));
  }
  lines.push('  return "$status"', "}");
  return `${lines.join("\n")}\n`;
}

export function itemFileNameExpression(name: string): string {
  const parts = (["track", "artist", "title"] as const)
    .map((field) => `"$(${name} ${accessorFlag(field)})"`)
    .join(" ");
  return `"$(printf '%s %s %s' ${parts} | ascii | slug)${ITEM_EXTENSION}"`;
}

function renderItem(name: string): string[] {
  const fields = ENCODE_FIELDS.map(
    (field) => `"$(${name} ${accessorFlag(field)})"`,
  );
  return [
    `  ${name} | encode \\`,
    `    ${fields.slice(0, 4).join(" ")} \\`,
    `    ${fields.slice(4).join(" ")} \\`,
    `    ${itemFileNameExpression(name)} || status=1`,
  ];
}

function ascending(entries: readonly TrackEntry[]): TrackEntry[] {
  return [...entries].sort((a, b) => a.id - b.id);
}
