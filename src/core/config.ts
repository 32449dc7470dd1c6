import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { ConfigError } from "./errors.js";
import type { InputSource } from "./input.js";
import { isSharedTag, type TagDefaults } from "./tags.js";
import { titleFromPath } from "./text.js";

/**
 * Parse a YAML tag-defaults file. Every key must be one of the shared tags;
 * values are strings, or numbers (for `year`).
 */
export function parseTagDefaults(raw: string): Partial<TagDefaults> {
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError("Tag defaults must be a YAML mapping.");
  }
  const tags: Partial<TagDefaults> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    const value: unknown = entry;
    if (!isSharedTag(key)) {
      throw new ConfigError(`Unknown tag \`${key}\` in tag defaults.`);
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      tags[key] = String(value);
    } else if (typeof value === "string") {
      tags[key] = value;
    } else if (value !== null) {
      throw new ConfigError(`Tag \`${key}\` must be a string.`);
    }
  }
  return tags;
}

export async function loadTagDefaults(
  filePath: string,
): Promise<Partial<TagDefaults>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read tag defaults ${filePath}`, {
      cause: error,
    });
  }
  return parseTagDefaults(raw);
}

/**
 * Album title implied by a directory or playlist name, when none is set.
 */
export function inferAlbum(source: InputSource): string | undefined {
  if (source.mode === "directory" || source.mode === "playlist") {
    const title = titleFromPath(source.path);
    return title === "" || title === "." ? undefined : title;
  }
  return undefined;
}
