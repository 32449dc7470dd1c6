import transliterateText from "@sindresorhus/transliterate";
import {
  applySubstitutions,
  loadDefaultSubstitutions,
  type SubstitutionTable,
} from "./substitutions.js";

export const SLUG_MAX_LENGTH = 200;

// Reserved markers for characters the generic step would otherwise consume.
export const COLON_PLACEHOLDER = "@COLON@";
export const QUESTION_PLACEHOLDER = "@QMARK@";

// Umlauts outside the curated table fold to their base letter instead of
// the library's German digraphs.
export const PLAIN_FOLDS: Array<[string, string]> = [
  ["ö", "o"],
  ["Ö", "O"],
  ["ü", "u"],
  ["Ü", "U"],
];

/**
 * Unicode to ASCII. Curated substitutions run first, then generic
 * transliteration; anything still outside ASCII is dropped.
 */
export function transliterate(
  value: string,
  table: SubstitutionTable = loadDefaultSubstitutions(),
): string {
  const escaped = value
    .replace(/:/g, COLON_PLACEHOLDER)
    .replace(/\?/g, QUESTION_PLACEHOLDER);
  const curated = applySubstitutions(escaped, table);
  const generic = curated.replace(/[^\x00-\x7F]+/g, (run) =>
    transliterateText(run, { customReplacements: PLAIN_FOLDS }),
  );
  return generic
    .replace(/[^\x00-\x7F]|\?/g, "")
    .replace(new RegExp(COLON_PLACEHOLDER, "g"), ":")
    .replace(new RegExp(QUESTION_PLACEHOLDER, "g"), "?");
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/_$/, "");
}

/**
 * `"/a/b/my_song_title.flac"` becomes `"My Song Title"`.
 */
export function titleFromPath(filePath: string): string {
  const base = filePath.replace(/\/+$/, "").split("/").pop() ?? "";
  const dot = base.lastIndexOf(".");
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return stem
    .replace(/_/g, " ")
    .replace(
      /(^|\s)(\S)/g,
      (_match: string, lead: string, first: string) => lead + first.toUpperCase(),
    );
}

/**
 * Remove bracket pairs left empty after transliteration, such as `"(東京)"`
 * reduced to `"()"`, then squeeze whitespace.
 */
export function debrace(value: string): string {
  let current = value;
  let previous: string;
  do {
    previous = current;
    current = current.replace(/\(\s*\)|\[\s*\]|\{\s*\}/g, "");
  } while (current !== previous);
  return current.replace(/\s+/g, " ").trim();
}

/**
 * The tag-value cleanup `encode` applies at run time.
 */
export function normalizeTag(
  value: string,
  table: SubstitutionTable = loadDefaultSubstitutions(),
): string {
  return debrace(transliterate(value, table));
}
