import { readFileSync } from "node:fs";
import { ConfigError } from "./errors.js";
import { sedPattern, sedReplacement, shellQuote } from "./shell.js";

const DEFAULT_TABLE_URL = new URL(
  "../../assets/substitutions.json",
  import.meta.url,
);

/**
 * Curated character substitutions applied before generic transliteration.
 * Keys hold at least one non-ASCII character; values are plain ASCII.
 */
export interface SubstitutionTable {
  readonly entries: ReadonlyArray<readonly [string, string]>;
  readonly pattern: RegExp | null;
}

export function createSubstitutionTable(raw: unknown): SubstitutionTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError("Substitution table must be a JSON object.");
  }
  const entries: Array<readonly [string, string]> = [];
  for (const [from, to] of Object.entries(raw)) {
    if (typeof to !== "string") {
      throw new ConfigError(`Substitution for "${from}" must be a string.`);
    }
    if (from === "" || /^[\x00-\x7F]*$/.test(from)) {
      throw new ConfigError(
        `Substitution key "${from}" must contain a non-ASCII character.`,
      );
    }
    if (!/^[\x20-\x7E]*$/.test(to)) {
      throw new ConfigError(
        `Substitution value for "${from}" must be printable ASCII.`,
      );
    }
    entries.push([from, to]);
  }
  // Longest keys first so multi-character keys win over their prefixes.
  entries.sort((a, b) => b[0].length - a[0].length);
  const pattern =
    entries.length === 0
      ? null
      : new RegExp(entries.map(([from]) => escapeRegExp(from)).join("|"), "g");
  return { entries, pattern };
}

let defaultTable: SubstitutionTable | undefined;

/**
 * The table shipped in `assets/substitutions.json`, loaded once per process.
 */
export function loadDefaultSubstitutions(): SubstitutionTable {
  if (!defaultTable) {
    defaultTable = loadSubstitutionFile(DEFAULT_TABLE_URL);
  }
  return defaultTable;
}

export function loadSubstitutionFile(file: string | URL): SubstitutionTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read substitution table ${String(file)}`, {
      cause: error,
    });
  }
  return createSubstitutionTable(raw);
}

export function applySubstitutions(
  value: string,
  table: SubstitutionTable,
): string {
  if (!table.pattern) {
    return value;
  }
  const lookup = new Map(table.entries);
  return value.replace(table.pattern, (match) => lookup.get(match) ?? "");
}

/**
 * Render substitutions as `sed` arguments for the runtime `ascii` helper.
 */
export function renderSedArguments(
  entries: ReadonlyArray<readonly [string, string]>,
): string[] {
  return entries.map(
    ([from, to]) =>
      `-e ${shellQuote(`s/${sedPattern(from)}/${sedReplacement(to)}/g`)}`,
  );
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
