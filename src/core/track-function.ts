import { NORMALIZE_HEADROOM_DB } from "./audio.js";
import { renderDecodeFallback } from "./decode.js";
import { shellQuote } from "./shell.js";
import type { SubstitutionTable } from "./substitutions.js";
import { ACCESSORS, TAG_VARIABLES, isSharedTag } from "./tags.js";
import { titleFromPath, transliterate } from "./text.js";
import type { TrackEntry } from "./track-id.js";

export function trackFunctionName(entry: Pick<TrackEntry, "label">): string {
  return `track_${entry.label}`;
}

export function trackTitle(
  entry: Pick<TrackEntry, "path">,
  table?: SubstitutionTable,
): string {
  return transliterate(titleFromPath(entry.path), table);
}

/**
 * One track function. Without arguments it decodes, normalizes and streams
 * raw canonical audio; with a single accessor flag it prints one field
 * instead. The body is a subshell so its traps die with it.
 */
export function renderTrackFunction(
  entry: TrackEntry,
  table?: SubstitutionTable,
): string {
  const name = trackFunctionName(entry);
  const title = trackTitle(entry, table);
  const intrinsic: Record<"source" | "track" | "title", string> = {
    source: '"$src"',
    track: shellQuote(entry.label),
    title: shellQuote(title),
  };

  const lines: string[] = [
    `# ${entry.label}: ${oneLine(title)}`,
    `# ${oneLine(entry.path)}`,
    `${name}() (`,
    `  src=${shellQuote(entry.path)}`,
    "  case $# in",
    "    0) ;;",
    "    1)",
    "      case $1 in",
  ];
  for (const { flag, field } of ACCESSORS) {
    const value = isSharedTag(field)
      ? `"$${TAG_VARIABLES[field]}"`
      : intrinsic[field];
    lines.push(`        ${flag}) printf '%s\\n' ${value} ;;`);
  }
  lines.push(
    `        *) fail "${name}: unknown flag: $1"; exit 2 ;;`,
    "      esac",
    "      exit 0 ;;",
    `    *) fail "${name}: expected at most one flag"; exit 2 ;;`,
    "  esac",
    `  tmp=$(mktemp "\${TMPDIR:-/tmp}/${name}.XXXXXX") || exit 1`,
    `  trap 'rm -f -- "$tmp"' EXIT`,
    "  trap 'exit 130' INT",
    "  trap 'exit 143' TERM",
    ...renderDecodeFallback(name),
    `  sox -q "\${RAW[@]}" "$tmp" "\${RAW[@]}" - gain -n ${NORMALIZE_HEADROOM_DB}`,
    "  status=$?",
    `  rm -f -- "$tmp"`,
    "  trap - EXIT",
    `  exit "$status"`,
    ")",
  );
  return `${lines.join("\n")}\n`;
}

// Paths may hold newlines; comments must not.
function oneLine(value: string): string {
  return value.replace(/[\r\n]+/g, " ");
}
