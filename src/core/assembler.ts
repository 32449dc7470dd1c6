import { readFileSync } from "node:fs";
import {
  CANONICAL_FORMAT,
  ENCODER_QUALITY,
  lameRawArgs,
  soxRawArgs,
} from "./audio.js";
import {
  CONCATENATE_FUNCTION,
  ITEM_EXTENSION,
  ITEMIZE_FUNCTION,
  renderConcatenate,
  renderItemize,
} from "./aggregate.js";
import { ConfigError } from "./errors.js";
import { commentLines, shellQuote } from "./shell.js";
import {
  loadDefaultSubstitutions,
  renderSedArguments,
  type SubstitutionTable,
} from "./substitutions.js";
import {
  EMPTY_TAGS,
  SHARED_TAGS,
  TAG_VARIABLES,
  type TagDefaults,
} from "./tags.js";
import {
  COLON_PLACEHOLDER,
  PLAIN_FOLDS,
  QUESTION_PLACEHOLDER,
  SLUG_MAX_LENGTH,
} from "./text.js";
import { renderTrackFunction, trackFunctionName } from "./track-function.js";
import { assignTrackIds, MIN_TRACK_ID, type TrackEntry } from "./track-id.js";

const PREAMBLE_URL = new URL("../../assets/preamble.sh", import.meta.url);

export interface ScriptRequest {
  paths: readonly string[];
  /** First track number; defaults to 1. */
  start?: number;
  /** Where the paths came from, for error messages. */
  source?: string;
  tags?: Partial<TagDefaults>;
  /** Reference text appended as comments. */
  reference?: readonly string[];
  table?: SubstitutionTable;
  version?: string;
  /** Preamble template text; the shipped `assets/preamble.sh` otherwise. */
  preamble?: string;
}

export interface GeneratedScript {
  readonly text: string;
  readonly tracks: readonly TrackEntry[];
}

/**
 * Build the whole script. Numbering is checked before any text is rendered,
 * so a capacity failure produces no partial output.
 */
export function assembleScript(request: ScriptRequest): GeneratedScript {
  const tracks = assignTrackIds(
    request.paths,
    request.start ?? MIN_TRACK_ID,
    request.source,
  );
  const table = request.table ?? loadDefaultSubstitutions();
  const tags: TagDefaults = { ...EMPTY_TAGS, ...request.tags };

  const sections = [
    renderPreamble(request.preamble ?? loadPreambleTemplate(), {
      table,
      version: request.version ?? "dev",
    }),
    tracks.map((entry) => renderTrackFunction(entry, table)).join("\n"),
    renderConcatenate(tracks),
    renderItemize(tracks),
    renderEpilogue(tracks, tags, request.reference ?? []),
  ];
  return { text: sections.join("\n"), tracks };
}

export function loadPreambleTemplate(): string {
  try {
    return readFileSync(PREAMBLE_URL, "utf-8");
  } catch (error) {
    throw new ConfigError("Cannot read the runtime preamble template.", {
      cause: error,
    });
  }
}

export function renderPreamble(
  template: string,
  options: { table: SubstitutionTable; version: string },
): string {
  // Same data, same order as transliterate(): curated table, then folds.
  const substitutions = renderSedArguments([
    ...options.table.entries,
    ...PLAIN_FOLDS,
  ])
    .map((arg) => `    ${arg} \\\n`)
    .join("");
  const values: Record<string, string> = {
    VERSION: options.version,
    FORMAT: describeFormat(),
    SOX_RAW: soxRawArgs(),
    LAME_RAW: lameRawArgs(),
    QUALITY: String(ENCODER_QUALITY),
    SLUG_MAX: String(SLUG_MAX_LENGTH),
    COLON: COLON_PLACEHOLDER,
    QMARK: QUESTION_PLACEHOLDER,
  };
  const text = template
    .replace(/^%%SUBSTITUTIONS%%\n/m, () => substitutions)
    .replace(/%%([A-Z_]+)%%/g, (match, key: string) => {
      const value = values[key];
      if (value === undefined) {
        throw new ConfigError(`Unknown preamble placeholder ${match}`);
      }
      return value;
    });
  return text.endsWith("\n") ? text : `${text}\n`;
}

export function renderEpilogue(
  tracks: readonly TrackEntry[],
  tags: TagDefaults,
  reference: readonly string[],
): string {
  const first = tracks[0];
  const lines = [
    "# Tag defaults, read by the track functions each time they run.",
    "# Override one for a single call, e.g. ARTIST='Guest Artist' itemize_all",
  ];
  for (const field of SHARED_TAGS) {
    lines.push(`${TAG_VARIABLES[field]}=${shellQuote(tags[field])}`);
  }
  lines.push(
    "",
    "# Uncomment the operations to run.",
    `# ${CONCATENATE_FUNCTION} | play_raw`,
    `# ${CONCATENATE_FUNCTION} | levels`,
    `# ${CONCATENATE_FUNCTION} | encode "$GENRE" "$ARTIST" "$ALBUM" "$YEAR" '' ` +
      `"$ALBUM" "$COMMENT" "$IMAGE" ` +
      `"$(printf '%s %s' "$ARTIST" "$ALBUM" | ascii | slug)${ITEM_EXTENSION}"`,
    `# ${ITEMIZE_FUNCTION}`,
  );
  if (first) {
    lines.push(`# ${trackFunctionName(first)} | play_raw`);
  }
  if (reference.length > 0) {
    lines.push("", "# Reference", "#", ...reference.flatMap(commentLines));
  }
  return `${lines.join("\n")}\n`;
}

function describeFormat(): string {
  const { channels, sampleRate, bitDepth } = CANONICAL_FORMAT;
  return `${channels} channels, ${sampleRate} Hz, ${bitDepth}-bit signed little-endian`;
}
