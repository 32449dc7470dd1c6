import { UsageError } from "../core/errors.js";
import type { InputSource } from "../core/input.js";
import { MIN_TRACK_ID, parseStartNumber } from "../core/track-id.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | {
      kind: "generate";
      source: InputSource;
      start: number;
      configPath?: string;
      man: boolean;
    };

export const USAGE = `Usage: albumscript [options] > album.sh

Writes a bash script with one function per input file plus concatenate_all
and itemize_all. Without -d, -f or -p, NUL-separated paths are read from
stdin (e.g. find . -name '*.flac' -print0 | sort -z | albumscript).

Options:
  -d, --directory DIR   use the audio files under DIR, sorted by path
  -f, --file PATH       use a single file
  -p, --playlist FILE   use the entries of an m3u playlist
  -n, --number START    first track number (default ${MIN_TRACK_ID})
  -c, --config FILE     YAML file with default tags (genre, artist, album,
                        year, comment, image)
  -M, --no-man          leave out the sox, ffmpeg and lame manuals that are
                        otherwise appended as comments
  -h, --help            show this help
  -v, --version         show the version`;

const MODE_FLAGS = new Map<string, "directory" | "file" | "playlist">([
  ["-d", "directory"],
  ["--directory", "directory"],
  ["-f", "file"],
  ["--file", "file"],
  ["-p", "playlist"],
  ["--playlist", "playlist"],
]);

export function parseArgs(argv: readonly string[]): CliCommand {
  let source: InputSource | undefined;
  let start = MIN_TRACK_ID;
  let configPath: string | undefined;
  let man = true;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value === "") {
        throw new UsageError(`Option ${arg} needs a value.`);
      }
      i += 1;
      return value;
    };

    const mode = MODE_FLAGS.get(arg);
    if (mode) {
      if (source) {
        throw new UsageError(
          "Use only one of --directory, --file and --playlist.",
        );
      }
      source = { mode, path: takeValue() };
      continue;
    }
    switch (arg) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-v":
      case "--version":
        return { kind: "version" };
      case "-n":
      case "--number":
        start = parseStartNumber(takeValue());
        break;
      case "-c":
      case "--config":
        configPath = takeValue();
        break;
      case "-M":
      case "--no-man":
        man = false;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return {
    kind: "generate",
    source: source ?? { mode: "stdin" },
    start,
    configPath,
    man,
  };
}
