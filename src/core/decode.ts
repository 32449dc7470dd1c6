import { ffmpegRawArgs } from "./audio.js";

/**
 * Decode fallback: a cheap, narrow decoder first, then a broad, heavier one.
 *
 *   TRY_PRIMARY --miss--> TRY_SECONDARY --miss--> FAILED
 *        \                      \
 *         +------hit-------------+-----> DECODED
 *
 * A tier hits when its probe recognises the source and the decoder leaves a
 * non-empty scratch file. {@link DECODER_TIERS} drives both the shell
 * rendering embedded in each track function and the in-process model
 * ({@link decodeWithFallback}).
 */
export type TryState = "TRY_PRIMARY" | "TRY_SECONDARY";
export type DecodeState = TryState | "DECODED" | "FAILED";

export interface DecoderTier {
  readonly state: TryState;
  readonly label: string;
  /** Shell test that succeeds when the tool recognises `$src`. */
  readonly probe: string;
  /** Shell command writing canonical raw audio from `$src` to `$tmp`. */
  readonly decode: string;
}

export const DECODER_TIERS: readonly DecoderTier[] = [
  {
    state: "TRY_PRIMARY",
    label: "sox, when soxi reports an encoding",
    probe: `[ -n "$(soxi -e "$src" 2>/dev/null)" ]`,
    decode: `sox -q "$src" "\${RAW[@]}" "$tmp" 2>/dev/null`,
  },
  {
    state: "TRY_SECONDARY",
    label: "ffmpeg, when ffprobe finds an audio codec",
    probe:
      `[ -n "$(ffprobe -v error -select_streams a:0 -show_entries stream=codec_name ` +
      `-of csv=p=0 "$src" 2>/dev/null)" ]`,
    decode: `ffmpeg -nostdin -v error -y -i "$src" -vn ${ffmpegRawArgs()} "$tmp" 2>/dev/null`,
  },
];

const NEXT_ON_MISS: Record<TryState, DecodeState> = {
  TRY_PRIMARY: "TRY_SECONDARY",
  TRY_SECONDARY: "FAILED",
};

export type DecodeOutcome =
  | { readonly state: "DECODED"; readonly tier: TryState; readonly path: string }
  | {
      readonly state: "FAILED";
      readonly source: string;
      readonly attempted: readonly TryState[];
    };

/**
 * What the fallback needs from the host: the external decoders and a
 * scratch area.
 */
export interface DecodeRuntime {
  probe(tier: TryState, source: string): Promise<boolean>;
  /** Resolves false when the decoder exits non-zero. */
  decode(tier: TryState, source: string, target: string): Promise<boolean>;
  size(path: string): Promise<number>;
  truncate(path: string): Promise<void>;
  createScratch(label: string): Promise<string>;
  remove(path: string): Promise<void>;
  normalize(path: string): AsyncIterable<Uint8Array>;
}

export interface AudioSink {
  write(chunk: Uint8Array): void;
}

export async function decodeWithFallback(
  source: string,
  target: string,
  runtime: DecodeRuntime,
  tiers: readonly DecoderTier[] = DECODER_TIERS,
): Promise<DecodeOutcome> {
  const attempted: TryState[] = [];
  let state: DecodeState = "TRY_PRIMARY";
  while (state === "TRY_PRIMARY" || state === "TRY_SECONDARY") {
    const current: TryState = state;
    attempted.push(current);
    const tier = tiers.find((candidate) => candidate.state === current);
    if (tier && (await runtime.probe(current, source))) {
      const ok = await runtime.decode(current, source, target);
      if (ok && (await runtime.size(target)) > 0) {
        return { state: "DECODED", tier: current, path: target };
      }
      await runtime.truncate(target);
    }
    state = NEXT_ON_MISS[current];
  }
  return { state: "FAILED", source, attempted };
}

/**
 * Decode one track into scratch space and stream the normalized audio to
 * `sink`. The scratch file is released on every exit path; a failed decode
 * writes nothing.
 */
export async function streamTrack(
  label: string,
  source: string,
  runtime: DecodeRuntime,
  sink: AudioSink,
): Promise<DecodeOutcome> {
  const scratch = await runtime.createScratch(label);
  try {
    const outcome = await decodeWithFallback(source, scratch, runtime);
    if (outcome.state === "DECODED") {
      for await (const chunk of runtime.normalize(outcome.path)) {
        sink.write(chunk);
      }
    }
    return outcome;
  } finally {
    await runtime.remove(scratch);
  }
}

/**
 * Shell lines for the fallback chain, indented for a track function body.
 * Expects `$src`, `$tmp` and the `RAW` array from the preamble.
 */
export function renderDecodeFallback(
  functionName: string,
  tiers: readonly DecoderTier[] = DECODER_TIERS,
): string[] {
  const lines: string[] = [];
  for (const tier of tiers) {
    lines.push(
      `  # ${tier.state}: ${tier.label}`,
      `  if [ ! -s "$tmp" ] && ${tier.probe}; then`,
      `    ${tier.decode} || : > "$tmp"`,
      "  fi",
    );
  }
  lines.push(
    `  if [ ! -s "$tmp" ]; then`,
    `    fail "${functionName}: no decoder could read $src"`,
    "    exit 3",
    "  fi",
  );
  return lines;
}
