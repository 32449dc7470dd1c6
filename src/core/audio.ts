/**
 * Intermediate format every decode, normalize and encode step agrees on.
 */
export interface RawAudioFormat {
  channels: number;
  sampleRate: number;
  bitDepth: number;
}

export const CANONICAL_FORMAT: Readonly<RawAudioFormat> = Object.freeze({
  channels: 2,
  sampleRate: 44_100,
  bitDepth: 24,
});

/** Peak level, in dBFS, that decoded tracks are normalized to. */
export const NORMALIZE_HEADROOM_DB = -1;

export const ENCODER_QUALITY = 2;

// Signed little-endian throughout.
export function soxRawArgs(format: RawAudioFormat = CANONICAL_FORMAT): string {
  return [
    "-t raw",
    "-e signed-integer",
    `-b ${format.bitDepth}`,
    "-L",
    `-r ${format.sampleRate}`,
    `-c ${format.channels}`,
  ].join(" ");
}

export function ffmpegRawArgs(
  format: RawAudioFormat = CANONICAL_FORMAT,
): string {
  return `-f s${format.bitDepth}le -ar ${format.sampleRate} -ac ${format.channels}`;
}

export function lameRawArgs(format: RawAudioFormat = CANONICAL_FORMAT): string {
  const khz = format.sampleRate / 1000;
  return [
    "-r",
    `-s ${khz}`,
    `--bitwidth ${format.bitDepth}`,
    "--signed",
    "--little-endian",
    format.channels === 1 ? "-m m" : "-m j",
  ].join(" ");
}
