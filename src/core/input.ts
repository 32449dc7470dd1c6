import { lstat, readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { UsageError } from "./errors.js";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  ".aac",
  ".aif",
  ".aiff",
  ".ape",
  ".au",
  ".flac",
  ".m4a",
  ".mka",
  ".mp2",
  ".mp3",
  ".mpc",
  ".oga",
  ".ogg",
  ".opus",
  ".shn",
  ".wav",
  ".wma",
  ".wv",
]);

export type InputSource =
  | { mode: "directory"; path: string }
  | { mode: "file"; path: string }
  | { mode: "playlist"; path: string }
  | { mode: "stdin" };

export function describeSource(source: InputSource): string {
  return source.mode === "stdin" ? "stdin" : `${source.mode} ${source.path}`;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode a path or playlist from raw bytes. Invalid UTF-8 is rejected, not
 * replaced with U+FFFD: a mangled path would only fail when the script runs.
 */
export function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new UsageError(
      `${what} is not valid UTF-8: ${JSON.stringify(Buffer.from(bytes).toString("latin1"))}`,
      { cause: error },
    );
  }
}

/**
 * Split a NUL-terminated path list. A missing final terminator is tolerated;
 * empty entries are dropped.
 */
export function splitNulList(data: Buffer | string): string[] {
  if (typeof data === "string") {
    return data.split("\0").filter((entry) => entry !== "");
  }
  const paths: string[] = [];
  let begin = 0;
  while (begin < data.length) {
    let end = data.indexOf(0, begin);
    if (end < 0) {
      end = data.length;
    }
    if (end > begin) {
      paths.push(decodeUtf8(data.subarray(begin, end), "Path"));
    }
    begin = end + 1;
  }
  return paths;
}

/**
 * Media lines of an m3u playlist: trimmed, without blanks and `#` lines,
 * relative entries resolved against the playlist's directory.
 */
export function parsePlaylist(text: string, playlistPath: string): string[] {
  const base = path.dirname(path.resolve(playlistPath));
  return text
    .replace(/^\uFEFF/, "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"))
    .map((line) => path.resolve(base, line));
}

export async function readPlaylist(playlistPath: string): Promise<string[]> {
  const bytes = await readFile(playlistPath);
  return parsePlaylist(
    decodeUtf8(bytes, `Playlist ${playlistPath}`),
    playlistPath,
  );
}

/**
 * Audio files under `dir`, recursively, sorted by code unit so the order
 * does not depend on locale.
 */
export async function listAudioFiles(dir: string): Promise<string[]> {
  const root = path.resolve(dir);
  const found: string[] = [];
  await walk(root, found);
  return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function walk(dir: string, found: string[]): Promise<void> {
  // Raw names, so undecodable ones are reported instead of mangled.
  const names = await readdir(dir, { encoding: "buffer" });
  for (const raw of names) {
    const name = decodeUtf8(raw, `File name in ${dir}`);
    const full = path.join(dir, name);
    const info = await lstat(full);
    if (info.isDirectory()) {
      await walk(full, found);
    } else if (
      info.isFile() &&
      AUDIO_EXTENSIONS.has(path.extname(name).toLowerCase())
    ) {
      found.push(full);
    }
  }
}

async function readStream(stream: AsyncIterable<Buffer | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Resolve an input source to the ordered path list the generator numbers.
 */
export async function collectPaths(
  source: InputSource,
  stdin: AsyncIterable<Buffer | string> = process.stdin,
): Promise<string[]> {
  switch (source.mode) {
    case "directory": {
      const info = await stat(source.path);
      if (!info.isDirectory()) {
        throw new UsageError(`Not a directory: ${source.path}`);
      }
      return listAudioFiles(source.path);
    }
    case "file":
      return [path.resolve(source.path)];
    case "playlist":
      return readPlaylist(source.path);
    case "stdin":
      return splitNulList(await readStream(stdin));
  }
}
