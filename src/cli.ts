#!/usr/bin/env node
import { spawnSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { parseArgs, USAGE, type CliCommand } from "./cli/args.js";
import { Logger } from "./cli/logger.js";
import { assembleScript } from "./core/assembler.js";
import { inferAlbum, loadTagDefaults } from "./core/config.js";
import { formatError, UsageError } from "./core/errors.js";
import { collectPaths, describeSource } from "./core/input.js";
import { manPageReference, noReference } from "./core/reference.js";
import type { TagDefaults } from "./core/tags.js";

const PACKAGE_JSON_URL = new URL("../package.json", import.meta.url);

async function main(): Promise<void> {
  const logger = new Logger();
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }
  if (command.kind === "version") {
    console.log(readVersion());
    return;
  }
  if (command.source.mode === "stdin" && process.stdin.isTTY) {
    throw new UsageError(
      "No input: pass --directory, --file or --playlist, or pipe NUL-separated paths.",
    );
  }

  const tags = await resolveTags(command);
  const paths = await collectPaths(command.source);
  logger.info(`Input: ${describeSource(command.source)} (${paths.length} files)`);

  const reference = command.man
    ? manPageReference((tool) => readManPage(tool, logger))
    : noReference;
  const script = assembleScript({
    paths,
    start: command.start,
    source: describeSource(command.source),
    tags,
    reference: reference.collect(),
    version: readVersion(),
  });
  process.stdout.write(script.text);

  const first = script.tracks[0];
  const last = script.tracks[script.tracks.length - 1];
  if (first && last) {
    logger.success(
      `Generated ${script.tracks.length} track functions (${first.label}-${last.label})`,
    );
  }
}

async function resolveTags(
  command: Extract<CliCommand, { kind: "generate" }>,
): Promise<Partial<TagDefaults>> {
  const tags = command.configPath
    ? await loadTagDefaults(command.configPath)
    : {};
  const album = tags.album ?? inferAlbum(command.source);
  return album === undefined ? tags : { ...tags, album };
}

function readManPage(tool: string, logger: Logger): string | null {
  const result = spawnSync("man", [tool], {
    encoding: "utf-8",
    env: { ...process.env, MANPAGER: "cat", PAGER: "cat", MANWIDTH: "80" },
  });
  if (result.error || result.status !== 0 || !result.stdout) {
    logger.warn(`No manual page for ${tool}; skipped in the reference.`);
    return null;
  }
  return result.stdout;
}

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, "utf-8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "dev";
}

main().catch((err) => {
  const logger = new Logger();
  logger.error(formatError(err));
  if (err instanceof UsageError) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  process.exitCode = 1;
});
