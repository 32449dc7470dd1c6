import { spawnSync } from "node:child_process";
import { chmod, mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { assembleScript } from "../src/core/assembler.js";
import { normalizeTag, transliterate } from "../src/core/text.js";

// Stand-ins for the audio tools: .flac files with content "decode" to their
// own bytes, everything else is unreadable.
const STUBS: Record<string, string> = {
  soxi: `#!/bin/sh
case "$2" in
  *.flac) [ -s "$2" ] && echo "Signed Integer PCM" && exit 0 ;;
esac
exit 1
`,
  ffprobe: `#!/bin/sh
exit 1
`,
  sox: `#!/bin/sh
for arg; do
  case "$arg" in
    "$TMPDIR"/*) scratch=$arg ;;
  esac
done
case " $* " in
  *" gain "*) cat "$scratch" ;;
  *) cat "$2" > "$scratch" ;;
esac
`,
  lame: `#!/bin/sh
bytes=$(wc -c | tr -d ' ')
for out; do :; done
echo "lame $bytes" >> "$LAME_LOG"
printf 'ID3' > "$out"
`,
};

function hasTool(tool: string): boolean {
  return spawnSync("sh", ["-c", `command -v ${tool}`]).status === 0;
}

const runnable =
  process.platform !== "win32" &&
  ["bash", "sed", "iconv", "mktemp", "tr", "cut"].every(hasTool);

describe.skipIf(!runnable)("generated script", () => {
  let work: string;
  let scratch: string;
  let music: string;

  function run(command: string, extraEnv: Record<string, string> = {}) {
    const result = spawnSync("bash", ["-c", `. ./album.sh\n${command}`], {
      cwd: work,
      env: {
        PATH: `${path.join(work, "bin")}:${process.env.PATH ?? ""}`,
        HOME: work,
        TMPDIR: scratch,
        LAME_LOG: path.join(work, "lame.log"),
        ...extraEnv,
      },
    });
    return {
      status: result.status,
      stdout: result.stdout,
      stderr: result.stderr.toString(),
    };
  }

  async function outputs(): Promise<string[]> {
    return (await readdir(work))
      .filter((name) => name.endsWith(".mp3") || name.endsWith(".partial"))
      .sort();
  }

  beforeEach(async () => {
    work = await mkdtemp(path.join(os.tmpdir(), "albumscript-run-"));
    scratch = path.join(work, "scratch");
    music = path.join(work, "music");
    await Promise.all([
      mkdir(path.join(work, "bin")),
      mkdir(scratch),
      mkdir(music),
    ]);
    for (const [tool, body] of Object.entries(STUBS)) {
      const file = path.join(work, "bin", tool);
      await writeFile(file, body);
      await chmod(file, 0o755);
    }
    await writeFile(path.join(music, "a.flac"), "AAAA");
    await writeFile(path.join(music, "b.flac"), "BB");
    const script = assembleScript({
      paths: [
        path.join(music, "a.flac"),
        "/nope/missing.flac",
        path.join(music, "b.flac"),
      ],
      tags: {
        genre: "Pop",
        artist: "Björk",
        album: "Debut",
        year: "1993",
        comment: "first take",
      },
    });
    await writeFile(path.join(work, "album.sh"), script.text);
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it("streams a decoded track and removes its scratch file", async () => {
    const result = run("track_001");
    expect(result.status).toBe(0);
    expect(result.stdout.toString()).toBe("AAAA");
    expect(await readdir(scratch)).toEqual([]);
  });

  it("exits 3 with no audio when neither decoder reads the source", async () => {
    const result = run("track_002");
    expect(result.status).toBe(3);
    expect(result.stdout).toHaveLength(0);
    expect(result.stderr).toContain(
      "error: track_002: no decoder could read /nope/missing.flac",
    );
    expect(await readdir(scratch)).toEqual([]);
  });

  it("prints one field per accessor flag", () => {
    const result = run(
      'for flag in -f -g -a -b -y -n -t -c -i; do track_003 "$flag"; done',
    );
    expect(result.status).toBe(0);
    expect(result.stdout.toString()).toBe(
      [
        path.join(music, "b.flac"),
        "Pop",
        "Björk",
        "Debut",
        "1993",
        "003",
        "B",
        "first take",
        "",
        "",
      ].join("\n"),
    );
    expect(run("track_001 -z").status).toBe(2);
  });

  it("reads tag overrides at run time", () => {
    expect(run("track_001 -a").stdout.toString()).toBe("Björk\n");
    expect(run("ARTIST=Guest track_001 -a").stdout.toString()).toBe("Guest\n");
  });

  it("concatenates tracks in order and skips the failed one", async () => {
    const result = run("concatenate_all");
    expect(result.status).toBe(1);
    expect(result.stdout.toString()).toBe("AAAABB");
    expect(await readdir(scratch)).toEqual([]);
  });

  it("itemizes only the tracks that decode", async () => {
    const result = run("itemize_all");
    expect(result.status).toBe(1);
    expect(await outputs()).toEqual(["001_bjork_a.mp3", "003_bjork_b.mp3"]);
    expect(await readFile(path.join(work, "lame.log"), "utf-8")).toBe(
      "lame 4\nlame 2\n",
    );
    expect(result.stderr).toContain(
      "error: encode: no audio on stdin for 002_bjork_missing.mp3",
    );
    expect(await readdir(scratch)).toEqual([]);
  });

  it("refuses to encode empty input", async () => {
    const result = run("encode g a b 2000 001 t c '' out.mp3 < /dev/null");
    expect(result.status).toBe(6);
    expect(await outputs()).toEqual([]);
    expect(await readdir(scratch)).toEqual([]);
  });

  it("refuses a missing cover image before encoding", async () => {
    const result = run("printf 'AA' | encode g a b 2000 001 t c nope.jpg out.mp3");
    expect(result.status).toBe(4);
    expect(await outputs()).toEqual([]);
  });

  it("transliterates at run time like the generator does", () => {
    const input = "Björk: Über? (東京) Ærø";
    const ascii = run('printf \'%s\' "$(printf \'%s\' "$INPUT" | ascii)"', {
      INPUT: input,
    });
    expect(ascii.stdout.toString()).toBe(transliterate(input));
    expect(ascii.stdout.toString()).toBe("Bjork: Uber? () AEroe");
    const tag = run('printf \'%s\' "$(tag "$INPUT")"', { INPUT: input });
    expect(tag.stdout.toString()).toBe(normalizeTag(input));
  });
});
