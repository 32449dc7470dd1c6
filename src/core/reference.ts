/**
 * Text appended to the script's epilogue as comments.
 */
export interface ReferenceSource {
  collect(): string[];
}

/** Returns a rendered man page, or null when none is installed. */
export type ManRunner = (tool: string) => string | null;

export const REFERENCE_TOOLS = ["sox", "ffmpeg", "lame"] as const;

export const noReference: ReferenceSource = {
  collect: () => [],
};

export function manPageReference(
  run: ManRunner,
  tools: readonly string[] = REFERENCE_TOOLS,
): ReferenceSource {
  return {
    collect() {
      const lines: string[] = [];
      for (const tool of tools) {
        const page = run(tool);
        if (page === null) {
          lines.push(`${tool}: no manual page found`, "");
          continue;
        }
        lines.push(...cleanManPage(page), "");
      }
      while (lines.length > 0 && lines[lines.length - 1] === "") {
        lines.pop();
      }
      return lines;
    },
  };
}

/**
 * Strip overstrike bold/underline sequences and trailing blanks.
 */
export function cleanManPage(page: string): string[] {
  const lines = page
    .replace(/.\x08/g, "")
    .replace(/\x1b\[[0-9;]*m/g, "")
    .split("\n")
    .map((line) => line.replace(/\s+$/, ""));
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
