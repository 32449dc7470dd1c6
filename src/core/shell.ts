/**
 * Quote a value as one bash word. Single quotes keep everything literal, so
 * only embedded single quotes need the close-escape-reopen dance.
 */
export function shellQuote(value: string): string {
  if (value === "") {
    return "''";
  }
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function commentLines(text: string): string[] {
  return text.split("\n").map((line) => (line === "" ? "#" : `# ${line}`));
}

/**
 * Escape a literal for the left side of a basic-regex `s` command.
 */
export function sedPattern(value: string): string {
  return value.replace(/[\\/.*[\]^$]/g, "\\$&");
}

export function sedReplacement(value: string): string {
  return value.replace(/[\\/&]/g, "\\$&");
}
