/**
 * Bad flags, missing flag values or stray positional arguments.
 */
export class UsageError extends Error {
  override readonly name = "UsageError";
}

/**
 * The input would need a track number above {@link MAX_TRACK_ID}.
 */
export class CapacityError extends Error {
  override readonly name = "CapacityError";

  constructor(
    readonly count: number,
    readonly start: number,
    readonly max: number,
  ) {
    super(
      `${count} tracks starting at ${start} would exceed track number ${max}`,
    );
  }
}

export class EmptyInputError extends Error {
  override readonly name = "EmptyInputError";

  constructor(source: string) {
    super(`No input files found (${source})`);
  }
}

/**
 * A tag defaults file or the substitution table failed validation.
 */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts: string[] = [error.message];
  let current: unknown = error;
  let guard = 0;
  while (current instanceof Error && guard < 4) {
    guard += 1;
    const cause: unknown = current.cause;
    if (!cause) {
      break;
    }
    if (cause instanceof Error) {
      parts.push(`cause=${cause.message}`);
      const code = errorCode(cause);
      if (code) {
        parts.push(`code=${code}`);
      }
      current = cause;
    } else {
      parts.push(`cause=${String(cause)}`);
      break;
    }
  }
  return parts.join(" | ");
}

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
