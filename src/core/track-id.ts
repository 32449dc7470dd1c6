import { CapacityError, EmptyInputError, UsageError } from "./errors.js";

export const MIN_TRACK_ID = 1;
export const MAX_TRACK_ID = 999;
const TRACK_ID_WIDTH = 3;

export interface TrackEntry {
  /** Numeric track number, `start + index`. */
  readonly id: number;
  /** Zero-padded three-digit form used in function names and tags. */
  readonly label: string;
  /** 1-based position in the input sequence. */
  readonly position: number;
  readonly path: string;
}

export function formatTrackId(id: number): string {
  return id.toString().padStart(TRACK_ID_WIDTH, "0");
}

export function parseStartNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Track number must be a positive integer: ${value}`);
  }
  const start = Number(value);
  assertStartNumber(start);
  return start;
}

/**
 * Number the inputs in order. The whole run fails before anything is
 * rendered when the last id would pass {@link MAX_TRACK_ID}.
 */
export function assignTrackIds(
  paths: readonly string[],
  start = MIN_TRACK_ID,
  source = "input",
): TrackEntry[] {
  assertStartNumber(start);
  if (paths.length === 0) {
    throw new EmptyInputError(source);
  }
  const last = start + paths.length - 1;
  if (last > MAX_TRACK_ID) {
    throw new CapacityError(paths.length, start, MAX_TRACK_ID);
  }
  return paths.map((path, index) => {
    const id = start + index;
    return Object.freeze({
      id,
      label: formatTrackId(id),
      position: index + 1,
      path,
    });
  });
}

function assertStartNumber(start: number): void {
  if (!Number.isInteger(start) || start < MIN_TRACK_ID || start > MAX_TRACK_ID) {
    throw new UsageError(
      `Track number must be between ${MIN_TRACK_ID} and ${MAX_TRACK_ID}: ${start}`,
    );
  }
}
