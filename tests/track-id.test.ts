import { describe, expect, it } from "vitest";
import {
  CapacityError,
  EmptyInputError,
  UsageError,
} from "../src/core/errors.js";
import {
  assignTrackIds,
  formatTrackId,
  parseStartNumber,
} from "../src/core/track-id.js";

describe("assignTrackIds", () => {
  it("numbers inputs from 001 in order", () => {
    const entries = assignTrackIds(["c.flac", "a.flac", "b.flac"]);
    expect(entries.map((entry) => entry.label)).toEqual(["001", "002", "003"]);
    expect(entries.map((entry) => entry.path)).toEqual([
      "c.flac",
      "a.flac",
      "b.flac",
    ]);
    expect(entries.map((entry) => entry.position)).toEqual([1, 2, 3]);
  });

  it("starts at the given offset", () => {
    const entries = assignTrackIds(["a", "b", "c"], 997);
    expect(entries.map((entry) => entry.id)).toEqual([997, 998, 999]);
  });

  it("fails when a track number would exceed 999", () => {
    const paths = ["a", "b", "c", "d", "e"];
    expect(() => assignTrackIds(paths, 997)).toThrow(CapacityError);
    expect(() =>
      assignTrackIds(Array.from({ length: 1000 }, () => "x")),
    ).toThrow(
      CapacityError,
    );
  });

  it("rejects empty input and bad offsets", () => {
    expect(() => assignTrackIds([])).toThrow(EmptyInputError);
    expect(() => assignTrackIds(["a"], 0)).toThrow(UsageError);
    expect(() => assignTrackIds(["a"], 1.5)).toThrow(UsageError);
  });
});

describe("parseStartNumber", () => {
  it("accepts integers in range", () => {
    expect(parseStartNumber("12")).toBe(12);
    expect(formatTrackId(12)).toBe("012");
  });

  it("rejects anything else", () => {
    expect(() => parseStartNumber("abc")).toThrow(UsageError);
    expect(() => parseStartNumber("-3")).toThrow(UsageError);
    expect(() => parseStartNumber("1000")).toThrow(UsageError);
  });
});
