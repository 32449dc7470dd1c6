import { describe, expect, it, vi } from "vitest";
import {
  cleanManPage,
  manPageReference,
  noReference,
} from "../src/core/reference.js";

describe("cleanManPage", () => {
  it("removes overstrike formatting and trailing blanks", () => {
    expect(cleanManPage("S\bSO\bOX\bX(1)\n  sox infile   \n\n\n")).toEqual([
      "SOX(1)",
      "  sox infile",
    ]);
  });
});

describe("manPageReference", () => {
  it("collects each tool and notes missing pages", () => {
    const run = vi.fn((tool: string) => (tool === "sox" ? "SOX(1)\n" : null));
    const lines = manPageReference(run, ["sox", "lame"]).collect();
    expect(lines).toEqual(["SOX(1)", "", "lame: no manual page found"]);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("is empty when disabled", () => {
    expect(noReference.collect()).toEqual([]);
  });
});
