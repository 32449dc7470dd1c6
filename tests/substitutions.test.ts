import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/core/errors.js";
import {
  applySubstitutions,
  createSubstitutionTable,
  loadDefaultSubstitutions,
  renderSedArguments,
} from "../src/core/substitutions.js";

describe("createSubstitutionTable", () => {
  it("rejects ASCII keys and non-ASCII values", () => {
    expect(() => createSubstitutionTable({ a: "b" })).toThrow(ConfigError);
    expect(() => createSubstitutionTable({ é: "é" })).toThrow(ConfigError);
    expect(() => createSubstitutionTable({ é: 1 })).toThrow(ConfigError);
    expect(() => createSubstitutionTable(["é"])).toThrow(ConfigError);
  });

  it("prefers longer keys", () => {
    const table = createSubstitutionTable({ "é": "e", "éé": "E" });
    expect(applySubstitutions("ééé", table)).toBe("Ee");
  });
});

describe("loadDefaultSubstitutions", () => {
  it("loads the shipped table", () => {
    const table = loadDefaultSubstitutions();
    expect(new Map(table.entries).get("Þ")).toBe("Th");
  });
});

describe("renderSedArguments", () => {
  it("escapes sed and shell metacharacters", () => {
    const table = createSubstitutionTable({ "±": "+/-", "’": "'" });
    expect(renderSedArguments(table.entries)).toEqual([
      "-e 's/±/+\\/-/g'",
      "-e 's/’/'\\''/g'",
    ]);
  });
});
