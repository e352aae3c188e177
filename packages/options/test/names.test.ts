import { describe, expect, it } from "vitest";
import { normalizeOptionName } from "../src/names";

describe("normalizeOptionName", () => {
  it.each([
    ["working-dir", "workingDir"],
    ["working_dir", "workingDir"],
    ["Working-Dir", "workingDir"],
    ["WORKING_DIR", "workingDir"],
    ["workingDir", "workingDir"],
    ["--inject-option", "injectOption"],
    ["tryrun", "tryrun"],
  ])("maps %s to %s", (input, expected) => {
    expect(normalizeOptionName(input)).toBe(expected);
  });

  it("returns an empty key for blank names", () => {
    expect(normalizeOptionName(" -- ")).toBe("");
  });
});
