import { describe, expect, it } from "vitest";
import { compareText, resolveTargetPath } from "./index.js";

describe("resolveTargetPath", () => {
  it("resolves provided path against cwd", () => {
    const target = resolveTargetPath("src", "/repo");
    expect(target.absolutePath).toBe("/repo/src");
  });

  it("defaults to current directory when no input path is given", () => {
    const target = resolveTargetPath(undefined, "/repo");
    expect(target.absolutePath).toBe("/repo");
  });
});

describe("compareText", () => {
  it("orders by code unit so uppercase sorts before lowercase", () => {
    expect(["b.ts", "B.ts", "a.ts"].sort(compareText)).toEqual(["B.ts", "a.ts", "b.ts"]);
  });

  it("returns zero for identical strings", () => {
    expect(compareText("src/a.ts", "src/a.ts")).toBe(0);
  });
});
