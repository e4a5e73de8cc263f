import * as ts from "typescript";
import { describe, expect, it } from "vitest";
import { extractFileSummary } from "./extract-file-summary.js";

const summarize = (lines: readonly string[], filePath = "src/sample.ts") =>
  extractFileSummary(
    ts.createSourceFile(filePath, lines.join("\n"), ts.ScriptTarget.Latest, true),
    filePath,
  );

describe("extractFileSummary", () => {
  it("counts decision points and logical lines of a single function", () => {
    const summary = summarize([
      "export function route(kind: string, retries: number): string {",
      "  if (kind === \"a\" && retries > 0) {",
      "    return \"a\";",
      "  }",
      "  for (const item of [1, 2]) {",
      "    if (item > retries || kind === \"b\") {",
      "      return \"b\";",
      "    }",
      "  }",
      "  switch (kind) {",
      "    case \"c\":",
      "      return \"c\";",
      "    case \"d\":",
      "      return \"d\";",
      "    default:",
      "      return kind ?? \"none\";",
      "  }",
      "}",
    ]);

    expect(summary.logicalLines).toBe(13);
    expect(summary.typeCoverage).toBe(1);
    expect(summary.functions).toEqual([
      {
        name: "route",
        qualifiedName: "route",
        filePath: "src/sample.ts",
        startLine: 1,
        endLine: 18,
        complexity: 9,
        logicalLines: 13,
        typeCoverage: 1,
        hasDocstring: false,
        isAsync: false,
      },
    ]);
  });

  it("attributes branches to the innermost recorded function and qualifies nested names", () => {
    const summary = summarize([
      "export class Loader {",
      "  constructor(private readonly root: string) {}",
      "  /** Loads every name. */",
      "  async load(names: string[]): Promise<string[]> {",
      "    const pick = (name) => (name.length > 0 ? name : this.root);",
      "    return names.map((name) => name || \"x\").map(pick);",
      "  }",
      "  get size() {",
      "    return 0;",
      "  }",
      "}",
    ]);

    expect(
      summary.functions.map((record) => [record.qualifiedName, record.complexity, record.logicalLines]),
    ).toEqual([
      ["Loader.constructor", 1, 1],
      ["Loader.load", 2, 3],
      ["Loader.load.pick", 2, 1],
      ["Loader.size", 1, 2],
    ]);
    expect(summary.functions.map((record) => record.typeCoverage)).toEqual([1, 1, 0, 0]);
    expect(summary.functions.map((record) => record.hasDocstring)).toEqual([false, true, false, false]);
    expect(summary.functions.map((record) => record.isAsync)).toEqual([false, true, false, false]);
    expect(summary.functions[1]?.startLine).toBe(4);
    expect(summary.logicalLines).toBe(7);
    expect(summary.typeCoverage).toBe(0.5);
  });

  it("names functions bound in object literals and default exports", () => {
    const summary = summarize([
      "type Handler = (value: number) => number;",
      "export const double: Handler = (value) => value * 2;",
      "export const api = {",
      "  get(id) { return id; },",
      "  run: function () { return 1; },",
      "};",
      "export default function () {}",
    ]);

    expect(summary.functions.map((record) => [record.qualifiedName, record.typeCoverage])).toEqual([
      ["double", 1],
      ["api.get", 0],
      ["api.run", 0],
      ["default", 0],
    ]);
    expect(summary.typeCoverage).toBe(0.25);
  });

  it("leaves the this receiver out of the annotation slots", () => {
    const summary = summarize([
      "export function scale(this: unknown, factor: number) {",
      "  return factor;",
      "}",
    ]);

    expect(summary.functions[0]?.typeCoverage).toBe(0.5);
  });

  it("does not record inline callbacks or overload signatures", () => {
    const summary = summarize([
      "export function pad(value: string): string;",
      "export function pad(value: number): string;",
      "export function pad(value: string | number): string {",
      "  return String(value);",
      "}",
      "[1, 2].forEach((value) => value && console.log(value));",
    ]);

    expect(summary.functions.map((record) => record.qualifiedName)).toEqual(["pad"]);
    expect(summary.functions[0]?.complexity).toBe(1);
  });

  it("reports full coverage for a file without functions", () => {
    const summary = summarize(["export const LIMIT = 3;", "", "// trailing comment"]);

    expect(summary).toEqual({
      filePath: "src/sample.ts",
      logicalLines: 1,
      functions: [],
      typeCoverage: 1,
    });
  });
});
