import { describe, expect, it } from "vitest";
import { parseSource } from "./parse-source.js";

describe("parseSource", () => {
  it("returns the syntax tree for valid TypeScript", () => {
    const result = parseSource("/repo/src/a.ts", "export const a = (value: number): number => value * 2;\n");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.sourceFile.statements).toHaveLength(1);
    }
  });

  it("reports the first syntax error with its line", () => {
    const result = parseSource("/repo/src/broken.ts", "const ok = 1;\nfunction broken( {");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason.startsWith("line 2: ")).toBe(true);
    }
  });

  it("accepts JSX in .tsx files", () => {
    const result = parseSource(
      "/repo/src/view.tsx",
      "export const View = (): unknown => <div className=\"a\">hi</div>;\n",
    );

    expect(result.ok).toBe(true);
  });

  it("rejects type annotations in plain JavaScript files", () => {
    const result = parseSource("/repo/src/plain.js", "export const f = (a: number) => a;\n");

    expect(result.ok).toBe(false);
  });
});
