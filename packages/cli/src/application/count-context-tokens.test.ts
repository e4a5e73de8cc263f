import { describe, expect, it } from "vitest";
import { countContextTokens } from "./count-context-tokens.js";

describe("countContextTokens", () => {
  it("counts nothing for empty input", () => {
    expect(countContextTokens([])).toBe(0);
  });

  it("counts cl100k tokens of the joined parts", () => {
    expect(countContextTokens(["hello world"])).toBe(2);
    expect(countContextTokens(["hello", "world"])).toBeGreaterThan(2);
  });

  it("does not reject special-token markers in the text", () => {
    expect(countContextTokens(["<|endoftext|>"])).toBeGreaterThan(1);
  });
});
