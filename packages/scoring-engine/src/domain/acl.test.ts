import { describe, expect, it } from "vitest";
import { DEFAULT_THRESHOLDS } from "../config.js";
import { classifyAcl, computeAcl } from "./acl.js";

describe("computeAcl", () => {
  it("adds a point per twenty logical lines without rounding", () => {
    expect(computeAcl({ complexity: 3, logicalLines: 30 })).toBe(4.5);
    expect(computeAcl({ complexity: 1, logicalLines: 0 })).toBe(1);
  });
});

describe("classifyAcl", () => {
  it("treats both thresholds as inclusive", () => {
    expect(classifyAcl(9.95, DEFAULT_THRESHOLDS)).toBe("green");
    expect(classifyAcl(10, DEFAULT_THRESHOLDS)).toBe("yellow");
    expect(classifyAcl(14.99, DEFAULT_THRESHOLDS)).toBe("yellow");
    expect(classifyAcl(15, DEFAULT_THRESHOLDS)).toBe("red");
  });
});
