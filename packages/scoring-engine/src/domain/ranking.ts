import type { FileScore, FunctionOffender, FunctionRecord, Thresholds } from "@readyscore/core";
import { compareText } from "@readyscore/core";
import { classifyAcl, computeAcl } from "./acl.js";
import { round4 } from "./math.js";

const compareOffenders = (
  a: { acl: number; record: FunctionRecord },
  b: { acl: number; record: FunctionRecord },
): number =>
  b.acl - a.acl ||
  compareText(a.record.filePath, b.record.filePath) ||
  compareText(a.record.qualifiedName, b.record.qualifiedName) ||
  a.record.startLine - b.record.startLine;

export const rankTopOffenders = (
  functions: readonly FunctionRecord[],
  thresholds: Thresholds,
  limit: number,
): readonly FunctionOffender[] =>
  functions
    .map((record) => ({ acl: computeAcl(record), record }))
    .sort(compareOffenders)
    .slice(0, Math.max(0, limit))
    .map(({ acl, record }) => ({
      qualifiedName: record.qualifiedName,
      filePath: record.filePath,
      startLine: record.startLine,
      complexity: record.complexity,
      logicalLines: record.logicalLines,
      acl: round4(acl),
      tier: classifyAcl(acl, thresholds),
    }));

export const sortFileScores = (fileScores: readonly FileScore[]): readonly FileScore[] =>
  [...fileScores].sort((a, b) => a.score - b.score || compareText(a.file, b.file));
