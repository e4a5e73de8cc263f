import type {
  ConfigIssue,
  DependencyCycle,
  DirectoryFileCount,
  FileSummary,
  FunctionRecord,
  GodModule,
  PenaltyRecord,
  Thresholds,
} from "@readyscore/core";
import { PENALTY_POINTS } from "../config.js";
import { classifyAcl, computeAcl } from "./acl.js";

const formatPercent = (ratio: number): string => `${Math.round(ratio * 100)}%`;

export const functionTarget = (record: Pick<FunctionRecord, "filePath" | "qualifiedName">): string =>
  `${record.filePath}:${record.qualifiedName}`;

export const bloatedFilePenalty = (file: FileSummary, thresholds: Thresholds): PenaltyRecord | undefined => {
  const excess = file.logicalLines - thresholds.bloatLineLimit;
  if (excess <= 0) {
    return undefined;
  }

  return {
    category: "bloated-file",
    targetType: "file",
    target: file.filePath,
    filePath: file.filePath,
    points: Math.floor(excess / PENALTY_POINTS.bloatStepLines) * PENALTY_POINTS.bloatPerStep,
    reason: `${file.logicalLines} logical lines exceed the limit of ${thresholds.bloatLineLimit}`,
  };
};

// Red supersedes yellow, so a function is charged at most once.
export const cognitiveLoadPenalty = (
  record: FunctionRecord,
  thresholds: Thresholds,
): PenaltyRecord | undefined => {
  const acl = computeAcl(record);
  const tier = classifyAcl(acl, thresholds);
  if (tier === "green") {
    return undefined;
  }

  const isRed = tier === "red";
  return {
    category: "high-cognitive-load",
    targetType: "function",
    target: functionTarget(record),
    filePath: record.filePath,
    points: isRed ? PENALTY_POINTS.cognitiveLoadRed : PENALTY_POINTS.cognitiveLoadYellow,
    reason: `ACL ${acl.toFixed(2)} reaches the ${tier} threshold of ${isRed ? thresholds.aclRed : thresholds.aclYellow}`,
  };
};

export const missingTypesPenalty = (file: FileSummary, thresholds: Thresholds): PenaltyRecord | undefined => {
  if (file.functions.length === 0 || file.typeCoverage >= thresholds.typeSafetyMinimum) {
    return undefined;
  }

  return {
    category: "missing-types",
    targetType: "file",
    target: file.filePath,
    filePath: file.filePath,
    points: PENALTY_POINTS.missingTypes,
    reason: `${formatPercent(file.typeCoverage)} of functions are typed, below ${formatPercent(thresholds.typeSafetyMinimum)}`,
  };
};

export const missingContextFilePenalties = (
  rootFileNames: readonly string[],
  thresholds: Thresholds,
): readonly PenaltyRecord[] => {
  const present = new Set(rootFileNames.map((name) => name.toLowerCase()));
  return thresholds.requiredContextFiles
    .filter((name) => !present.has(name.toLowerCase()))
    .map((name): PenaltyRecord => ({
      category: "missing-context-file",
      targetType: "project",
      target: name,
      filePath: null,
      points: PENALTY_POINTS.missingContextFile,
      reason: `${name} is missing from the project root`,
    }));
};

export const invalidConfigPenalties = (issues: readonly ConfigIssue[]): readonly PenaltyRecord[] =>
  issues.map((issue): PenaltyRecord => ({
    category: "invalid-config",
    targetType: "project",
    target: issue.source,
    filePath: null,
    points: PENALTY_POINTS.invalidConfig,
    reason: issue.reason,
  }));

export const godModulePenalties = (
  godModules: readonly GodModule[],
  thresholds: Thresholds,
): readonly PenaltyRecord[] =>
  godModules.map((godModule): PenaltyRecord => ({
    category: "god-module",
    targetType: "module",
    target: godModule.module,
    filePath: null,
    points: PENALTY_POINTS.godModule,
    reason: `imported by ${godModule.fanIn} modules, above the limit of ${thresholds.godModuleInboundLimit}`,
  }));

export const highEntropyPenalties = (
  directories: readonly DirectoryFileCount[],
  thresholds: Thresholds,
): readonly PenaltyRecord[] =>
  directories.map((entry): PenaltyRecord => ({
    category: "high-entropy",
    targetType: "directory",
    target: entry.directory,
    filePath: null,
    points: PENALTY_POINTS.highEntropy,
    reason: `${entry.fileCount} files in one directory, above the limit of ${thresholds.directoryEntropyLimit}`,
  }));

export const circularDependencyPenalties = (cycles: readonly DependencyCycle[]): readonly PenaltyRecord[] =>
  cycles.map((cycle): PenaltyRecord => ({
    category: "circular-dependency",
    targetType: "module",
    target: cycle.nodes.join(" -> "),
    filePath: null,
    points: PENALTY_POINTS.circularDependency,
    reason:
      cycle.nodes.length === 1
        ? "module imports itself"
        : `import cycle through ${cycle.nodes.length} modules`,
  }));
