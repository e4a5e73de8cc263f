import { resolve } from "node:path";

export type FunctionRecord = {
  name: string;
  qualifiedName: string;
  filePath: string;
  startLine: number;
  endLine: number;
  complexity: number;
  logicalLines: number;
  typeCoverage: number;
  hasDocstring: boolean;
  isAsync: boolean;
};

export type FileSummary = {
  filePath: string;
  logicalLines: number;
  functions: readonly FunctionRecord[];
  typeCoverage: number;
};

export type AnalysisWarning = {
  category: "parse-error" | "unreadable-directory";
  target: string;
  reason: string;
};

export type ModuleNode = {
  id: string;
  absolutePath: string;
  relativePath: string;
  dependencies: readonly string[];
  fanIn: number;
  fanOut: number;
};

export type ModuleEdge = {
  from: string;
  to: string;
};

export type DependencyCycle = {
  nodes: readonly string[];
};

export type DirectoryFileCount = {
  directory: string;
  fileCount: number;
};

export type DependencyGraphMetrics = {
  nodeCount: number;
  edgeCount: number;
  cycleCount: number;
  maxFanIn: number;
  maxFanOut: number;
};

export type DependencyGraph = {
  targetPath: string;
  nodes: readonly ModuleNode[];
  edges: readonly ModuleEdge[];
  cycles: readonly DependencyCycle[];
  directories: readonly DirectoryFileCount[];
  metrics: DependencyGraphMetrics;
};

export type PathAlias = {
  pattern: string;
  targets: readonly string[];
};

export type ModuleResolutionOptions = {
  moduleRoots: readonly string[];
  pathAliases: readonly PathAlias[];
};

export type GodModule = {
  module: string;
  fanIn: number;
};

export type Thresholds = {
  aclYellow: number;
  aclRed: number;
  typeSafetyMinimum: number;
  bloatLineLimit: number;
  godModuleInboundLimit: number;
  directoryEntropyLimit: number;
  directoryAverageLimit: number;
  contextTokenBudget: number;
  requiredContextFiles: readonly string[];
};

export type ConfigIssue = {
  source: string;
  reason: string;
};

export type PenaltyCategory =
  | "bloated-file"
  | "high-cognitive-load"
  | "missing-types"
  | "missing-context-file"
  | "invalid-config"
  | "god-module"
  | "high-entropy"
  | "circular-dependency";

export type PenaltyTargetType = "function" | "file" | "module" | "directory" | "project";

export type PenaltyRecord = {
  category: PenaltyCategory;
  targetType: PenaltyTargetType;
  target: string;
  filePath: string | null;
  points: number;
  reason: string;
};

export type AclTier = "green" | "yellow" | "red";

export type FunctionOffender = {
  qualifiedName: string;
  filePath: string;
  startLine: number;
  complexity: number;
  logicalLines: number;
  acl: number;
  tier: AclTier;
};

export type FileScore = {
  file: string;
  score: number;
  penaltyPoints: number;
  logicalLines: number;
  typeCoverage: number;
  functionCount: number;
};

export type ScoreScope =
  | { mode: "project" }
  | { mode: "changed_files"; files: readonly string[] };

export type ScoreMetrics = {
  filesScored: number;
  functionsScored: number;
  averageAcl: number;
  averageTypeCoverage: number;
};

export type DirectoryEntropySummary = {
  directoryCount: number;
  averageFiles: number;
  maxFiles: number;
  warning: boolean;
};

export type EnvironmentHealth = {
  agentsFile: boolean;
  linterConfig: boolean;
  lockFile: boolean;
};

export type ContextTokenBudget = {
  tokenCount: number;
  budget: number;
  exceeded: boolean;
};

export type ScoreReport = {
  score: number;
  penalties: readonly PenaltyRecord[];
  topOffenders: readonly FunctionOffender[];
  fileScores: readonly FileScore[];
  cycles: readonly DependencyCycle[];
  godModules: readonly GodModule[];
  crowdedDirectories: readonly DirectoryFileCount[];
  directoryEntropy: DirectoryEntropySummary;
  environment: EnvironmentHealth | null;
  contextTokens: ContextTokenBudget | null;
  warnings: readonly AnalysisWarning[];
  scope: {
    mode: ScoreScope["mode"];
    fileCount: number;
  };
  metrics: ScoreMetrics;
};

export type TargetPath = {
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  absolutePath: resolve(cwd, inputPath ?? "."),
});

// Code-unit ordering; localeCompare would make report order depend on the host locale.
export const compareText = (a: string, b: string): number => {
  if (a < b) {
    return -1;
  }

  return a > b ? 1 : 0;
};
