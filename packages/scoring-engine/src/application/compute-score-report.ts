import type {
  AnalysisWarning,
  ConfigIssue,
  ContextTokenBudget,
  DependencyGraph,
  EnvironmentHealth,
  FileScore,
  FileSummary,
  PenaltyRecord,
  ScoreReport,
  ScoreScope,
  Thresholds,
} from "@readyscore/core";
import { compareText } from "@readyscore/core";
import { flagCrowdedDirectories, flagGodModules, summarizeDirectoryEntropy } from "@readyscore/code-graph";
import { DEFAULT_THRESHOLDS, DEFAULT_TOP_OFFENDER_LIMIT, mergeThresholds } from "../config.js";
import { computeAcl } from "../domain/acl.js";
import { average, clamp, round4, sumPoints } from "../domain/math.js";
import { createPenaltyCollector } from "../domain/penalty-collector.js";
import {
  bloatedFilePenalty,
  circularDependencyPenalties,
  cognitiveLoadPenalty,
  godModulePenalties,
  highEntropyPenalties,
  invalidConfigPenalties,
  missingContextFilePenalties,
  missingTypesPenalty,
} from "../domain/penalty-rules.js";
import { rankTopOffenders, sortFileScores } from "../domain/ranking.js";

export type ComputeScoreReportInput = {
  files: readonly FileSummary[];
  graph: DependencyGraph;
  thresholds?: Partial<Thresholds>;
  scope?: ScoreScope;
  /** Names of the entries at the project root. Context files are not checked when omitted. */
  rootFileNames?: readonly string[];
  configIssues?: readonly ConfigIssue[];
  warnings?: readonly AnalysisWarning[];
  topOffenderLimit?: number;
  /** Directories walked during discovery, empty ones included. Defaults to the tallied directories. */
  directoryCount?: number;
  environment?: EnvironmentHealth;
  contextTokenCount?: number;
};

const BASELINE_SCORE = 100;

const toScore = (points: number): number => round4(clamp(BASELINE_SCORE + points, 0, BASELINE_SCORE));

// Nothing was found at all: no summaries, no modules, no tallied or root files.
const isEmptyProject = (input: ComputeScoreReportInput): boolean =>
  input.files.length === 0 &&
  input.graph.nodes.length === 0 &&
  input.graph.directories.length === 0 &&
  (input.rootFileNames ?? []).length === 0;

const toContextTokenBudget = (tokenCount: number | undefined, budget: number): ContextTokenBudget | null =>
  tokenCount === undefined ? null : { tokenCount, budget, exceeded: tokenCount > budget };

/**
 * Scores a project from its file summaries and dependency graph.
 *
 * In changed-files scope only the listed files are charged for file and function
 * penalties. Graph, directory, context-file and configuration penalties always
 * cover the whole project: a cycle through one changed file is still a cycle.
 *
 * An empty project keeps the baseline score; its missing context files and
 * configuration are not charged.
 */
export const computeScoreReport = (input: ComputeScoreReportInput): ScoreReport => {
  const thresholds = mergeThresholds(DEFAULT_THRESHOLDS, input.thresholds);
  const scope: ScoreScope = input.scope ?? { mode: "project" };
  const scopedPaths = scope.mode === "project" ? undefined : new Set(scope.files);
  const inScope = (path: string): boolean => scopedPaths === undefined || scopedPaths.has(path);

  const scopedFiles = input.files
    .filter((file) => inScope(file.filePath))
    .sort((a, b) => compareText(a.filePath, b.filePath));
  const scopedFunctions = scopedFiles.flatMap((file) => file.functions);

  const collector = createPenaltyCollector();
  const fileScores: FileScore[] = [];

  for (const file of scopedFiles) {
    const filePenalties = [
      bloatedFilePenalty(file, thresholds),
      ...file.functions.map((record) => cognitiveLoadPenalty(record, thresholds)),
      missingTypesPenalty(file, thresholds),
    ].filter((penalty): penalty is PenaltyRecord => penalty !== undefined && penalty.points !== 0);

    for (const penalty of filePenalties) {
      collector.record(penalty);
    }

    const penaltyPoints = sumPoints(filePenalties);
    fileScores.push({
      file: file.filePath,
      score: toScore(penaltyPoints),
      penaltyPoints,
      logicalLines: file.logicalLines,
      typeCoverage: round4(file.typeCoverage),
      functionCount: file.functions.length,
    });
  }

  const emptyProject = isEmptyProject(input);
  if (input.rootFileNames !== undefined && !emptyProject) {
    collector.recordAll(missingContextFilePenalties(input.rootFileNames, thresholds));
  }

  if (!emptyProject) {
    collector.recordAll(invalidConfigPenalties(input.configIssues ?? []));
  }

  const godModules = flagGodModules(input.graph, thresholds.godModuleInboundLimit);
  collector.recordAll(godModulePenalties(godModules, thresholds));

  const crowdedDirectories = flagCrowdedDirectories(input.graph.directories, thresholds.directoryEntropyLimit);
  collector.recordAll(highEntropyPenalties(crowdedDirectories, thresholds));

  collector.recordAll(circularDependencyPenalties(input.graph.cycles));

  const penalties = collector.build();

  return {
    score: toScore(sumPoints(penalties)),
    penalties,
    topOffenders: rankTopOffenders(
      scopedFunctions,
      thresholds,
      input.topOffenderLimit ?? DEFAULT_TOP_OFFENDER_LIMIT,
    ),
    fileScores: sortFileScores(fileScores),
    cycles: input.graph.cycles,
    godModules,
    crowdedDirectories,
    directoryEntropy: summarizeDirectoryEntropy(input.graph.directories, input.directoryCount ?? 0, {
      averageLimit: thresholds.directoryAverageLimit,
      directoryLimit: thresholds.directoryEntropyLimit,
    }),
    environment: input.environment ?? null,
    contextTokens: toContextTokenBudget(input.contextTokenCount, thresholds.contextTokenBudget),
    warnings: (input.warnings ?? []).filter(
      (warning) => warning.category !== "parse-error" || inScope(warning.target),
    ),
    scope: {
      mode: scope.mode,
      fileCount: scopedFiles.length,
    },
    metrics: {
      filesScored: scopedFiles.length,
      functionsScored: scopedFunctions.length,
      averageAcl: round4(average(scopedFunctions.map((record) => computeAcl(record)))),
      averageTypeCoverage: round4(average(scopedFiles.map((file) => file.typeCoverage))),
    },
  };
};
