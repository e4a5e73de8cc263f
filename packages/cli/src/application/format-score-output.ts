import type { ScoreReport } from "@readyscore/core";
import type { ScoreCommandResult } from "./run-score-command.js";

export type ScoreOutputMode = "summary" | "json";

type SummaryShape = {
  targetPath: string;
  score: number;
  minScore: number;
  passed: boolean;
  profile: string;
  scope: ScoreReport["scope"];
  metrics: ScoreReport["metrics"];
  penaltiesByCategory: Readonly<Record<string, { count: number; points: number }>>;
  topOffenders: ReadonlyArray<{ function: string; acl: number; tier: string }>;
  worstFiles: ReadonlyArray<{ file: string; score: number }>;
  cycleCount: number;
  godModules: readonly string[];
  crowdedDirectories: readonly string[];
  directoryEntropy: ScoreReport["directoryEntropy"];
  environment: ScoreReport["environment"];
  contextTokens: ScoreReport["contextTokens"];
  warnings: readonly string[];
};

const WORST_FILES_SHOWN = 5;

const groupPenalties = (report: ScoreReport): SummaryShape["penaltiesByCategory"] => {
  const groups: Record<string, { count: number; points: number }> = {};
  for (const penalty of report.penalties) {
    const group = groups[penalty.category] ?? { count: 0, points: 0 };
    groups[penalty.category] = { count: group.count + 1, points: group.points + penalty.points };
  }

  return groups;
};

const createSummaryShape = (result: ScoreCommandResult): SummaryShape => {
  const { analysis } = result;
  const { report } = analysis;

  return {
    targetPath: analysis.targetPath,
    score: report.score,
    minScore: result.minScore,
    passed: result.passed,
    profile: analysis.settings.profile,
    scope: report.scope,
    metrics: report.metrics,
    penaltiesByCategory: groupPenalties(report),
    topOffenders: report.topOffenders.map((offender) => ({
      function: `${offender.filePath}:${offender.startLine} ${offender.qualifiedName}`,
      acl: offender.acl,
      tier: offender.tier,
    })),
    worstFiles: report.fileScores
      .filter((fileScore) => fileScore.penaltyPoints < 0)
      .slice(0, WORST_FILES_SHOWN)
      .map((fileScore) => ({ file: fileScore.file, score: fileScore.score })),
    cycleCount: report.cycles.length,
    godModules: report.godModules.map((godModule) => godModule.module),
    crowdedDirectories: report.crowdedDirectories.map((entry) => entry.directory),
    directoryEntropy: report.directoryEntropy,
    environment: report.environment,
    contextTokens: report.contextTokens,
    warnings: report.warnings.map((warning) => `${warning.target}: ${warning.reason}`),
  };
};

export const formatScoreOutput = (result: ScoreCommandResult, mode: ScoreOutputMode): string =>
  mode === "json"
    ? JSON.stringify(
        {
          targetPath: result.analysis.targetPath,
          profile: result.analysis.settings.profile,
          thresholds: result.analysis.settings.thresholds,
          minScore: result.minScore,
          passed: result.passed,
          report: result.analysis.report,
        },
        null,
        2,
      )
    : JSON.stringify(createSummaryShape(result), null, 2);
