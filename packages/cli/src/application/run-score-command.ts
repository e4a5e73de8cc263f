import { resolveTargetPath } from "@readyscore/core";
import {
  listChangedFilesFromGit,
  type ChangedFiles,
  type ListChangedFilesInput,
} from "@readyscore/git-changes";
import type { ScoringProfileName } from "@readyscore/scoring-engine";
import { analyzeProject, type AnalyzeProjectProgressEvent, type ProjectAnalysis } from "./analyze-project.js";
import { createSilentLogger, type Logger } from "./logger.js";

export type ScoreCommandOptions = {
  profile?: ScoringProfileName;
  changedSince?: string;
  top?: number;
  minScore?: number;
};

export type ScoreCommandResult = {
  analysis: ProjectAnalysis;
  minScore: number;
  passed: boolean;
};

export type ChangedFilesLister = (input: ListChangedFilesInput) => ChangedFiles;

const createProgressReporter = (logger: Logger): ((event: AnalyzeProjectProgressEvent) => void) => {
  let lastProcessed = 0;

  return (event) => {
    switch (event.stage) {
      case "config_loaded":
        if (event.source === null) {
          logger.debug("config: no project configuration found, using defaults");
        } else {
          logger.info(`config: loaded ${event.source} (${event.issues} issues)`);
        }
        break;
      case "files_discovered":
        if (event.targetKind === "file") {
          logger.info("target is a single file; its directory is used as the project root");
        }
        logger.info(`discovered ${event.totalSourceFiles} source files (${event.totalFiles} files total)`);
        break;
      case "file_analyzed":
        if (!event.parsed) {
          logger.warn(`skipped unparseable file ${event.filePath}`);
        }
        if (event.processed === event.total || event.processed === 1 || event.processed - lastProcessed >= 100) {
          lastProcessed = event.processed;
          logger.info(`analyzed ${event.processed}/${event.total} files`);
        }
        logger.debug(`last file analyzed ${event.filePath}`);
        break;
      case "graph_built":
        logger.info(`dependency graph: ${event.nodes} modules, ${event.edges} edges, ${event.cycles} cycles`);
        break;
      case "report_computed":
        logger.debug(`report computed (score=${event.score})`);
        break;
    }
  };
};

const resolveChangedFiles = (
  projectPath: string,
  changedSince: string | undefined,
  listChangedFiles: ChangedFilesLister,
  logger: Logger,
): readonly string[] | undefined => {
  if (changedSince === undefined) {
    return undefined;
  }

  const changes = listChangedFiles({ projectPath, since: changedSince });
  if (!changes.available) {
    logger.warn(`--changed-since ignored: ${changes.reason}; scoring the whole project`);
    return undefined;
  }

  logger.info(`scoring ${changes.files.length} files changed since ${changes.since}`);
  return changes.files;
};

export const runScoreCommand = async (
  inputPath: string | undefined,
  options: ScoreCommandOptions,
  logger: Logger = createSilentLogger(),
  listChangedFiles: ChangedFilesLister = listChangedFilesFromGit,
): Promise<ScoreCommandResult> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const { absolutePath } = resolveTargetPath(inputPath, invocationCwd);
  logger.info(`scoring project: ${absolutePath}`);

  const changedFiles = resolveChangedFiles(absolutePath, options.changedSince, listChangedFiles, logger);
  const analysis = await analyzeProject({
    projectPath: absolutePath,
    settings: {
      ...(options.profile === undefined ? {} : { profile: options.profile }),
      ...(options.top === undefined ? {} : { topOffenderLimit: options.top }),
      ...(options.minScore === undefined ? {} : { minScore: options.minScore }),
    },
    ...(changedFiles === undefined ? {} : { changedFiles }),
    onProgress: createProgressReporter(logger),
  });

  for (const issue of [...analysis.config.issues, ...analysis.settings.issues]) {
    logger.warn(`config: ${issue.source}: ${issue.reason}`);
  }

  const { report } = analysis;
  for (const warning of report.warnings) {
    if (warning.category === "unreadable-directory") {
      logger.warn(`skipped unreadable directory ${warning.target}: ${warning.reason}`);
    }
  }

  if (report.directoryEntropy.warning) {
    logger.warn(
      `directory entropy: ${report.directoryEntropy.averageFiles.toFixed(1)} files per directory on average, ` +
        `${report.directoryEntropy.maxFiles} at most`,
    );
  }

  if (report.contextTokens?.exceeded === true) {
    logger.warn(
      `critical context is ${report.contextTokens.tokenCount} tokens, over the budget of ${report.contextTokens.budget}`,
    );
  }

  const { score } = report;
  const minScore = analysis.settings.minScore;
  const passed = score >= minScore;
  logger.info(`score ${score} (minimum ${minScore}, profile ${analysis.settings.profile})`);

  return { analysis, minScore, passed };
};
