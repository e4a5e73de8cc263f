import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  AnalysisWarning,
  DependencyGraph,
  FileSummary,
  ScoreReport,
  ScoreScope,
} from "@readyscore/core";
import { extractFileSummary, extractSignatures } from "@readyscore/code-metrics";
import { buildDependencyGraph, type ModuleImports } from "@readyscore/code-graph";
import { computeScoreReport } from "@readyscore/scoring-engine";
import {
  checkEnvironmentHealth,
  discoverProjectFiles,
  extractImportSpecifiers,
  parseSource,
  readModuleResolutionOptions,
  toProjectRelativePath,
} from "@readyscore/source-parser";
import { countContextTokens } from "./count-context-tokens.js";
import {
  CONFIG_FILE_NAME,
  loadProjectConfig,
  resolveScoringSettings,
  type LoadedProjectConfig,
  type ScoringSettings,
  type ScoringSettingsOverrides,
} from "./load-config.js";
import { mapWithConcurrency } from "./map-with-concurrency.js";

export const DEFAULT_ANALYSIS_CONCURRENCY = 8;

// Documents counted toward the context an agent loads up front, matched case-insensitively at the root.
export const CRITICAL_CONTEXT_FILES: readonly string[] = ["README.md", "AGENTS.md"];

export type AnalyzeProjectProgressEvent =
  | { stage: "files_discovered"; totalSourceFiles: number; totalFiles: number; targetKind: "directory" | "file" }
  | { stage: "config_loaded"; source: string | null; issues: number }
  | { stage: "file_analyzed"; processed: number; total: number; filePath: string; parsed: boolean }
  | { stage: "graph_built"; nodes: number; edges: number; cycles: number }
  | { stage: "report_computed"; score: number };

export type AnalyzeProjectInput = {
  /** A project directory, or a single file scored with its directory as the root. */
  projectPath: string;
  settings?: ScoringSettingsOverrides;
  /** Project-relative paths; when set, file and function penalties are limited to them. */
  changedFiles?: readonly string[];
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (event: AnalyzeProjectProgressEvent) => void;
};

export type ProjectAnalysis = {
  targetPath: string;
  projectRoot: string;
  config: LoadedProjectConfig;
  settings: ScoringSettings;
  files: readonly FileSummary[];
  graph: DependencyGraph;
  report: ScoreReport;
};

type FileAnalysis =
  | { parsed: true; summary: FileSummary; imports: ModuleImports; signatures: readonly string[] }
  | { parsed: false; warning: AnalysisWarning; imports: ModuleImports };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const analyzeFile = async (projectRoot: string, absolutePath: string): Promise<FileAnalysis> => {
  const filePath = toProjectRelativePath(projectRoot, absolutePath);

  // A file that cannot be analyzed stays in the graph without outgoing edges.
  const skipped = (reason: string): FileAnalysis => ({
    parsed: false,
    warning: { category: "parse-error", target: filePath, reason },
    imports: { filePath, absolutePath, specifiers: [] },
  });

  let text: string;
  try {
    text = await readFile(absolutePath, "utf8");
  } catch (error) {
    return skipped(`unreadable: ${describeError(error)}`);
  }

  const parsed = parseSource(absolutePath, text);
  if (!parsed.ok) {
    return skipped(parsed.reason);
  }

  return {
    parsed: true,
    summary: extractFileSummary(parsed.sourceFile, filePath),
    imports: { filePath, absolutePath, specifiers: extractImportSpecifiers(parsed.sourceFile) },
    signatures: extractSignatures(parsed.sourceFile),
  };
};

const readContextDocuments = async (projectRoot: string, rootFileNames: readonly string[]): Promise<string[]> => {
  const wanted = new Set(CRITICAL_CONTEXT_FILES.map((name) => name.toLowerCase()));
  const documents: string[] = [];
  for (const name of rootFileNames.filter((fileName) => wanted.has(fileName.toLowerCase()))) {
    // Unreadable documents count as empty.
    documents.push(await readFile(join(projectRoot, name), "utf8").catch(() => ""));
  }

  return documents;
};

/**
 * Scores one project: discovery, per-file parsing and measurement, the dependency
 * graph, then the report. Files are analyzed independently and only combined once
 * all of them are done, so the result does not depend on completion order.
 */
export const analyzeProject = async (input: AnalyzeProjectInput): Promise<ProjectAnalysis> => {
  const { projectPath, signal, onProgress } = input;

  const projectFiles = await discoverProjectFiles(projectPath);
  const { projectRoot } = projectFiles;
  const total = projectFiles.sourceFiles.length;
  onProgress?.({
    stage: "files_discovered",
    totalSourceFiles: total,
    totalFiles: projectFiles.allFiles.length,
    targetKind: projectFiles.targetKind,
  });

  const config = await loadProjectConfig(projectRoot);
  const settings = resolveScoringSettings(config.config, input.settings, config.source ?? CONFIG_FILE_NAME);
  onProgress?.({
    stage: "config_loaded",
    source: config.source,
    issues: config.issues.length + settings.issues.length,
  });

  let processed = 0;
  const analyses = await mapWithConcurrency(
    projectFiles.sourceFiles,
    input.concurrency ?? DEFAULT_ANALYSIS_CONCURRENCY,
    async (absolutePath) => {
      signal?.throwIfAborted();
      const analysis = await analyzeFile(projectRoot, absolutePath);
      processed += 1;
      onProgress?.({
        stage: "file_analyzed",
        processed,
        total,
        filePath: analysis.imports.filePath,
        parsed: analysis.parsed,
      });
      return analysis;
    },
  );
  signal?.throwIfAborted();

  const files: FileSummary[] = [];
  const modules: ModuleImports[] = [];
  const warnings: AnalysisWarning[] = [...projectFiles.warnings];
  const signatures: string[] = [];
  for (const analysis of analyses) {
    modules.push(analysis.imports);
    if (analysis.parsed) {
      files.push(analysis.summary);
      signatures.push(...analysis.signatures);
    } else {
      warnings.push(analysis.warning);
    }
  }

  const resolution = readModuleResolutionOptions(projectRoot);
  const graph = buildDependencyGraph({
    targetPath: projectRoot,
    modules,
    directoryFiles: projectFiles.allFiles,
    resolution: resolution.options,
  });
  onProgress?.({
    stage: "graph_built",
    nodes: graph.metrics.nodeCount,
    edges: graph.metrics.edgeCount,
    cycles: graph.metrics.cycleCount,
  });

  const documents = await readContextDocuments(projectRoot, projectFiles.rootFileNames);
  const scope: ScoreScope =
    input.changedFiles === undefined ? { mode: "project" } : { mode: "changed_files", files: input.changedFiles };
  const configIssues = [
    ...config.issues,
    ...settings.issues,
    ...(resolution.issue === undefined ? [] : [{ source: "tsconfig.json", reason: resolution.issue }]),
  ];

  const report = computeScoreReport({
    files,
    graph,
    thresholds: settings.thresholds,
    scope,
    rootFileNames: projectFiles.rootFileNames,
    configIssues,
    warnings,
    topOffenderLimit: settings.topOffenderLimit,
    directoryCount: projectFiles.directoryCount,
    environment: await checkEnvironmentHealth(projectRoot),
    contextTokenCount: countContextTokens([...documents, ...signatures]),
  });
  onProgress?.({ stage: "report_computed", score: report.score });

  return { targetPath: projectPath, projectRoot, config, settings, files, graph, report };
};
