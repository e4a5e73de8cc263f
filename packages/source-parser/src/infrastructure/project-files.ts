import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, dirname, extname, join, relative } from "node:path";
import type { AnalysisWarning } from "@readyscore/core";
import { compareText } from "@readyscore/core";

export type ProjectFiles = {
  projectRoot: string;
  targetKind: "directory" | "file";
  sourceFiles: readonly string[];
  allFiles: readonly string[];
  rootFileNames: readonly string[];
  /** Directories read successfully, empty ones included. */
  directoryCount: number;
  warnings: readonly AnalysisWarning[];
};

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
]);

const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set(["node_modules", "dist", "build", "coverage"]);

const DECLARATION_SUFFIXES = [".d.ts", ".d.mts", ".d.cts"];

export const normalizePath = (pathValue: string): string => pathValue.replaceAll("\\", "/");

export const isSourceFileName = (fileName: string): boolean => {
  if (DECLARATION_SUFFIXES.some((suffix) => fileName.endsWith(suffix))) {
    return false;
  }

  return SOURCE_EXTENSIONS.has(extname(fileName));
};

export const toProjectRelativePath = (projectRoot: string, absolutePath: string): string =>
  normalizePath(relative(projectRoot, absolutePath));

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

type DirectoryListing = { ok: true; entries: readonly Dirent[] } | { ok: false; reason: string };

const listDirectory = async (directory: string): Promise<DirectoryListing> => {
  try {
    return { ok: true, entries: await readdir(directory, { withFileTypes: true }) };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
};

const unreadable = (projectRoot: string, directory: string, reason: string): AnalysisWarning => ({
  category: "unreadable-directory",
  target: toProjectRelativePath(projectRoot, directory) || ".",
  reason,
});

// A single file is scored alone; its directory serves as the root for context files and config.
const discoverSingleFile = async (filePath: string): Promise<ProjectFiles> => {
  const projectRoot = dirname(filePath);
  const fileName = basename(filePath);
  const listing = await listDirectory(projectRoot);
  const rootFileNames = listing.ok
    ? listing.entries.filter((entry) => entry.isFile() && !entry.name.startsWith(".")).map((entry) => entry.name)
    : [fileName];

  return {
    projectRoot,
    targetKind: "file",
    sourceFiles: isSourceFileName(fileName) ? [normalizePath(filePath)] : [],
    allFiles: [fileName],
    rootFileNames: rootFileNames.sort(compareText),
    directoryCount: 1,
    warnings: listing.ok ? [] : [unreadable(projectRoot, projectRoot, listing.reason)],
  };
};

/**
 * Walks the project once. Hidden entries, dependency folders and build output are
 * skipped; symlinks are not followed. A directory that cannot be read becomes a
 * warning and the walk carries on. A file target is scored on its own.
 */
export const discoverProjectFiles = async (targetPath: string): Promise<ProjectFiles> => {
  const targetStats = await stat(targetPath).catch(() => undefined);
  if (targetStats?.isFile() === true) {
    return discoverSingleFile(targetPath);
  }

  const projectRoot = targetPath;
  const sourceFiles: string[] = [];
  const allFiles: string[] = [];
  const rootFileNames: string[] = [];
  const warnings: AnalysisWarning[] = [];
  let directoryCount = 0;
  const pending: string[] = [projectRoot];

  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined) {
      break;
    }

    const listing = await listDirectory(directory);
    if (!listing.ok) {
      warnings.push(unreadable(projectRoot, directory, listing.reason));
      continue;
    }

    directoryCount += 1;
    for (const entry of listing.entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }

      const absolutePath = join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRECTORIES.has(entry.name)) {
          pending.push(absolutePath);
        }
        continue;
      }

      if (!entry.isFile()) {
        continue;
      }

      allFiles.push(toProjectRelativePath(projectRoot, absolutePath));
      if (directory === projectRoot) {
        rootFileNames.push(entry.name);
      }

      if (isSourceFileName(entry.name)) {
        sourceFiles.push(normalizePath(absolutePath));
      }
    }
  }

  return {
    projectRoot,
    targetKind: "directory",
    sourceFiles: sourceFiles.sort(compareText),
    allFiles: allFiles.sort(compareText),
    rootFileNames: rootFileNames.sort(compareText),
    directoryCount,
    warnings: warnings.sort((a, b) => compareText(a.target, b.target)),
  };
};
