import { posix } from "node:path";
import type { DirectoryEntropySummary, DirectoryFileCount } from "@readyscore/core";
import { compareText } from "@readyscore/core";

// Counts every file per parent directory; files at the project root count under ".".
export const tallyDirectoryFiles = (relativePaths: readonly string[]): readonly DirectoryFileCount[] => {
  const counts = new Map<string, number>();
  for (const relativePath of new Set(relativePaths)) {
    const directory = posix.dirname(relativePath);
    counts.set(directory, (counts.get(directory) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([directory, fileCount]) => ({ directory, fileCount }))
    .sort((a, b) => compareText(a.directory, b.directory));
};

export const flagCrowdedDirectories = (
  directories: readonly DirectoryFileCount[],
  limit: number,
): readonly DirectoryFileCount[] => directories.filter((entry) => entry.fileCount > limit);

export type DirectoryEntropyLimits = {
  averageLimit: number;
  directoryLimit: number;
};

/**
 * Spread of files over directories. `directoryCount` counts every walked
 * directory, empty ones included, so it can exceed the number of tallied entries.
 */
export const summarizeDirectoryEntropy = (
  directories: readonly DirectoryFileCount[],
  directoryCount: number,
  limits: DirectoryEntropyLimits,
): DirectoryEntropySummary => {
  const totalFiles = directories.reduce((sum, entry) => sum + entry.fileCount, 0);
  const maxFiles = directories.reduce((max, entry) => Math.max(max, entry.fileCount), 0);
  const walked = Math.max(directoryCount, directories.length);
  const averageFiles = walked === 0 ? 0 : totalFiles / walked;

  return {
    directoryCount: walked,
    averageFiles,
    maxFiles,
    warning: averageFiles > limits.averageLimit || maxFiles > limits.directoryLimit,
  };
};
