import { compareText } from "@readyscore/core";
import type { ChangedFilesProvider } from "./changed-files-provider.js";

export type ListChangedFilesInput = {
  projectPath: string;
  since: string;
};

export type ChangedFiles =
  | { available: true; since: string; files: readonly string[] }
  | { available: false; reason: "not_git_repository" };

export type ChangedFilesProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "changes_listed"; changed: number; untracked: number };

const toPosix = (pathValue: string): string => pathValue.replaceAll("\\", "/");

export const listChangedFiles = (
  input: ListChangedFilesInput,
  provider: ChangedFilesProvider,
  onProgress?: (event: ChangedFilesProgressEvent) => void,
): ChangedFiles => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!provider.isGitRepository(input.projectPath)) {
    onProgress?.({ stage: "not_git_repository" });
    return { available: false, reason: "not_git_repository" };
  }

  const changed = provider.getChangedPaths(input.projectPath, input.since);
  const untracked = provider.getUntrackedPaths(input.projectPath);
  onProgress?.({ stage: "changes_listed", changed: changed.length, untracked: untracked.length });

  const files = [...new Set([...changed, ...untracked].map(toPosix))].sort(compareText);
  return { available: true, since: input.since, files };
};
