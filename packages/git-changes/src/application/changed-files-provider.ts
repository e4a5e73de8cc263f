export interface ChangedFilesProvider {
  isGitRepository(projectPath: string): boolean;
  /** Paths relative to `projectPath` changed since `ref` (added, copied, modified or renamed). */
  getChangedPaths(projectPath: string, ref: string): readonly string[];
  /** Untracked, non-ignored paths relative to `projectPath`. */
  getUntrackedPaths(projectPath: string): readonly string[];
}
