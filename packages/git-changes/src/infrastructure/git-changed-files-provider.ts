import type { ChangedFilesProvider } from "../application/changed-files-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

const splitLines = (output: string): readonly string[] =>
  output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

export class GitCliChangedFilesProvider implements ChangedFilesProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(projectPath: string): boolean {
    try {
      const output = this.gitClient.run(projectPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  // `--relative` limits the diff to the project directory and prints paths relative to it.
  getChangedPaths(projectPath: string, ref: string): readonly string[] {
    const output = this.gitClient.run(projectPath, [
      "diff",
      "--name-only",
      "--relative",
      "--diff-filter=ACMR",
      ref,
      "--",
    ]);
    return splitLines(output);
  }

  getUntrackedPaths(projectPath: string): readonly string[] {
    return splitLines(this.gitClient.run(projectPath, ["ls-files", "--others", "--exclude-standard"]));
  }
}
