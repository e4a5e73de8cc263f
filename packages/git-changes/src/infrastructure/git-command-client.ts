import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];

  constructor(message: string, args: readonly string[]) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

const describeFailure = (error: unknown): string => {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const stderr = String(error.stderr).trim();
    if (stderr.length > 0) {
      return stderr;
    }
  }

  return error instanceof Error ? error.message : "Unknown git execution error";
};

export class ExecGitCommandClient implements GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, "-c", "core.quotepath=false", ...args], {
        encoding: "utf8",
        maxBuffer: 1024 * 1024 * 16,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      throw new GitCommandError(describeFailure(error), args);
    }
  }
}
