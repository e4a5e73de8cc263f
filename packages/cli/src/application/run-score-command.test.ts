import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { formatScoreOutput } from "./format-score-output.js";
import { createStderrLogger } from "./logger.js";
import { runScoreCommand } from "./run-score-command.js";

const createdPaths: string[] = [];

const createProject = async (files: Readonly<Record<string, string>>): Promise<string> => {
  const projectRoot = await mkdtemp(join(tmpdir(), "readyscore-command-test-"));
  createdPaths.push(projectRoot);

  for (const [relativePath, content] of Object.entries(files)) {
    const absolutePath = join(projectRoot, relativePath);
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, content, "utf8");
  }

  return projectRoot;
};

const UNTYPED_PROJECT: Readonly<Record<string, string>> = {
  "README.md": "# demo\n",
  "AGENTS.md": "Keep functions small.\n",
  "src/math.js": "export function add(a, b) {\n  return a + b;\n}\n",
  "src/typed.ts": "export const twice = (value: number): number => value * 2;\n",
};

afterEach(async () => {
  for (const pathToDelete of createdPaths.splice(0, createdPaths.length)) {
    await rm(pathToDelete, { recursive: true, force: true });
  }
});

describe("runScoreCommand", () => {
  it("fails the minimum score when penalties push the score below it", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);

    const result = await runScoreCommand(projectRoot, { minScore: 90 });

    expect(result.analysis.report.score).toBe(80);
    expect(result.minScore).toBe(90);
    expect(result.passed).toBe(false);
  });

  it("takes the minimum score from the project configuration", async () => {
    const projectRoot = await createProject({
      ...UNTYPED_PROJECT,
      "readyscore.config.json": JSON.stringify({ minScore: 75 }),
    });

    const result = await runScoreCommand(projectRoot, {});

    expect(result.minScore).toBe(75);
    expect(result.passed).toBe(true);
  });

  it("scores the whole project when changed files cannot be listed", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);
    const lines: string[] = [];

    const result = await runScoreCommand(
      projectRoot,
      { changedSince: "main" },
      createStderrLogger("warn", (line) => lines.push(line)),
      () => ({ available: false, reason: "not_git_repository" }),
    );

    expect(result.analysis.report.scope).toEqual({ mode: "project", fileCount: 2 });
    expect(lines).toEqual([
      "[readyscore] WARN --changed-since ignored: not_git_repository; scoring the whole project\n",
    ]);
  });

  it("scores only the listed changes in diff mode", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);

    const result = await runScoreCommand(projectRoot, { changedSince: "main" }, undefined, (input) => ({
      available: true,
      since: input.since,
      files: ["src/typed.ts"],
    }));

    expect(result.analysis.report.scope).toEqual({ mode: "changed_files", fileCount: 1 });
    expect(result.analysis.report.score).toBe(100);
  });

  it("scores a single file and reports unreadable targets without failing", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);

    const single = await runScoreCommand(join(projectRoot, "src/math.js"), {});
    const missing = await runScoreCommand(join(projectRoot, "missing"), {});

    expect(single.analysis.projectRoot).toBe(join(projectRoot, "src"));
    expect(single.analysis.files.map((file) => file.filePath)).toEqual(["math.js"]);
    expect(missing.analysis.report.score).toBe(100);
    expect(missing.analysis.report.warnings.map((warning) => warning.category)).toEqual(["unreadable-directory"]);
  });
});

describe("formatScoreOutput", () => {
  it("summarizes penalties by category", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);
    const result = await runScoreCommand(projectRoot, { top: 1 });

    const summary: unknown = JSON.parse(formatScoreOutput(result, "summary"));

    expect(summary).toMatchObject({
      targetPath: projectRoot,
      score: 80,
      minScore: 70,
      passed: true,
      profile: "standard",
      penaltiesByCategory: { "missing-types": { count: 1, points: -20 } },
      topOffenders: [{ function: "src/math.js:1 add", acl: 1.1, tier: "green" }],
      worstFiles: [{ file: "src/math.js", score: 80 }],
      cycleCount: 0,
      directoryEntropy: { directoryCount: 2, averageFiles: 2, maxFiles: 2, warning: false },
      environment: { agentsFile: true },
      contextTokens: { budget: 32_000, exceeded: false },
    });
  });

  it("includes the full report in json mode", async () => {
    const projectRoot = await createProject(UNTYPED_PROJECT);
    const result = await runScoreCommand(projectRoot, {});

    const output: unknown = JSON.parse(formatScoreOutput(result, "json"));

    expect(output).toMatchObject({
      profile: "standard",
      report: { score: 80, scope: { mode: "project", fileCount: 2 } },
    });
  });
});
