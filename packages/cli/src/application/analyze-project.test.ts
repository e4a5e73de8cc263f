import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { analyzeProject, type AnalyzeProjectProgressEvent } from "./analyze-project.js";

const createdPaths: string[] = [];

const createProject = async (files: Readonly<Record<string, string>>): Promise<string> => {
  const projectRoot = await mkdtemp(join(tmpdir(), "readyscore-analyze-test-"));
  createdPaths.push(projectRoot);

  for (const [relativePath, content] of Object.entries(files)) {
    const absolutePath = join(projectRoot, relativePath);
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, content, "utf8");
  }

  return projectRoot;
};

const CONTEXT_FILES: Readonly<Record<string, string>> = {
  "README.md": "# demo\n",
  "AGENTS.md": "Run the tests before committing.\n",
};

// 13 branches and 250 logical lines in one untyped function.
const oversizedHandler = (): string => {
  const lines = ["export function handle(input, mode) {"];
  for (let step = 1; step <= 13; step += 1) {
    lines.push(`  if (input > ${step}) mode += ${step};`);
  }
  for (let step = 0; step < 235; step += 1) {
    lines.push(`  mode += ${step};`);
  }
  lines.push("  return mode;", "}", "");
  return lines.join("\n");
};

const CYCLIC_PROJECT: Readonly<Record<string, string>> = {
  "README.md": "# demo\n",
  "AGENTS.md": "Run the tests before committing.\n",
  "src/a.ts": 'import { b } from "./b.js";\nexport const a = (): number => b();\n',
  "src/b.ts": 'import { a } from "./a.js";\nexport function b(): number {\n  return 1;\n}\nexport const again = a;\n',
  "src/broken.ts": "export const = ;\n",
};

afterEach(async () => {
  for (const pathToDelete of createdPaths.splice(0, createdPaths.length)) {
    await rm(pathToDelete, { recursive: true, force: true });
  }
});

describe("analyzeProject", () => {
  it("scores a project with an import cycle and an unparseable file", async () => {
    const projectRoot = await createProject(CYCLIC_PROJECT);
    const stages: AnalyzeProjectProgressEvent["stage"][] = [];

    const analysis = await analyzeProject({
      projectPath: projectRoot,
      onProgress: (event) => stages.push(event.stage),
    });

    expect(analysis.files.map((file) => file.filePath)).toEqual(["src/a.ts", "src/b.ts"]);
    expect(analysis.graph.nodes.map((node) => node.id)).toEqual(["src/a.ts", "src/b.ts", "src/broken.ts"]);
    expect(analysis.graph.cycles).toEqual([{ nodes: ["src/a.ts", "src/b.ts"] }]);
    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.target, penalty.points])).toEqual([
      ["circular-dependency", "src/a.ts -> src/b.ts", -5],
    ]);
    expect(analysis.report.score).toBe(95);
    expect(analysis.report.warnings).toHaveLength(1);
    expect(analysis.report.warnings[0]?.target).toBe("src/broken.ts");
    expect(analysis.report.warnings[0]?.reason.startsWith("line 1: ")).toBe(true);
    expect(stages).toEqual([
      "files_discovered",
      "config_loaded",
      "file_analyzed",
      "file_analyzed",
      "file_analyzed",
      "graph_built",
      "report_computed",
    ]);
  });

  it("limits file penalties and warnings to changed files but still charges the cycle", async () => {
    const projectRoot = await createProject(CYCLIC_PROJECT);

    const analysis = await analyzeProject({ projectPath: projectRoot, changedFiles: ["src/a.ts"] });

    expect(analysis.report.scope).toEqual({ mode: "changed_files", fileCount: 1 });
    expect(analysis.report.warnings).toEqual([]);
    expect(analysis.report.score).toBe(95);
  });

  it("charges missing context files and an invalid configuration", async () => {
    const projectRoot = await createProject({
      "readme.md": "# demo\n",
      "readyscore.config.json": JSON.stringify({ profile: "strict" }),
      "src/index.ts": "export const ready = true;\n",
    });

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.target])).toEqual([
      ["missing-context-file", "AGENTS.md"],
      ["invalid-config", "readyscore.config.json"],
    ]);
    expect(analysis.report.score).toBe(70);
    expect(analysis.settings.profile).toBe("standard");
  });

  it("keeps the baseline score for an empty directory", async () => {
    const projectRoot = await createProject({});

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.report.score).toBe(100);
    expect(analysis.report.penalties).toEqual([]);
    expect(analysis.report.warnings).toEqual([]);
    expect(analysis.report.scope).toEqual({ mode: "project", fileCount: 0 });
    expect(analysis.report.contextTokens).toEqual({ tokenCount: 0, budget: 32_000, exceeded: false });
  });

  it("charges one penalty per strongly connected component", async () => {
    const projectRoot = await createProject({
      ...CONTEXT_FILES,
      "src/a.ts": 'import "./b.js";\nexport const a = 1;\n',
      "src/b.ts": 'import "./a.js";\nexport const b = 2;\n',
      "src/c.ts": 'import "./d.js";\nexport const c = 3;\n',
      "src/d.ts": 'import "./e.js";\nexport const d = 4;\n',
      "src/e.ts": 'import "./c.js";\nexport const e = 5;\n',
    });

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.target, penalty.points])).toEqual([
      ["circular-dependency", "src/a.ts -> src/b.ts", -5],
      ["circular-dependency", "src/c.ts -> src/d.ts -> src/e.ts", -5],
    ]);
    expect(analysis.report.score).toBe(90);
  });

  it("scores a bloated, complex, untyped function read from disk down to 60", async () => {
    const projectRoot = await createProject({ ...CONTEXT_FILES, "src/handle.js": oversizedHandler() });

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.files[0]?.functions.map((record) => [record.complexity, record.logicalLines, record.typeCoverage]))
      .toEqual([[14, 250, 0]]);
    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.points])).toEqual([
      ["bloated-file", -5],
      ["high-cognitive-load", -15],
      ["missing-types", -20],
    ]);
    expect(analysis.report.score).toBe(60);
  });

  it("scores a single file with its directory as the root", async () => {
    const projectRoot = await createProject(CYCLIC_PROJECT);

    const analysis = await analyzeProject({ projectPath: join(projectRoot, "src/a.ts") });

    expect(analysis.projectRoot).toBe(join(projectRoot, "src"));
    expect(analysis.files.map((file) => file.filePath)).toEqual(["a.ts"]);
    expect(analysis.graph.cycles).toEqual([]);
    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.target])).toEqual([
      ["missing-context-file", "README.md"],
      ["missing-context-file", "AGENTS.md"],
    ]);
  });

  it("flags critical context over the configured token budget", async () => {
    const projectRoot = await createProject({
      ...CONTEXT_FILES,
      "readyscore.config.json": JSON.stringify({ profile: "generic", thresholds: { contextTokenBudget: 5 } }),
      "src/index.ts": "export function ready(flag: boolean): boolean {\n  return flag;\n}\n",
    });

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.settings.profile).toBe("generic");
    expect(analysis.report.contextTokens?.budget).toBe(5);
    expect(analysis.report.contextTokens?.exceeded).toBe(true);
    expect(analysis.report.environment).toMatchObject({ agentsFile: true });
    expect(analysis.report.score).toBe(100);
  });

  it("charges an ACL override that crosses the profile's red tier as invalid configuration", async () => {
    const projectRoot = await createProject({
      ...CONTEXT_FILES,
      "readyscore.config.json": JSON.stringify({ thresholds: { aclYellow: 20 } }),
      "src/index.ts": "export const ready = true;\n",
    });

    const analysis = await analyzeProject({ projectPath: projectRoot });

    expect(analysis.settings.thresholds.aclYellow).toBe(10);
    expect(analysis.report.penalties.map((penalty) => [penalty.category, penalty.target])).toEqual([
      ["invalid-config", "readyscore.config.json"],
    ]);
    expect(analysis.report.score).toBe(85);
  });

  it("produces identical reports for repeated runs", async () => {
    const projectRoot = await createProject(CYCLIC_PROJECT);

    const first = await analyzeProject({ projectPath: projectRoot, concurrency: 1 });
    const second = await analyzeProject({ projectPath: projectRoot, concurrency: 4 });

    expect(second.report).toEqual(first.report);
  });

  it("stops when the signal is aborted", async () => {
    const projectRoot = await createProject(CYCLIC_PROJECT);
    const controller = new AbortController();
    controller.abort();

    await expect(analyzeProject({ projectPath: projectRoot, signal: controller.signal })).rejects.toThrow();
  });
});
