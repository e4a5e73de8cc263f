import { readFile, readdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { EnvironmentHealth } from "@readyscore/core";

const LINTER_CONFIG_FILES: ReadonlySet<string> = new Set([
  ".eslintrc",
  ".eslintrc.js",
  ".eslintrc.cjs",
  ".eslintrc.json",
  ".eslintrc.yml",
  ".eslintrc.yaml",
  "eslint.config.js",
  "eslint.config.mjs",
  "eslint.config.cjs",
  "eslint.config.ts",
  "biome.json",
  "biome.jsonc",
  ".oxlintrc.json",
]);

const LOCK_FILES: ReadonlySet<string> = new Set([
  "package-lock.json",
  "npm-shrinkwrap.json",
  "yarn.lock",
  "pnpm-lock.yaml",
  "bun.lockb",
  "bun.lock",
]);

const AGENTS_FILE = "agents.md";

const listNames = async (directory: string): Promise<readonly string[]> => {
  try {
    return await readdir(directory);
  } catch {
    return [];
  }
};

const hasEmbeddedLinterConfig = async (packageJsonPath: string): Promise<boolean> => {
  try {
    const manifest: unknown = JSON.parse(await readFile(packageJsonPath, "utf8"));
    return typeof manifest === "object" && manifest !== null && "eslintConfig" in manifest;
  } catch {
    return false;
  }
};

/**
 * Looks for the files an agent relies on before it edits anything: an AGENTS.md,
 * a linter configuration and a dependency lock file. The project root is checked
 * first, then its parent, which is where a workspace keeps its lock file.
 */
export const checkEnvironmentHealth = async (projectRoot: string): Promise<EnvironmentHealth> => {
  const health = { agentsFile: false, linterConfig: false, lockFile: false };
  const parent = dirname(projectRoot);
  const searchDirectories = parent === projectRoot ? [projectRoot] : [projectRoot, parent];

  for (const directory of searchDirectories) {
    const names = await listNames(directory);

    health.agentsFile ||= names.some((name) => name.toLowerCase() === AGENTS_FILE);
    health.lockFile ||= names.some((name) => LOCK_FILES.has(name));

    if (!health.linterConfig) {
      health.linterConfig =
        names.some((name) => LINTER_CONFIG_FILES.has(name)) ||
        (names.includes("package.json") && (await hasEmbeddedLinterConfig(join(directory, "package.json"))));
    }
  }

  return health;
};
