import { join, resolve } from "node:path";
import type { ModuleResolutionOptions, PathAlias } from "@readyscore/core";
import { compareText } from "@readyscore/core";
import * as ts from "typescript";
import { toProjectRelativePath } from "./project-files.js";

export type ModuleResolutionLookup = {
  options: ModuleResolutionOptions;
  configPath: string | null;
  issue?: string;
};

export const DEFAULT_MODULE_RESOLUTION: ModuleResolutionOptions = {
  moduleRoots: [""],
  pathAliases: [],
};

// "No inputs were found in config file": about which files the config selects, not about resolution.
const NO_INPUTS_DIAGNOSTIC_CODE = 18003;

const insideProject = (projectRoot: string, absolutePath: string): string | undefined => {
  const relativePath = toProjectRelativePath(projectRoot, absolutePath);
  return relativePath.startsWith("..") ? undefined : relativePath;
};

const toPathAliases = (
  projectRoot: string,
  pathsBase: string,
  paths: ts.MapLike<string[]>,
): readonly PathAlias[] =>
  Object.entries(paths)
    .map(([pattern, targets]) => ({
      pattern,
      targets: targets
        .map((target) => insideProject(projectRoot, resolve(pathsBase, target)))
        .filter((target): target is string => target !== undefined),
    }))
    .filter((alias) => alias.targets.length > 0)
    .sort((a, b) => compareText(a.pattern, b.pattern));

/**
 * Reads `baseUrl` and `paths` from the root tsconfig.json through the compiler API,
 * so that `extends` chains are followed. Only the options that affect how bare
 * specifiers map onto project files are kept.
 */
export const readModuleResolutionOptions = (projectRoot: string): ModuleResolutionLookup => {
  const configPath = join(projectRoot, "tsconfig.json");
  if (!ts.sys.fileExists(configPath)) {
    return { options: DEFAULT_MODULE_RESOLUTION, configPath: null };
  }

  const { config, error } = ts.readConfigFile(configPath, ts.sys.readFile);
  if (error !== undefined) {
    return {
      options: DEFAULT_MODULE_RESOLUTION,
      configPath,
      issue: ts.flattenDiagnosticMessageText(error.messageText, " "),
    };
  }

  const parsed = ts.parseJsonConfigFileContent(config, ts.sys, projectRoot, undefined, configPath);
  const firstError = parsed.errors.find((diagnostic) => diagnostic.code !== NO_INPUTS_DIAGNOSTIC_CODE);
  if (firstError !== undefined) {
    return {
      options: DEFAULT_MODULE_RESOLUTION,
      configPath,
      issue: ts.flattenDiagnosticMessageText(firstError.messageText, " "),
    };
  }

  const baseUrl = parsed.options.baseUrl;
  const baseRoot = baseUrl === undefined ? undefined : insideProject(projectRoot, baseUrl);

  const moduleRoots = baseRoot === undefined || baseRoot === "" ? [""] : ["", baseRoot];
  const pathAliases =
    parsed.options.paths === undefined
      ? []
      : toPathAliases(projectRoot, baseUrl ?? projectRoot, parsed.options.paths);

  return {
    options: { moduleRoots, pathAliases },
    configPath,
  };
};
