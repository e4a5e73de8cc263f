import { posix } from "node:path";
import type { ModuleResolutionOptions, PathAlias } from "@readyscore/core";

export type ModuleResolver = (fromId: string, specifier: string) => string | undefined;

const CANDIDATE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"] as const;

// `import "./a.js"` in TypeScript sources names the emitted file, not the source.
const EXTENSION_SWAPS: ReadonlyMap<string, readonly string[]> = new Map([
  [".js", [".ts", ".tsx"]],
  [".jsx", [".tsx"]],
  [".mjs", [".mts"]],
  [".cjs", [".cts"]],
]);

const isRelativeSpecifier = (specifier: string): boolean =>
  specifier === "." || specifier === ".." || specifier.startsWith("./") || specifier.startsWith("../");

const escapesRoot = (normalized: string): boolean => normalized === ".." || normalized.startsWith("../");

const candidatePaths = (basePath: string): readonly string[] => {
  const trimmed = basePath.endsWith("/") ? basePath.slice(0, -1) : basePath;
  const candidates: string[] = [trimmed];

  const extension = posix.extname(trimmed);
  const swaps = EXTENSION_SWAPS.get(extension) ?? [];
  for (const swap of swaps) {
    candidates.push(`${trimmed.slice(0, -extension.length)}${swap}`);
  }

  for (const appended of CANDIDATE_EXTENSIONS) {
    candidates.push(`${trimmed}${appended}`);
  }

  for (const appended of CANDIDATE_EXTENSIONS) {
    candidates.push(posix.join(trimmed, `index${appended}`));
  }

  return candidates;
};

const matchAlias = (alias: PathAlias, specifier: string): readonly string[] => {
  const wildcard = alias.pattern.indexOf("*");
  if (wildcard < 0) {
    return alias.pattern === specifier ? alias.targets : [];
  }

  const prefix = alias.pattern.slice(0, wildcard);
  const suffix = alias.pattern.slice(wildcard + 1);
  if (
    specifier.length < prefix.length + suffix.length ||
    !specifier.startsWith(prefix) ||
    !specifier.endsWith(suffix)
  ) {
    return [];
  }

  const captured = specifier.slice(prefix.length, specifier.length - suffix.length);
  return alias.targets.map((target) => target.replace("*", captured));
};

const aliasPrefixLength = (alias: PathAlias): number => {
  const wildcard = alias.pattern.indexOf("*");
  return wildcard < 0 ? alias.pattern.length : wildcard;
};

/**
 * Resolves import specifiers to ids of files inside the project. Specifiers that
 * name nothing in the project (packages, Node built-ins, missing files) resolve to
 * `undefined`.
 */
export const createModuleResolver = (
  projectFileIds: Iterable<string>,
  options: ModuleResolutionOptions,
): ModuleResolver => {
  const knownIds = new Set(projectFileIds);
  // Most specific alias first, as the TypeScript compiler picks it.
  const aliases = [...options.pathAliases].sort((a, b) => aliasPrefixLength(b) - aliasPrefixLength(a));

  const firstKnown = (basePath: string): string | undefined => {
    const normalized = posix.normalize(basePath);
    if (escapesRoot(normalized) || posix.isAbsolute(normalized)) {
      return undefined;
    }

    return candidatePaths(normalized).find((candidate) => knownIds.has(candidate));
  };

  return (fromId, specifier) => {
    if (isRelativeSpecifier(specifier)) {
      return firstKnown(posix.join(posix.dirname(fromId), specifier));
    }

    if (specifier.startsWith("/") || specifier.includes(":")) {
      return undefined;
    }

    for (const alias of aliases) {
      for (const target of matchAlias(alias, specifier)) {
        const resolved = firstKnown(target);
        if (resolved !== undefined) {
          return resolved;
        }
      }
    }

    for (const moduleRoot of options.moduleRoots) {
      const resolved = firstKnown(moduleRoot === "" ? specifier : posix.join(moduleRoot, specifier));
      if (resolved !== undefined) {
        return resolved;
      }
    }

    return undefined;
  };
};
