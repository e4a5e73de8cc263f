export { parseSource, type ParseSourceResult } from "./parsing/parse-source.js";
export { extractImportSpecifiers } from "./parsing/import-specifiers.js";
export {
  SOURCE_EXTENSIONS,
  discoverProjectFiles,
  isSourceFileName,
  normalizePath,
  toProjectRelativePath,
  type ProjectFiles,
} from "./infrastructure/project-files.js";
export {
  DEFAULT_MODULE_RESOLUTION,
  readModuleResolutionOptions,
  type ModuleResolutionLookup,
} from "./infrastructure/tsconfig-resolution.js";
export { checkEnvironmentHealth } from "./infrastructure/environment-health.js";
