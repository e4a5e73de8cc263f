export {
  buildDependencyGraph,
  type BuildDependencyGraphInput,
  type BuildDependencyGraphProgressEvent,
  type ModuleImports,
} from "./application/build-dependency-graph.js";
export {
  flagCrowdedDirectories,
  summarizeDirectoryEntropy,
  tallyDirectoryFiles,
  type DirectoryEntropyLimits,
} from "./domain/directory-entropy.js";
export { flagGodModules } from "./domain/graph-metrics.js";
export { createModuleResolver, type ModuleResolver } from "./domain/module-resolver.js";
export { runTarjanScc } from "./domain/tarjan.js";
