import type { DependencyGraph, ModuleResolutionOptions } from "@readyscore/core";
import { tallyDirectoryFiles } from "../domain/directory-entropy.js";
import { createDependencyGraph } from "../domain/graph-metrics.js";
import { createGraphData, type EdgeRecord, type NodeRecord } from "../domain/graph-model.js";
import { createModuleResolver } from "../domain/module-resolver.js";

export type ModuleImports = {
  filePath: string;
  absolutePath: string;
  specifiers: readonly string[];
};

export type BuildDependencyGraphProgressEvent =
  | { stage: "edges_resolved"; totalEdges: number }
  | { stage: "cycles_detected"; totalCycles: number };

export type BuildDependencyGraphInput = {
  targetPath: string;
  modules: readonly ModuleImports[];
  directoryFiles: readonly string[];
  resolution?: ModuleResolutionOptions;
  onProgress?: (event: BuildDependencyGraphProgressEvent) => void;
};

const DEFAULT_RESOLUTION: ModuleResolutionOptions = { moduleRoots: [""], pathAliases: [] };

export const buildDependencyGraph = (input: BuildDependencyGraphInput): DependencyGraph => {
  const nodes: NodeRecord[] = input.modules.map((module) => ({
    id: module.filePath,
    absolutePath: module.absolutePath,
    relativePath: module.filePath,
  }));

  const resolveModule = createModuleResolver(
    nodes.map((node) => node.id),
    input.resolution ?? DEFAULT_RESOLUTION,
  );

  const edges: EdgeRecord[] = [];
  for (const module of input.modules) {
    for (const specifier of module.specifiers) {
      const target = resolveModule(module.filePath, specifier);
      if (target !== undefined) {
        edges.push({ from: module.filePath, to: target });
      }
    }
  }

  const graphData = createGraphData(nodes, edges);
  input.onProgress?.({ stage: "edges_resolved", totalEdges: graphData.edges.length });

  const graph = createDependencyGraph(input.targetPath, graphData, tallyDirectoryFiles(input.directoryFiles));
  input.onProgress?.({ stage: "cycles_detected", totalCycles: graph.cycles.length });
  return graph;
};
