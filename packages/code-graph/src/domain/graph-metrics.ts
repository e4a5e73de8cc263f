import type {
  DependencyCycle,
  DependencyGraph,
  DependencyGraphMetrics,
  DirectoryFileCount,
  GodModule,
  ModuleNode,
} from "@readyscore/core";
import { compareText } from "@readyscore/core";
import type { GraphData } from "./graph-model.js";
import { runTarjanScc } from "./tarjan.js";

const hasSelfLoop = (nodeId: string, adjacencyById: ReadonlyMap<string, readonly string[]>): boolean => {
  const targets = adjacencyById.get(nodeId) ?? [];
  return targets.includes(nodeId);
};

export const findCycles = (graph: GraphData): readonly DependencyCycle[] => {
  const { components } = runTarjanScc(graph.adjacencyById);

  const cycles: DependencyCycle[] = [];
  for (const component of components) {
    if (component.length > 1) {
      cycles.push({ nodes: [...component] });
      continue;
    }

    const onlyNode = component[0];
    if (onlyNode !== undefined && hasSelfLoop(onlyNode, graph.adjacencyById)) {
      cycles.push({ nodes: [onlyNode] });
    }
  }

  return cycles;
};

export const createDependencyGraph = (
  targetPath: string,
  graph: GraphData,
  directories: readonly DirectoryFileCount[],
): DependencyGraph => {
  const fanInById = new Map<string, number>();
  for (const edge of graph.edges) {
    if (edge.from !== edge.to) {
      fanInById.set(edge.to, (fanInById.get(edge.to) ?? 0) + 1);
    }
  }

  let maxFanIn = 0;
  let maxFanOut = 0;

  const nodes: ModuleNode[] = graph.nodes.map((node) => {
    const dependencies = graph.adjacencyById.get(node.id) ?? [];
    const fanIn = fanInById.get(node.id) ?? 0;
    const fanOut = dependencies.filter((dependency) => dependency !== node.id).length;

    if (fanIn > maxFanIn) {
      maxFanIn = fanIn;
    }

    if (fanOut > maxFanOut) {
      maxFanOut = fanOut;
    }

    return {
      id: node.id,
      absolutePath: node.absolutePath,
      relativePath: node.relativePath,
      dependencies,
      fanIn,
      fanOut,
    };
  });

  const cycles = findCycles(graph);

  const metrics: DependencyGraphMetrics = {
    nodeCount: graph.nodes.length,
    edgeCount: graph.edges.length,
    cycleCount: cycles.length,
    maxFanIn,
    maxFanOut,
  };

  return {
    targetPath,
    nodes,
    edges: graph.edges,
    cycles,
    directories,
    metrics,
  };
};

export const flagGodModules = (graph: DependencyGraph, inboundLimit: number): readonly GodModule[] =>
  graph.nodes
    .filter((node) => node.fanIn > inboundLimit)
    .map((node) => ({ module: node.id, fanIn: node.fanIn }))
    .sort((a, b) => b.fanIn - a.fanIn || compareText(a.module, b.module));
