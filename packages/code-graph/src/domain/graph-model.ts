import { compareText } from "@readyscore/core";

export type NodeRecord = {
  id: string;
  absolutePath: string;
  relativePath: string;
};

export type EdgeRecord = {
  from: string;
  to: string;
};

export type GraphData = {
  nodes: readonly NodeRecord[];
  edges: readonly EdgeRecord[];
  adjacencyById: ReadonlyMap<string, readonly string[]>;
};

const edgeKey = (from: string, to: string): string => `${from}\u0000${to}`;

// Self-edges are kept: a module importing itself is reported as a cycle.
export const createGraphData = (
  nodes: readonly NodeRecord[],
  rawEdges: readonly EdgeRecord[],
): GraphData => {
  const sortedNodes = [...nodes].sort((a, b) => compareText(a.id, b.id));
  const knownNodeIds = new Set(sortedNodes.map((node) => node.id));

  const uniqueEdgeMap = new Map<string, EdgeRecord>();
  for (const edge of rawEdges) {
    if (!knownNodeIds.has(edge.from) || !knownNodeIds.has(edge.to)) {
      continue;
    }

    uniqueEdgeMap.set(edgeKey(edge.from, edge.to), { from: edge.from, to: edge.to });
  }

  const sortedEdges = [...uniqueEdgeMap.values()].sort((a, b) => {
    const fromCompare = compareText(a.from, b.from);
    if (fromCompare !== 0) {
      return fromCompare;
    }

    return compareText(a.to, b.to);
  });

  const adjacency = new Map<string, string[]>();
  for (const node of sortedNodes) {
    adjacency.set(node.id, []);
  }

  for (const edge of sortedEdges) {
    adjacency.get(edge.from)?.push(edge.to);
  }

  return {
    nodes: sortedNodes,
    edges: sortedEdges,
    adjacencyById: adjacency,
  };
};
