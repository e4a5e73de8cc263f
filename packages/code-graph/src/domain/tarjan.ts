import { compareText } from "@readyscore/core";

type TarjanResult = {
  components: readonly (readonly string[])[];
};

type Frame = {
  nodeId: string;
  neighbors: readonly string[];
  nextNeighbor: number;
};

/**
 * Strongly connected components by Tarjan's algorithm. The depth-first search
 * keeps its own frame stack so deep import chains cannot exhaust the call stack.
 *
 * Members of each component are sorted, and components are sorted by their first
 * member.
 */
export const runTarjanScc = (adjacencyById: ReadonlyMap<string, readonly string[]>): TarjanResult => {
  let index = 0;
  const indices = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];

  const open = (nodeId: string): Frame => {
    indices.set(nodeId, index);
    lowLink.set(nodeId, index);
    index += 1;

    stack.push(nodeId);
    onStack.add(nodeId);
    return { nodeId, neighbors: adjacencyById.get(nodeId) ?? [], nextNeighbor: 0 };
  };

  const lowerLink = (nodeId: string, candidate: number | undefined): void => {
    const current = lowLink.get(nodeId);
    if (current !== undefined && candidate !== undefined && candidate < current) {
      lowLink.set(nodeId, candidate);
    }
  };

  const closeComponent = (rootId: string): void => {
    const component: string[] = [];
    for (;;) {
      const popped = stack.pop();
      if (popped === undefined) {
        break;
      }

      onStack.delete(popped);
      component.push(popped);
      if (popped === rootId) {
        break;
      }
    }

    component.sort(compareText);
    components.push(component);
  };

  const strongConnect = (startId: string): void => {
    const frames: Frame[] = [open(startId)];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame === undefined) {
        break;
      }

      const nextId = frame.neighbors[frame.nextNeighbor];
      if (nextId !== undefined) {
        frame.nextNeighbor += 1;
        if (!indices.has(nextId)) {
          frames.push(open(nextId));
        } else if (onStack.has(nextId)) {
          lowerLink(frame.nodeId, indices.get(nextId));
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent !== undefined) {
        lowerLink(parent.nodeId, lowLink.get(frame.nodeId));
      }

      if (lowLink.get(frame.nodeId) === indices.get(frame.nodeId)) {
        closeComponent(frame.nodeId);
      }
    }
  };

  const nodeIds = [...adjacencyById.keys()].sort(compareText);
  for (const nodeId of nodeIds) {
    if (!indices.has(nodeId)) {
      strongConnect(nodeId);
    }
  }

  components.sort((a, b) => compareText(a[0] ?? "", b[0] ?? ""));

  return { components };
};
