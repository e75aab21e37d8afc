import { GraphModel, VertexId } from "../model.js";

export type Bridge = readonly [VertexId, VertexId];

interface LowLinkResult {
  readonly bridges: Bridge[];
  readonly articulation: VertexId[];
}

/**
 * Single DFS pass computing discovery times and low-links. Parent edges are
 * skipped by vertex, which is exact because the model forbids parallel edges.
 */
function lowLink(graph: GraphModel): LowLinkResult {
  if (graph.directed) {
    throw new Error("Bridges and articulation points are defined on undirected graphs");
  }
  const discovery = new Array<number>(graph.vertexCount).fill(-1);
  const low = new Array<number>(graph.vertexCount).fill(0);
  const cut = new Array<boolean>(graph.vertexCount).fill(false);
  const bridges: Bridge[] = [];
  let clock = 0;

  const visit = (vertex: VertexId, parent: VertexId): void => {
    discovery[vertex] = clock;
    low[vertex] = clock;
    clock += 1;
    let children = 0;
    for (const neighbor of graph.neighbors(vertex)) {
      if (neighbor === parent) {
        continue;
      }
      if (discovery[neighbor] !== -1) {
        low[vertex] = Math.min(low[vertex], discovery[neighbor]);
        continue;
      }
      children += 1;
      visit(neighbor, vertex);
      low[vertex] = Math.min(low[vertex], low[neighbor]);
      if (low[neighbor] > discovery[vertex]) {
        bridges.push(vertex < neighbor ? [vertex, neighbor] : [neighbor, vertex]);
      }
      if (parent !== -1 && low[neighbor] >= discovery[vertex]) {
        cut[vertex] = true;
      }
    }
    if (parent === -1 && children > 1) {
      cut[vertex] = true;
    }
  };

  for (const vertex of graph.listVertices()) {
    if (discovery[vertex] === -1) {
      visit(vertex, -1);
    }
  }

  bridges.sort((left, right) => left[0] - right[0] || left[1] - right[1]);
  return { bridges, articulation: graph.listVertices().filter((vertex) => cut[vertex]) };
}

export function findBridges(graph: GraphModel): Bridge[] {
  return lowLink(graph).bridges;
}

export function articulationPoints(graph: GraphModel): VertexId[] {
  return lowLink(graph).articulation;
}

/**
 * Number of 2-edge-connected components: the connected pieces left once
 * every bridge is removed. Isolated vertices count as their own component.
 */
export function twoEdgeConnectedComponentCount(graph: GraphModel): number {
  const removed = new Set(findBridges(graph).map(([left, right]) => `${left}-${right}`));
  const seen = new Array<boolean>(graph.vertexCount).fill(false);
  let count = 0;
  for (const root of graph.listVertices()) {
    if (seen[root]) {
      continue;
    }
    count += 1;
    seen[root] = true;
    const stack: VertexId[] = [root];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) {
        break;
      }
      for (const neighbor of graph.neighbors(current)) {
        const key = current < neighbor ? `${current}-${neighbor}` : `${neighbor}-${current}`;
        if (!seen[neighbor] && !removed.has(key)) {
          seen[neighbor] = true;
          stack.push(neighbor);
        }
      }
    }
  }
  return count;
}
