import { GraphModel, VertexId } from "../model.js";

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  readonly cycles: VertexId[][];
}

/**
 * Detects directed cycles using depth-first search. At most `limit` witness
 * cycles are collected; each one repeats its first vertex at the end.
 */
export function detectCycles(graph: GraphModel, limit = 20): CycleDetectionResult {
  if (!graph.directed) {
    throw new Error("detectCycles expects a directed graph");
  }
  const visiting = new Set<VertexId>();
  const visited = new Set<VertexId>();
  const stack: VertexId[] = [];
  const cycles: VertexId[][] = [];

  const visit = (vertex: VertexId): void => {
    visiting.add(vertex);
    stack.push(vertex);
    for (const arc of graph.getOutgoing(vertex)) {
      if (cycles.length >= limit) {
        break;
      }
      if (visiting.has(arc.to)) {
        const start = stack.indexOf(arc.to);
        cycles.push(stack.slice(start).concat(arc.to));
        continue;
      }
      if (!visited.has(arc.to)) {
        visit(arc.to);
      }
    }
    visiting.delete(vertex);
    visited.add(vertex);
    stack.pop();
  };

  for (const vertex of graph.listVertices()) {
    if (cycles.length >= limit) {
      break;
    }
    if (!visited.has(vertex)) {
      visit(vertex);
    }
  }

  return { hasCycle: cycles.length > 0, cycles };
}

/**
 * Number of simple cycles (at least three vertices) in an undirected graph.
 * Each cycle is enumerated once from its smallest vertex and deduplicated
 * against its reversal.
 */
export function countSimpleCycles(graph: GraphModel): number {
  if (graph.directed) {
    throw new Error("countSimpleCycles expects an undirected graph");
  }
  const seen = new Set<string>();
  const path: VertexId[] = [];
  const onPath = new Set<VertexId>();

  const canonical = (start: VertexId): string => {
    const forward = path.join(",");
    const backward = [start, ...path.slice(1).reverse()].join(",");
    return lexicographicMin(path, [start, ...path.slice(1).reverse()]) === "forward" ? forward : backward;
  };

  const extend = (vertex: VertexId, start: VertexId): void => {
    path.push(vertex);
    onPath.add(vertex);
    for (const neighbor of graph.neighbors(vertex)) {
      if (neighbor === start) {
        if (path.length >= 3) {
          seen.add(canonical(start));
        }
      } else if (neighbor > start && !onPath.has(neighbor)) {
        extend(neighbor, start);
      }
    }
    path.pop();
    onPath.delete(vertex);
  };

  for (const vertex of graph.listVertices()) {
    extend(vertex, vertex);
  }
  return seen.size;
}

/**
 * Length of the shortest cycle (girth) in an undirected graph, or -1 when the
 * graph is a forest.
 */
export function girth(graph: GraphModel): number {
  if (graph.directed) {
    throw new Error("girth expects an undirected graph");
  }
  let best = Number.POSITIVE_INFINITY;
  for (const root of graph.listVertices()) {
    const distance = new Array<number>(graph.vertexCount).fill(-1);
    const parent = new Array<VertexId>(graph.vertexCount).fill(-1);
    distance[root] = 0;
    const queue: VertexId[] = [root];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const neighbor of graph.neighbors(current)) {
        if (distance[neighbor] === -1) {
          distance[neighbor] = distance[current] + 1;
          parent[neighbor] = current;
          queue.push(neighbor);
        } else if (parent[current] !== neighbor) {
          best = Math.min(best, distance[current] + distance[neighbor] + 1);
        }
      }
    }
  }
  return Number.isFinite(best) ? best : -1;
}

function lexicographicMin(forward: readonly VertexId[], backward: readonly VertexId[]): "forward" | "backward" {
  for (let index = 0; index < forward.length; index += 1) {
    if (forward[index] !== backward[index]) {
      return forward[index] < backward[index] ? "forward" : "backward";
    }
  }
  return "forward";
}
