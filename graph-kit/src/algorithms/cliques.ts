import { GraphModel, VertexId } from "../model.js";

/** Largest vertex count supported by the subset dynamic programmes. */
export const MAX_BITMASK_VERTICES = 24;

function adjacencySets(graph: GraphModel, complement = false): Set<VertexId>[] {
  return graph.listVertices().map((vertex) => {
    const neighbours = new Set(graph.neighbors(vertex));
    if (!complement) {
      return neighbours;
    }
    return new Set(graph.listVertices().filter((other) => other !== vertex && !neighbours.has(other)));
  });
}

/**
 * Bron–Kerbosch with Tomita pivoting. Among cliques of maximum size the one
 * found first is returned, sorted ascending.
 */
function largestClique(adjacency: readonly Set<VertexId>[]): VertexId[] {
  let best: VertexId[] = [];

  const expand = (clique: VertexId[], candidates: VertexId[], excluded: VertexId[]): void => {
    if (candidates.length === 0 && excluded.length === 0) {
      if (clique.length > best.length) {
        best = [...clique];
      }
      return;
    }
    if (clique.length + candidates.length <= best.length) {
      return;
    }
    const pool = [...candidates, ...excluded];
    let pivot = pool[0];
    for (const vertex of pool) {
      if (countIn(adjacency[vertex], candidates) > countIn(adjacency[pivot], candidates)) {
        pivot = vertex;
      }
    }
    let remaining = [...candidates];
    let done = [...excluded];
    for (const vertex of candidates.filter((candidate) => !adjacency[pivot].has(candidate))) {
      const neighbours = adjacency[vertex];
      expand(
        [...clique, vertex],
        remaining.filter((other) => neighbours.has(other)),
        done.filter((other) => neighbours.has(other)),
      );
      remaining = remaining.filter((other) => other !== vertex);
      done = [...done, vertex];
    }
  };

  expand([], adjacency.map((_, index) => index), []);
  return best.sort((left, right) => left - right);
}

function countIn(set: Set<VertexId>, values: readonly VertexId[]): number {
  return values.reduce((total, value) => (set.has(value) ? total + 1 : total), 0);
}

export function maximumClique(graph: GraphModel): VertexId[] {
  if (graph.directed) {
    throw new Error("Cliques are defined on undirected graphs");
  }
  return largestClique(adjacencySets(graph));
}

/** A maximum independent set, found as a maximum clique of the complement. */
export function maximumIndependentSet(graph: GraphModel): VertexId[] {
  if (graph.directed) {
    throw new Error("Independent sets are defined on undirected graphs");
  }
  return largestClique(adjacencySets(graph, true));
}

/** Size of a minimum vertex cover, `n - α(G)` by Gallai's identity. */
export function minimumVertexCoverSize(graph: GraphModel): number {
  return graph.vertexCount - maximumIndependentSet(graph).length;
}

export function countTriangles(graph: GraphModel): number {
  let total = 0;
  for (const edge of graph.listEdges()) {
    const low = Math.min(edge.source, edge.target);
    const high = Math.max(edge.source, edge.target);
    for (const third of graph.neighbors(high)) {
      if (third > high && graph.hasEdge(low, third)) {
        total += 1;
      }
    }
  }
  return total;
}

/**
 * Size of a maximum matching in a general undirected graph by dynamic
 * programming over vertex subsets: the lowest vertex of a subset is either
 * left unmatched or paired with one of its neighbours in the subset.
 */
export function maximumMatchingSize(graph: GraphModel): number {
  if (graph.directed) {
    throw new Error("Matchings are computed on undirected graphs");
  }
  const n = graph.vertexCount;
  if (n > MAX_BITMASK_VERTICES) {
    throw new Error(`Maximum matching supports at most ${MAX_BITMASK_VERTICES} vertices`);
  }
  const neighbourMask = graph
    .listVertices()
    .map((vertex) => graph.neighbors(vertex).reduce((mask, other) => mask | (1 << other), 0));
  const memo = new Int8Array(1 << n).fill(-1);

  const best = (mask: number): number => {
    if (mask === 0) {
      return 0;
    }
    const cached = memo[mask];
    if (cached >= 0) {
      return cached;
    }
    const lowest = 31 - Math.clz32(mask & -mask);
    const rest = mask & ~(1 << lowest);
    let result = best(rest);
    let partners = neighbourMask[lowest] & rest;
    while (partners !== 0) {
      const bit = partners & -partners;
      result = Math.max(result, 1 + best(rest & ~bit));
      partners &= ~bit;
    }
    memo[mask] = result;
    return result;
  };

  return best((1 << n) - 1);
}
