import { GraphModel } from "../model.js";

export const MAX_HAMILTON_VERTICES = 20;

/**
 * `ends[mask]` holds, as a bitset, every vertex at which a simple path
 * visiting exactly the vertices of `mask` can end. Paths may start anywhere
 * unless `start` pins them.
 */
function pathEnds(graph: GraphModel, start?: number): Uint32Array {
  const n = graph.vertexCount;
  if (n > MAX_HAMILTON_VERTICES) {
    throw new Error(`Hamiltonian search supports at most ${MAX_HAMILTON_VERTICES} vertices`);
  }
  const adjacency = graph
    .listVertices()
    .map((vertex) => graph.neighbors(vertex).reduce((mask, other) => mask | (1 << other), 0));
  const ends = new Uint32Array(1 << n);
  for (const vertex of graph.listVertices()) {
    if (start === undefined || start === vertex) {
      ends[1 << vertex] = 1 << vertex;
    }
  }
  for (let mask = 1; mask < 1 << n; mask += 1) {
    let frontier = ends[mask];
    while (frontier !== 0) {
      const bit = frontier & -frontier;
      const last = 31 - Math.clz32(bit);
      let next = adjacency[last] & ~mask;
      while (next !== 0) {
        const step = next & -next;
        ends[mask | step] |= step;
        next &= ~step;
      }
      frontier &= ~bit;
    }
  }
  return ends;
}

export function hasHamiltonianPath(graph: GraphModel): boolean {
  if (graph.vertexCount === 0) {
    return false;
  }
  const full = (1 << graph.vertexCount) - 1;
  return pathEnds(graph)[full] !== 0;
}

/** Needs at least three vertices: a simple graph has no shorter cycle. */
export function hasHamiltonianCircuit(graph: GraphModel): boolean {
  const n = graph.vertexCount;
  if (n < 3) {
    return false;
  }
  const full = (1 << n) - 1;
  const ends = pathEnds(graph, 0);
  const closing = graph.neighbors(0).reduce((mask, other) => mask | (1 << other), 0);
  return (ends[full] & closing) !== 0;
}
