import { GraphModel } from "../model.js";

/**
 * Degeneracy (largest k with a non-empty k-core) by repeatedly peeling a
 * vertex of minimum remaining degree, smallest id first.
 */
export function degeneracy(graph: GraphModel): number {
  if (graph.directed) {
    throw new Error("Degeneracy is computed on undirected graphs");
  }
  const remaining = graph.listVertices().map((vertex) => graph.degree(vertex));
  const removed = new Array<boolean>(graph.vertexCount).fill(false);
  let result = 0;
  for (let step = 0; step < graph.vertexCount; step += 1) {
    let pick = -1;
    for (const vertex of graph.listVertices()) {
      if (!removed[vertex] && (pick === -1 || remaining[vertex] < remaining[pick])) {
        pick = vertex;
      }
    }
    result = Math.max(result, remaining[pick]);
    removed[pick] = true;
    for (const neighbor of graph.neighbors(pick)) {
      if (!removed[neighbor]) {
        remaining[neighbor] -= 1;
      }
    }
  }
  return result;
}
