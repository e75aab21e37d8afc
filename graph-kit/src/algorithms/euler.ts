import { GraphModel, VertexId } from "../model.js";

function oddDegreeCount(graph: GraphModel): number {
  return graph.listVertices().filter((vertex) => graph.degree(vertex) % 2 === 1).length;
}

/** True when every vertex carrying an edge sits in one connected component. */
function edgesConnected(graph: GraphModel): boolean {
  const carriers = graph.listVertices().filter((vertex) => graph.degree(vertex) > 0);
  if (carriers.length === 0) {
    return true;
  }
  const seen = new Set<VertexId>([carriers[0]]);
  const stack: VertexId[] = [carriers[0]];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    for (const neighbor of graph.neighbors(current)) {
      if (!seen.has(neighbor)) {
        seen.add(neighbor);
        stack.push(neighbor);
      }
    }
  }
  return carriers.every((vertex) => seen.has(vertex));
}

function assertUndirected(graph: GraphModel): void {
  if (graph.directed) {
    throw new Error("Eulerian checks are implemented for undirected graphs");
  }
}

/** An edgeless graph trivially has the empty trail. */
export function hasEulerianPath(graph: GraphModel): boolean {
  assertUndirected(graph);
  const odd = oddDegreeCount(graph);
  return (odd === 0 || odd === 2) && edgesConnected(graph);
}

export function hasEulerianCircuit(graph: GraphModel): boolean {
  assertUndirected(graph);
  return oddDegreeCount(graph) === 0 && edgesConnected(graph);
}
