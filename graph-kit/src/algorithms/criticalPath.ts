import { GraphModel, VertexId } from "../model.js";
import { MinHeap } from "./dijkstra.js";

export interface CriticalPathResult {
  readonly length: number;
  readonly path: VertexId[];
  readonly topologicalOrder: VertexId[];
}

/**
 * Kahn's algorithm releasing the smallest available vertex first, which makes
 * the order the lexicographically smallest one. Returns `null` on a cycle.
 */
export function topologicalOrder(graph: GraphModel): VertexId[] | null {
  if (!graph.directed) {
    throw new Error("Topological ordering requires a directed graph");
  }
  const indegree = graph.listVertices().map((vertex) => graph.getIncoming(vertex).length);
  const ready = new MinHeap();
  for (const vertex of graph.listVertices()) {
    if (indegree[vertex] === 0) {
      ready.enqueue({ node: vertex, priority: vertex });
    }
  }

  const order: VertexId[] = [];
  while (!ready.isEmpty()) {
    const current = ready.dequeue();
    if (!current) {
      break;
    }
    order.push(current.node);
    for (const arc of graph.getOutgoing(current.node)) {
      indegree[arc.to] -= 1;
      if (indegree[arc.to] === 0) {
        ready.enqueue({ node: arc.to, priority: arc.to });
      }
    }
  }
  return order.length === graph.vertexCount ? order : null;
}

/** True when `order` lists every vertex once and every edge points forward. */
export function isTopologicalOrder(graph: GraphModel, order: readonly VertexId[]): boolean {
  if (order.length !== graph.vertexCount) {
    return false;
  }
  const position = new Map<VertexId, number>();
  order.forEach((vertex, index) => position.set(vertex, index));
  if (position.size !== graph.vertexCount || graph.listVertices().some((vertex) => !position.has(vertex))) {
    return false;
  }
  return graph
    .listEdges()
    .every((edge) => (position.get(edge.source) ?? Number.POSITIVE_INFINITY) < (position.get(edge.target) ?? -1));
}

/**
 * Heaviest path of a DAG (edge weights, or 1 per edge when unweighted). Ties
 * resolve to the lexicographically smallest vertex sequence.
 */
export function criticalPath(graph: GraphModel): CriticalPathResult {
  const topo = topologicalOrder(graph);
  if (!topo) {
    throw new Error("Critical path analysis requires a DAG; detected at least one cycle");
  }
  if (graph.vertexCount === 0) {
    return { length: 0, path: [], topologicalOrder: [] };
  }

  // best[v]: heaviest path weight starting at v.
  const best = new Array<number>(graph.vertexCount).fill(0);
  for (let index = topo.length - 1; index >= 0; index -= 1) {
    const vertex = topo[index];
    for (const arc of graph.getOutgoing(vertex)) {
      best[vertex] = Math.max(best[vertex], graph.weightOf(arc.edge) + best[arc.to]);
    }
  }

  const length = Math.max(...best);
  let current = best.indexOf(length);
  const path: VertexId[] = [current];
  while (best[current] > 0) {
    const remaining = best[current];
    const next = graph.getOutgoing(current).find((arc) => graph.weightOf(arc.edge) + best[arc.to] === remaining);
    if (!next) {
      throw new Error(`Critical path reconstruction stalled at vertex ${current}`);
    }
    path.push(next.to);
    current = next.to;
  }

  return { length, path, topologicalOrder: topo };
}
