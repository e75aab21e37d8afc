import { maxFlow, minCostMaxFlow } from "../../graph-kit/src/index.js";
import { requirePair, scalarAnswer, type Solver } from "./answers.js";

export const solveMaximumFlow: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  return scalarAnswer(maxFlow(graph, source, target).value);
};

/** Capacity of a minimum source/sink cut, equal to the maximum flow. */
export const solveMinimumCut: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  const result = maxFlow(graph, source, target);
  let capacity = 0;
  const sourceSide = new Set(result.sourceSide);
  for (const edge of graph.listEdges()) {
    const forward = sourceSide.has(edge.source) && !sourceSide.has(edge.target);
    const backward = !graph.directed && sourceSide.has(edge.target) && !sourceSide.has(edge.source);
    if (forward || backward) {
      capacity += graph.capacityOf(edge);
    }
  }
  return scalarAnswer(capacity);
};

/** Total cost of a maximum flow of minimum cost; edge weights are per-unit costs. */
export const solveMinCostMaxFlow: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  return scalarAnswer(minCostMaxFlow(graph, source, target).cost);
};
