import {
  criticalPath,
  detectCycles,
  isConnected,
  minimumSpanningTree,
  secondMinimumSpanningTreeWeight,
  shortestPath,
  tarjanScc,
  topologicalOrder,
} from "../../graph-kit/src/index.js";
import { SolverInfeasible } from "../errors.js";
import { booleanAnswer, pathAnswer, requirePair, scalarAnswer, sequenceAnswer, type Solver } from "./answers.js";

/** Dijkstra; among optimal paths the lexicographically smallest vertex sequence wins. */
export const solveShortestPath: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  const result = shortestPath(graph, source, target);
  if (!Number.isFinite(result.distance)) {
    throw new SolverInfeasible(`Vertex ${target} is unreachable from ${source}`);
  }
  return pathAnswer(result.path, result.distance);
};

export const solveShortestPathLength: Solver = (graph, params) => {
  const answer = solveShortestPath(graph, params);
  if (answer.kind !== "path" || answer.cost === null) {
    throw new SolverInfeasible("Shortest path solver returned no cost");
  }
  return scalarAnswer(answer.cost);
};

export const solveMinimumSpanningTree: Solver = (graph) => {
  if (!isConnected(graph)) {
    throw new SolverInfeasible("Minimum spanning tree requires a connected graph");
  }
  return scalarAnswer(minimumSpanningTree(graph).weight);
};

/** Strictly heavier than the minimum; `-1` when every spanning tree ties. */
export const solveSecondMst: Solver = (graph) => {
  if (!isConnected(graph)) {
    throw new SolverInfeasible("Second minimum spanning tree requires a connected graph");
  }
  return scalarAnswer(secondMinimumSpanningTreeWeight(graph) ?? -1);
};

export const solveCycleDetection: Solver = (graph) => booleanAnswer(detectCycles(graph, 1).hasCycle);

export const solveStronglyConnectedComponents: Solver = (graph) => scalarAnswer(tarjanScc(graph).length);

/** Kahn's algorithm releasing the smallest ready vertex first. */
export const solveTopologicalSort: Solver = (graph) => {
  const order = topologicalOrder(graph);
  if (!order) {
    throw new SolverInfeasible("Graph has a cycle; no topological order exists");
  }
  return sequenceAnswer(order);
};

export const solveLongestPathDag: Solver = (graph) => {
  if (!topologicalOrder(graph)) {
    throw new SolverInfeasible("Longest path is only defined here on acyclic graphs");
  }
  const result = criticalPath(graph);
  return pathAnswer(result.path, result.length);
};
