import {
  isTree,
  lowestCommonAncestor,
  treeCentroids,
  treeDiameter,
  treeMaximumIndependentSet,
  type GraphModel,
} from "../../graph-kit/src/index.js";
import { SolverInfeasible } from "../errors.js";
import { requirePair, scalarAnswer, type Solver } from "./answers.js";

/** Tree queries root the tree at vertex 0. */
export const TREE_ROOT = 0;

function requireTree(graph: GraphModel): void {
  if (!isTree(graph)) {
    throw new SolverInfeasible("Tree family received a graph that is not a tree");
  }
}

export const solveTreeDiameter: Solver = (graph) => {
  requireTree(graph);
  return scalarAnswer(treeDiameter(graph));
};

/** The smallest-id centroid when the tree has two. */
export const solveTreeCentroid: Solver = (graph) => {
  requireTree(graph);
  return scalarAnswer(treeCentroids(graph)[0]);
};

export const solveTreeLca: Solver = (graph, params) => {
  requireTree(graph);
  const { source, target } = requirePair(graph, params);
  return scalarAnswer(lowestCommonAncestor(graph, source, target, TREE_ROOT));
};

export const solveTreeMaxIndependentSet: Solver = (graph) => {
  requireTree(graph);
  return scalarAnswer(treeMaximumIndependentSet(graph));
};
