import type { GraphModel } from "../../graph-kit/src/index.js";
import { GraphBenchError, SolverInfeasible } from "../errors.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { CanonicalAnswer, FamilyId, QueryParams } from "../families/types.js";

/**
 * Computes the ground truth of `family` on `graph`. Any failure of the
 * underlying algorithm surfaces as {@link SolverInfeasible} so the instance
 * builder can reject the draw.
 */
export function solve(family: FamilyId, graph: GraphModel, params: QueryParams = {}): CanonicalAnswer {
  const definition = FAMILY_TABLE[family];
  const { shape } = definition;
  if (graph.directed !== shape.directed) {
    throw new SolverInfeasible(`${family} expects ${shape.directed ? "a directed" : "an undirected"} graph`);
  }
  if (shape.weighted && !graph.weighted) {
    throw new SolverInfeasible(`${family} expects a weighted graph`);
  }
  if (shape.capacitated && !graph.capacitated) {
    throw new SolverInfeasible(`${family} expects edge capacities`);
  }
  try {
    return definition.solve(graph, params);
  } catch (error) {
    if (error instanceof GraphBenchError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SolverInfeasible(`${family} solver failed: ${message}`, { cause: error });
  }
}

export { TREE_ROOT } from "./trees.js";
