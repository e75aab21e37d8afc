import {
  articulationPoints,
  chromaticColoring,
  commonNeighbors,
  connectedComponents,
  countSimpleCycles,
  countTriangles,
  degeneracy,
  findBridges,
  girth,
  graphDiameter,
  hasEulerianCircuit,
  hasEulerianPath,
  hasHamiltonianCircuit,
  hasHamiltonianPath,
  isBipartite,
  isConnected,
  isReachable,
  maximumClique,
  maximumIndependentSet,
  maximumMatchingSize,
  minimumVertexCoverSize,
  spanningTreeCount,
  twoEdgeConnectedComponentCount,
} from "../../graph-kit/src/index.js";
import { SolverInfeasible } from "../errors.js";
import {
  booleanAnswer,
  coloringAnswer,
  requirePair,
  safeCount,
  scalarAnswer,
  type Solver,
  vertexSetAnswer,
} from "./answers.js";

export const solveConnectivity: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  return booleanAnswer(isReachable(graph, source, target));
};

export const solveBipartite: Solver = (graph) => booleanAnswer(isBipartite(graph));

export const solveMinimumCycle: Solver = (graph) => scalarAnswer(girth(graph));

export const solveMaximumClique: Solver = (graph) => scalarAnswer(maximumClique(graph).length);

export const solveMaximumIndependentSet: Solver = (graph) => scalarAnswer(maximumIndependentSet(graph).length);

export const solveMinimumVertexCover: Solver = (graph) => scalarAnswer(minimumVertexCoverSize(graph));

export const solveEulerianPath: Solver = (graph) => booleanAnswer(hasEulerianPath(graph));

export const solveEulerianCircuit: Solver = (graph) => booleanAnswer(hasEulerianCircuit(graph));

export const solveHamiltonianPath: Solver = (graph) => booleanAnswer(hasHamiltonianPath(graph));

export const solveHamiltonianCircuit: Solver = (graph) => booleanAnswer(hasHamiltonianCircuit(graph));

export const solveBiconnectedComponents: Solver = (graph) => scalarAnswer(twoEdgeConnectedComponentCount(graph));

export const solveBridgeCount: Solver = (graph) => scalarAnswer(findBridges(graph).length);

export const solveArticulationPoints: Solver = (graph) => vertexSetAnswer(articulationPoints(graph));

export const solveTriangleCount: Solver = (graph) => scalarAnswer(countTriangles(graph));

export const solveCycleCount: Solver = (graph) => scalarAnswer(countSimpleCycles(graph));

export const solveSpanningTreeCount: Solver = (graph) => {
  if (!isConnected(graph)) {
    throw new SolverInfeasible("Spanning trees exist only on connected graphs");
  }
  return scalarAnswer(safeCount(spanningTreeCount(graph)));
};

export const solveConnectedComponents: Solver = (graph) => scalarAnswer(connectedComponents(graph).length);

export const solveGraphDiameter: Solver = (graph) => {
  if (!isConnected(graph)) {
    throw new SolverInfeasible("Diameter requires a connected graph");
  }
  return scalarAnswer(graphDiameter(graph));
};

export const solveCommonNeighbors: Solver = (graph, params) => {
  const { source, target } = requirePair(graph, params);
  return scalarAnswer(commonNeighbors(graph, source, target).length);
};

export const solveDegeneracy: Solver = (graph) => scalarAnswer(degeneracy(graph));

export const solveMaximumMatching: Solver = (graph) => scalarAnswer(maximumMatchingSize(graph));

export const solveChromaticNumber: Solver = (graph) => scalarAnswer(chromaticColoring(graph).chromaticNumber);

/** Backtracking in vertex order with smallest colours first; colours relabelled by first use. */
export const solveGraphColoring: Solver = (graph) => coloringAnswer(chromaticColoring(graph).colors);
