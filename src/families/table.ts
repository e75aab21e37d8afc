import { isAncestor, maxFlow, shortestPath, type GraphModel } from "../../graph-kit/src/index.js";
import * as flow from "../solver/flow.js";
import * as paths from "../solver/paths.js";
import * as structure from "../solver/structure.js";
import * as trees from "../solver/trees.js";
import {
  FAMILY_IDS,
  type ComparatorSpec,
  type Density,
  type FamilyDefinition,
  type FamilyId,
  type FamilyShape,
  type FamilyTable,
  type QueryParams,
} from "./types.js";

const BOTH: readonly Density[] = ["sparse", "dense"];
const TREE: readonly Density[] = ["tree"];

const UNDIRECTED: FamilyShape = { directed: false, weighted: false, capacitated: false, structure: "any" };
const CONNECTED: FamilyShape = { ...UNDIRECTED, structure: "connected" };
const WEIGHTED_CONNECTED: FamilyShape = { ...CONNECTED, weighted: true };
const TREE_SHAPE: FamilyShape = { ...UNDIRECTED, structure: "tree" };
const NETWORK: FamilyShape = { ...CONNECTED, capacitated: true };
const DIRECTED: FamilyShape = { directed: true, weighted: false, capacitated: false, structure: "any" };
const DAG: FamilyShape = { ...DIRECTED, structure: "dag" };

const EXACT: ComparatorSpec = { kind: "exact" };
const INTEGER: ComparatorSpec = { kind: "numeric-tolerance", tolerance: 0 };

const TREE_ROOT_NOTE = (label: (vertex: number) => string): string =>
  `Treat the tree as rooted at vertex ${label(trees.TREE_ROOT)}.`;

const UNDIRECTED_NETWORK_NOTE =
  "In this undirected network, flow can travel in either direction along each edge, up to the edge's capacity.";

function pairOf(params: QueryParams): { source: number; target: number } {
  return { source: params.source ?? -1, target: params.target ?? -1 };
}

/** No optimal route may be a single edge, tied or not. */
function trivialShortestPath(graph: GraphModel, params: QueryParams): string | null {
  const { source, target } = pairOf(params);
  const { path, distance } = shortestPath(graph, source, target);
  if (path.length < 3) {
    return `shortest path ${source} -> ${target} is a single edge`;
  }
  const direct = graph.getEdge(source, target);
  if (direct && graph.weightOf(direct) === distance) {
    return `edge ${source} -> ${target} ties the shortest distance ${distance}`;
  }
  return null;
}

/** Positive flow between non-adjacent terminals. */
function trivialFlow(graph: GraphModel, params: QueryParams): string | null {
  const { source, target } = pairOf(params);
  if (graph.hasEdge(source, target) || graph.hasEdge(target, source)) {
    return `source ${source} and sink ${target} are adjacent`;
  }
  return maxFlow(graph, source, target).value > 0 ? null : "maximum flow is zero";
}

function edgeless(graph: GraphModel): string | null {
  return graph.edgeCount === 0 ? "graph has no edges" : null;
}

function defineFamily<K extends FamilyId>(definition: FamilyDefinition & { readonly id: K }): FamilyDefinition & { readonly id: K } {
  return Object.freeze(definition);
}

/**
 * Family dispatch table. The mapped type makes a missing or misspelt family a
 * compile error.
 */
export const FAMILY_TABLE: FamilyTable = {
  connectivity: defineFamily({
    id: "connectivity",
    title: "Connectivity",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "pair",
    answer: "boolean",
    comparator: EXACT,
    question: (params, label) =>
      `Determine whether vertex ${label(params.source ?? 0)} and vertex ${label(params.target ?? 0)} are connected by a path. Answer yes or no.`,
    solve: structure.solveConnectivity,
  }),
  bipartite: defineFamily({
    id: "bipartite",
    title: "Bipartite",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () =>
      "Determine whether the graph is bipartite, i.e. its vertices can be split into two sets with no edge inside either set. Answer yes or no.",
    solve: structure.solveBipartite,
  }),
  "minimum-cycle": defineFamily({
    id: "minimum-cycle",
    title: "Minimum Cycle",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Find the length (number of edges) of the shortest cycle in the graph. Answer -1 if the graph has no cycle.",
    solve: structure.solveMinimumCycle,
  }),
  "maximum-clique": defineFamily({
    id: "maximum-clique",
    title: "Maximum Clique",
    shape: CONNECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the size of the maximum clique in the graph. A clique is a set of vertices in which every two distinct vertices are adjacent.",
    solve: structure.solveMaximumClique,
  }),
  "maximum-independent-set": defineFamily({
    id: "maximum-independent-set",
    title: "Maximum Independent Set",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the size of the maximum independent set in the graph. An independent set is a set of vertices no two of which are adjacent.",
    solve: structure.solveMaximumIndependentSet,
  }),
  "minimum-vertex-cover": defineFamily({
    id: "minimum-vertex-cover",
    title: "Minimum Vertex Cover",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the size of the minimum vertex cover of the graph. A vertex cover is a set of vertices touching every edge.",
    solve: structure.solveMinimumVertexCover,
  }),
  "eulerian-path": defineFamily({
    id: "eulerian-path",
    title: "Eulerian Path",
    shape: CONNECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () =>
      "Determine whether the graph has an Eulerian path, a walk that uses every edge exactly once. Answer yes or no.",
    solve: structure.solveEulerianPath,
  }),
  "eulerian-circuit": defineFamily({
    id: "eulerian-circuit",
    title: "Eulerian Circuit",
    shape: CONNECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () =>
      "Determine whether the graph has an Eulerian circuit, a closed walk that uses every edge exactly once. Answer yes or no.",
    solve: structure.solveEulerianCircuit,
  }),
  "hamiltonian-path": defineFamily({
    id: "hamiltonian-path",
    title: "Hamiltonian Path",
    shape: CONNECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () =>
      "Determine whether the graph has a Hamiltonian path, a path that visits every vertex exactly once. Answer yes or no.",
    solve: structure.solveHamiltonianPath,
  }),
  "hamiltonian-circuit": defineFamily({
    id: "hamiltonian-circuit",
    title: "Hamiltonian Circuit",
    shape: CONNECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () =>
      "Determine whether the graph has a Hamiltonian circuit, a cycle that visits every vertex exactly once and returns to its start. Answer yes or no.",
    solve: structure.solveHamiltonianCircuit,
  }),
  "biconnected-components": defineFamily({
    id: "biconnected-components",
    title: "Biconnected Components",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Count the 2-edge-connected components of the graph: the pieces that remain after deleting every bridge. An isolated vertex counts as its own component.",
    solve: structure.solveBiconnectedComponents,
  }),
  "bridge-count": defineFamily({
    id: "bridge-count",
    title: "Bridge Count",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Count the bridges of the graph. A bridge is an edge whose removal increases the number of connected components.",
    solve: structure.solveBridgeCount,
  }),
  "articulation-points": defineFamily({
    id: "articulation-points",
    title: "Articulation Points",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "vertex-set",
    comparator: { kind: "unordered-set" },
    question: () =>
      "List every articulation point of the graph, i.e. every vertex whose removal increases the number of connected components. Give the vertices as a bracketed list, or [] if there are none.",
    solve: structure.solveArticulationPoints,
  }),
  "triangle-count": defineFamily({
    id: "triangle-count",
    title: "Triangle Count",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Count the triangles (cycles of length 3) in the graph.",
    solve: structure.solveTriangleCount,
  }),
  "cycle-count": defineFamily({
    id: "cycle-count",
    title: "Cycle Count",
    shape: UNDIRECTED,
    defaults: { vertices: 7, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Count the simple cycles in the graph. A simple cycle has at least three vertices and repeats none; a cycle and its reversal count once.",
    solve: structure.solveCycleCount,
  }),
  "spanning-tree-count": defineFamily({
    id: "spanning-tree-count",
    title: "Spanning Tree Count",
    shape: CONNECTED,
    defaults: { vertices: 7, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Count the spanning trees of the graph. A spanning tree is a tree that contains every vertex and only edges of the graph.",
    solve: structure.solveSpanningTreeCount,
  }),
  "connected-components": defineFamily({
    id: "connected-components",
    title: "Connected Components",
    shape: UNDIRECTED,
    defaults: { vertices: 16, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Count the connected components of the graph. An isolated vertex is a component on its own.",
    solve: structure.solveConnectedComponents,
  }),
  "graph-diameter": defineFamily({
    id: "graph-diameter",
    title: "Graph Diameter",
    shape: CONNECTED,
    defaults: { vertices: 15, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the diameter of the graph: the largest number of edges on a shortest path between any two vertices.",
    solve: structure.solveGraphDiameter,
  }),
  "common-neighbors": defineFamily({
    id: "common-neighbors",
    title: "Common Neighbors",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "pair",
    answer: "scalar",
    comparator: INTEGER,
    question: (params, label) =>
      `Count the vertices adjacent to both vertex ${label(params.source ?? 0)} and vertex ${label(params.target ?? 0)}.`,
    solve: structure.solveCommonNeighbors,
  }),
  degeneracy: defineFamily({
    id: "degeneracy",
    title: "Degeneracy",
    shape: UNDIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the degeneracy of the graph: the largest k such that the graph has a non-empty subgraph in which every vertex has degree at least k.",
    solve: structure.solveDegeneracy,
  }),
  "maximum-matching": defineFamily({
    id: "maximum-matching",
    title: "Maximum Matching",
    shape: UNDIRECTED,
    defaults: { vertices: 14, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Find the size of a maximum matching, the largest set of edges sharing no vertex.",
    solve: structure.solveMaximumMatching,
  }),
  "chromatic-number": defineFamily({
    id: "chromatic-number",
    title: "Chromatic Number",
    shape: UNDIRECTED,
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the chromatic number of the graph: the fewest colours needed so that adjacent vertices never share a colour.",
    solve: structure.solveChromaticNumber,
  }),
  "graph-coloring": defineFamily({
    id: "graph-coloring",
    title: "Graph Coloring",
    shape: UNDIRECTED,
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "none",
    answer: "coloring",
    comparator: { kind: "proper-coloring" },
    question: () =>
      "Colour the vertices with as few colours as possible so that adjacent vertices get different colours. Number the colours 0, 1, 2, ... and give one 'vertex: colour' pair per vertex.",
    solve: structure.solveGraphColoring,
  }),
  "shortest-path": defineFamily({
    id: "shortest-path",
    title: "Shortest Path",
    shape: WEIGHTED_CONNECTED,
    defaults: { vertices: 15, densities: BOTH },
    endpoints: "pair",
    answer: "path",
    comparator: { kind: "path-cost", anchored: true },
    question: (params, label) =>
      `Find a shortest path from vertex ${label(params.source ?? 0)} to vertex ${label(params.target ?? 0)}. Give the path as a sequence of vertices joined by '->' and state its total weight.`,
    solve: paths.solveShortestPath,
    degenerate: trivialShortestPath,
  }),
  "shortest-path-length": defineFamily({
    id: "shortest-path-length",
    title: "Shortest Path Length",
    shape: WEIGHTED_CONNECTED,
    defaults: { vertices: 15, densities: BOTH },
    endpoints: "pair",
    answer: "scalar",
    comparator: INTEGER,
    question: (params, label) =>
      `Find the total weight of a shortest path from vertex ${label(params.source ?? 0)} to vertex ${label(params.target ?? 0)}.`,
    solve: paths.solveShortestPathLength,
    degenerate: trivialShortestPath,
  }),
  "minimum-spanning-tree": defineFamily({
    id: "minimum-spanning-tree",
    title: "Minimum Spanning Tree",
    shape: WEIGHTED_CONNECTED,
    defaults: { vertices: 15, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Find the total weight of a minimum spanning tree of the graph.",
    solve: paths.solveMinimumSpanningTree,
  }),
  "second-mst": defineFamily({
    id: "second-mst",
    title: "Second MST",
    shape: WEIGHTED_CONNECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the total weight of the strict second minimum spanning tree: the lightest spanning tree whose weight is strictly greater than the minimum spanning tree weight. Answer -1 if no such tree exists.",
    solve: paths.solveSecondMst,
  }),
  "tree-diameter": defineFamily({
    id: "tree-diameter",
    title: "Tree Diameter",
    shape: TREE_SHAPE,
    defaults: { vertices: 30, densities: TREE },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () => "Find the diameter of the tree: the number of edges on the longest path between two vertices.",
    solve: trees.solveTreeDiameter,
  }),
  "tree-centroid": defineFamily({
    id: "tree-centroid",
    title: "Tree Centroid",
    shape: TREE_SHAPE,
    defaults: { vertices: 30, densities: TREE },
    endpoints: "none",
    answer: "scalar",
    comparator: EXACT,
    question: () =>
      "Find the centroid of the tree, a vertex whose removal leaves components of at most n/2 vertices each. If there are two, give the one with the smaller index.",
    solve: trees.solveTreeCentroid,
  }),
  "tree-lca": defineFamily({
    id: "tree-lca",
    title: "Tree LCA",
    shape: TREE_SHAPE,
    defaults: { vertices: 30, densities: TREE },
    endpoints: "pair",
    answer: "scalar",
    comparator: EXACT,
    question: (params, label) =>
      `${TREE_ROOT_NOTE(label)} Find the lowest common ancestor of vertex ${label(params.source ?? 0)} and vertex ${label(params.target ?? 0)}.`,
    solve: trees.solveTreeLca,
    degenerate: (graph, params) => {
      const { source, target } = pairOf(params);
      if (isAncestor(graph, source, target, trees.TREE_ROOT) || isAncestor(graph, target, source, trees.TREE_ROOT)) {
        return `vertices ${source} and ${target} lie on one root path`;
      }
      return null;
    },
  }),
  "tree-max-independent-set": defineFamily({
    id: "tree-max-independent-set",
    title: "Tree Max Independent Set",
    shape: TREE_SHAPE,
    defaults: { vertices: 30, densities: TREE },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Find the size of the maximum independent set of the tree, the largest set of vertices no two of which are adjacent.",
    solve: trees.solveTreeMaxIndependentSet,
  }),
  "maximum-flow": defineFamily({
    id: "maximum-flow",
    title: "Maximum Flow",
    shape: NETWORK,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "source-sink",
    answer: "scalar",
    comparator: INTEGER,
    question: (params, label) =>
      `Find the maximum flow from vertex ${label(params.source ?? 0)} (source) to vertex ${label(params.target ?? 0)} (sink). ${UNDIRECTED_NETWORK_NOTE}`,
    solve: flow.solveMaximumFlow,
    degenerate: trivialFlow,
  }),
  "minimum-cut": defineFamily({
    id: "minimum-cut",
    title: "Minimum Cut",
    shape: NETWORK,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "source-sink",
    answer: "scalar",
    comparator: INTEGER,
    question: (params, label) =>
      `Find the capacity of a minimum cut separating vertex ${label(params.source ?? 0)} (source) from vertex ${label(params.target ?? 0)} (sink). ${UNDIRECTED_NETWORK_NOTE}`,
    solve: flow.solveMinimumCut,
    degenerate: trivialFlow,
  }),
  "min-cost-max-flow": defineFamily({
    id: "min-cost-max-flow",
    title: "Min Cost Max Flow",
    shape: { ...NETWORK, weighted: true },
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "source-sink",
    answer: "scalar",
    comparator: INTEGER,
    question: (params, label) =>
      `Send the maximum possible flow from vertex ${label(params.source ?? 0)} (source) to vertex ${label(params.target ?? 0)} (sink) at minimum total cost, where each edge's weight is its cost per unit of flow. ${UNDIRECTED_NETWORK_NOTE} Give the total cost.`,
    solve: flow.solveMinCostMaxFlow,
    degenerate: trivialFlow,
  }),
  "cycle-detection": defineFamily({
    id: "cycle-detection",
    title: "Cycle Detection",
    shape: DIRECTED,
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "none",
    answer: "boolean",
    comparator: EXACT,
    question: () => "Determine whether the directed graph contains a directed cycle. Answer yes or no.",
    solve: paths.solveCycleDetection,
  }),
  "strongly-connected-components": defineFamily({
    id: "strongly-connected-components",
    title: "Strongly Connected Components",
    shape: DIRECTED,
    defaults: { vertices: 12, densities: BOTH },
    endpoints: "none",
    answer: "scalar",
    comparator: INTEGER,
    question: () =>
      "Count the strongly connected components of the directed graph. A single vertex that lies on no cycle is a component on its own.",
    solve: paths.solveStronglyConnectedComponents,
  }),
  "topological-sort": defineFamily({
    id: "topological-sort",
    title: "Topological Sort",
    shape: DAG,
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "none",
    answer: "sequence",
    comparator: { kind: "topological-order" },
    question: () =>
      "Give a topological order of the directed acyclic graph: every vertex exactly once, each edge pointing from an earlier to a later vertex. Separate vertices with '->'.",
    solve: paths.solveTopologicalSort,
    degenerate: edgeless,
  }),
  "longest-path-dag": defineFamily({
    id: "longest-path-dag",
    title: "Longest Path in a DAG",
    shape: { ...DAG, weighted: true },
    defaults: { vertices: 10, densities: BOTH },
    endpoints: "none",
    answer: "path",
    comparator: { kind: "path-cost", anchored: false },
    question: () =>
      "Find a path of maximum total weight in the directed acyclic graph. Give the path as vertices joined by '->' and state its total weight.",
    solve: paths.solveLongestPathDag,
    degenerate: edgeless,
  }),
};

export function getFamily(id: FamilyId): FamilyDefinition {
  return FAMILY_TABLE[id];
}

export function isFamilyId(value: string): value is FamilyId {
  return FAMILY_IDS.some((id) => id === value);
}

export { FAMILY_IDS };
