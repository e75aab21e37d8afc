import { strict as assert } from "node:assert";

import { describe, it } from "mocha";

import {
  countTriangles,
  maximumClique,
  maximumIndependentSet,
  maximumMatchingSize,
  minimumVertexCoverSize,
} from "../../graph-kit/src/algorithms/cliques.js";
import {
  chromaticColoring,
  colorWith,
  isProperColoring,
  normaliseColoring,
} from "../../graph-kit/src/algorithms/coloring.js";
import { degeneracy } from "../../graph-kit/src/algorithms/cores.js";
import { hasEulerianCircuit, hasEulerianPath } from "../../graph-kit/src/algorithms/euler.js";
import { maxFlow, minCostMaxFlow } from "../../graph-kit/src/algorithms/flow.js";
import { hasHamiltonianCircuit, hasHamiltonianPath } from "../../graph-kit/src/algorithms/hamilton.js";
import {
  minimumSpanningTree,
  secondMinimumSpanningTreeWeight,
  spanningTreeCount,
  UnionFind,
} from "../../graph-kit/src/algorithms/spanning.js";
import {
  isAncestor,
  isTree,
  lowestCommonAncestor,
  treeCentroids,
  treeDiameter,
  treeMaximumIndependentSet,
} from "../../graph-kit/src/algorithms/trees.js";
import { GraphEdgeData, GraphModel } from "../../graph-kit/src/model.js";

type Pair = readonly [number, number];

function undirected(vertexCount: number, edges: readonly Pair[]): GraphModel {
  return new GraphModel(
    vertexCount,
    edges.map(([source, target]) => ({ source, target })),
    { directed: false, weighted: false, capacitated: false },
  );
}

const cycle5 = undirected(5, [
  [0, 1],
  [1, 2],
  [2, 3],
  [3, 4],
  [4, 0],
]);
const k4 = undirected(4, [
  [0, 1],
  [0, 2],
  [0, 3],
  [1, 2],
  [1, 3],
  [2, 3],
]);
const star = undirected(4, [
  [0, 1],
  [0, 2],
  [0, 3],
]);
const line4 = undirected(4, [
  [0, 1],
  [1, 2],
  [2, 3],
]);

describe("graph-kit spanning trees", () => {
  const graph = new GraphModel(
    4,
    [
      { source: 0, target: 1, weight: 1 },
      { source: 1, target: 2, weight: 2 },
      { source: 2, target: 3, weight: 1 },
      { source: 0, target: 3, weight: 3 },
      { source: 0, target: 2, weight: 2 },
    ],
    { directed: false, weighted: true, capacitated: false },
  );

  it("builds the minimum tree with endpoint tie-breaking", () => {
    assert.deepEqual(minimumSpanningTree(graph), {
      weight: 4,
      edges: [
        { source: 0, target: 1, weight: 1 },
        { source: 2, target: 3, weight: 1 },
        { source: 0, target: 2, weight: 2 },
      ],
    });
  });

  it("finds the strictly heavier second-best tree", () => {
    assert.equal(secondMinimumSpanningTreeWeight(graph), 5);
    assert.equal(secondMinimumSpanningTreeWeight(undirected(3, [[0, 1], [1, 2], [2, 0]])), null);
  });

  it("counts spanning trees exactly", () => {
    assert.equal(spanningTreeCount(k4), 16n);
    assert.equal(spanningTreeCount(cycle5), 5n);
    assert.equal(spanningTreeCount(line4), 1n);
    assert.equal(spanningTreeCount(undirected(3, [[0, 1]])), 0n);
    assert.equal(spanningTreeCount(undirected(1, [])), 1n);
  });

  it("refuses disconnected graphs", () => {
    assert.throws(() => minimumSpanningTree(undirected(3, [[0, 1]])), /disconnected/);
  });

  it("merges sets once", () => {
    const sets = new UnionFind(4);
    assert.equal(sets.union(0, 1), true);
    assert.equal(sets.union(1, 0), false);
    assert.equal(sets.find(0), sets.find(1));
    assert.notEqual(sets.find(2), sets.find(0));
  });
});

describe("graph-kit flows", () => {
  const capacitated = (edges: readonly GraphEdgeData[], directed = true, weightedEdges = false): GraphModel =>
    new GraphModel(4, edges, { directed, weighted: weightedEdges, capacitated: true });

  it("computes the maximum flow and a minimum cut", () => {
    const network = capacitated([
      { source: 0, target: 1, capacity: 3 },
      { source: 0, target: 2, capacity: 2 },
      { source: 1, target: 2, capacity: 1 },
      { source: 1, target: 3, capacity: 2 },
      { source: 2, target: 3, capacity: 3 },
    ]);
    assert.deepEqual(maxFlow(network, 0, 3), { value: 5, sourceSide: [0] });
  });

  it("lets undirected edges carry flow either way", () => {
    const network = capacitated(
      [
        { source: 0, target: 1, capacity: 4 },
        { source: 1, target: 2, capacity: 3 },
      ],
      false,
    );
    assert.equal(maxFlow(network, 2, 0).value, 3);
    assert.throws(() => maxFlow(network, 1, 1), /must differ/);
  });

  it("prices the maximum flow at its cheapest", () => {
    const network = capacitated(
      [
        { source: 0, target: 1, weight: 1, capacity: 2 },
        { source: 0, target: 2, weight: 4, capacity: 2 },
        { source: 1, target: 3, weight: 1, capacity: 1 },
        { source: 2, target: 3, weight: 1, capacity: 2 },
        { source: 1, target: 2, weight: 1, capacity: 2 },
      ],
      true,
      true,
    );
    assert.deepEqual(minCostMaxFlow(network, 0, 3), { flow: 3, cost: 10 });
  });
});

describe("graph-kit cliques, matchings and colourings", () => {
  const lollipop = undirected(5, [
    [0, 1],
    [1, 2],
    [1, 3],
    [1, 4],
    [2, 3],
    [2, 4],
    [3, 4],
  ]);

  it("finds the unique maximum clique and counts triangles", () => {
    assert.deepEqual(maximumClique(lollipop), [1, 2, 3, 4]);
    assert.equal(countTriangles(lollipop), 4);
    assert.equal(countTriangles(cycle5), 0);
  });

  it("derives independent sets and vertex covers", () => {
    const independent = maximumIndependentSet(lollipop);
    assert.equal(independent.length, 2);
    assert.equal(independent[0], 0);
    assert.equal(minimumVertexCoverSize(lollipop), 3);
    assert.equal(minimumVertexCoverSize(star), 1);
  });

  it("sizes maximum matchings", () => {
    assert.equal(maximumMatchingSize(lollipop), 2);
    assert.equal(maximumMatchingSize(line4), 2);
    assert.equal(maximumMatchingSize(star), 1);
  });

  it("colours an odd cycle with three colours", () => {
    assert.equal(colorWith(cycle5, 2), null);
    assert.deepEqual(chromaticColoring(cycle5), { chromaticNumber: 3, colors: [0, 1, 0, 1, 2] });
    assert.deepEqual(chromaticColoring(undirected(0, [])), { chromaticNumber: 0, colors: [] });
  });

  it("validates and normalises colourings", () => {
    assert.equal(isProperColoring(cycle5, [2, 0, 2, 0, 1]), true);
    assert.equal(isProperColoring(cycle5, [0, 1, 0, 1, 0]), false);
    assert.equal(isProperColoring(cycle5, [0, 1, 0, 1]), false);
    assert.deepEqual(normaliseColoring([5, 3, 5, 7]), [0, 1, 0, 2]);
  });

  it("peels cores to measure degeneracy", () => {
    assert.equal(degeneracy(k4), 3);
    assert.equal(degeneracy(cycle5), 2);
    assert.equal(degeneracy(line4), 1);
  });
});

describe("graph-kit traversability", () => {
  it("applies the degree conditions for Eulerian trails", () => {
    const square = undirected(4, [
      [0, 1],
      [1, 2],
      [2, 3],
      [3, 0],
    ]);
    assert.equal(hasEulerianCircuit(square), true);
    assert.equal(hasEulerianPath(line4), true);
    assert.equal(hasEulerianCircuit(line4), false);
    assert.equal(hasEulerianPath(star), false);
    assert.equal(hasEulerianPath(undirected(3, [])), true);
    const twoTriangles = undirected(6, [
      [0, 1],
      [1, 2],
      [2, 0],
      [3, 4],
      [4, 5],
      [5, 3],
    ]);
    assert.equal(hasEulerianCircuit(twoTriangles), false);
  });

  it("searches Hamiltonian paths and circuits", () => {
    assert.equal(hasHamiltonianCircuit(cycle5), true);
    assert.equal(hasHamiltonianPath(line4), true);
    assert.equal(hasHamiltonianCircuit(line4), false);
    assert.equal(hasHamiltonianPath(star), false);
    assert.equal(hasHamiltonianCircuit(undirected(2, [[0, 1]])), false);
    assert.equal(hasHamiltonianPath(undirected(0, [])), false);
  });
});

describe("graph-kit trees", () => {
  const tree = undirected(7, [
    [0, 1],
    [0, 2],
    [1, 3],
    [1, 4],
    [2, 5],
    [5, 6],
  ]);

  it("recognises trees and measures them", () => {
    assert.equal(isTree(tree), true);
    assert.equal(isTree(cycle5), false);
    assert.equal(treeDiameter(tree), 5);
    assert.deepEqual(treeCentroids(tree), [0]);
    assert.deepEqual(treeCentroids(line4), [1, 2]);
    assert.equal(treeMaximumIndependentSet(tree), 4);
    assert.throws(() => treeDiameter(cycle5), /Expected an undirected tree/);
  });

  it("answers ancestor and lowest common ancestor queries", () => {
    assert.equal(isAncestor(tree, 1, 4), true);
    assert.equal(isAncestor(tree, 2, 4), false);
    assert.equal(isAncestor(tree, 4, 1), false);
    assert.equal(isAncestor(tree, 1, 0, 4), true);
    assert.equal(lowestCommonAncestor(tree, 3, 4), 1);
    assert.equal(lowestCommonAncestor(tree, 4, 6), 0);
    assert.equal(lowestCommonAncestor(tree, 3, 1), 1);
  });
});
