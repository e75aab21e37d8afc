import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { GraphModel, isProperColoring, isTopologicalOrder, pathCost } from "../graph-kit/src/index.js";
import { GenerationFailure, SolverInfeasible } from "../src/errors.js";
import { FAMILY_IDS, FAMILY_TABLE } from "../src/families/table.js";
import { generateGraph } from "../src/generator/index.js";
import { buildInstance } from "../src/generator/instance.js";
import { solve } from "../src/solver/index.js";

const roads = new GraphModel(
  6,
  [
    { source: 0, target: 1, weight: 2 },
    { source: 0, target: 2, weight: 3 },
    { source: 1, target: 5, weight: 6 },
    { source: 2, target: 5, weight: 4 },
    { source: 1, target: 3, weight: 1 },
    { source: 3, target: 5, weight: 5 },
    { source: 2, target: 4, weight: 1 },
    { source: 4, target: 5, weight: 3 },
  ],
  { directed: false, weighted: true, capacitated: false },
);

describe("reference solvers", () => {
  it("returns canonical answers for hand-built graphs", () => {
    expect(solve("shortest-path", roads, { source: 0, target: 5 })).to.deep.equal({
      kind: "path",
      vertices: [0, 2, 4, 5],
      cost: 7,
    });
    expect(solve("shortest-path-length", roads, { source: 0, target: 5 })).to.deep.equal({ kind: "scalar", value: 7 });
    expect(solve("minimum-spanning-tree", roads, {})).to.deep.equal({ kind: "scalar", value: 10 });
    expect(solve("connected-components", roads)).to.deep.equal({ kind: "scalar", value: 1 });
  });

  it("reports -1 when no strictly heavier spanning tree exists", () => {
    const triangle = new GraphModel(
      3,
      [
        { source: 0, target: 1, weight: 4 },
        { source: 1, target: 2, weight: 4 },
        { source: 0, target: 2, weight: 4 },
      ],
      { directed: false, weighted: true, capacitated: false },
    );
    expect(solve("second-mst", triangle)).to.deep.equal({ kind: "scalar", value: -1 });
  });

  it("returns sorted vertex sets and normalised colourings", () => {
    const bowtie = new GraphModel(
      5,
      [
        { source: 0, target: 1 },
        { source: 1, target: 2 },
        { source: 0, target: 2 },
        { source: 2, target: 3 },
        { source: 3, target: 4 },
        { source: 2, target: 4 },
      ],
      { directed: false, weighted: false, capacitated: false },
    );
    expect(solve("articulation-points", bowtie)).to.deep.equal({ kind: "vertex-set", vertices: [2] });
    expect(solve("graph-coloring", bowtie)).to.deep.equal({ kind: "coloring", colors: [0, 1, 2, 0, 1] });
    expect(solve("chromatic-number", bowtie)).to.deep.equal({ kind: "scalar", value: 3 });
  });

  it("raises SolverInfeasible for graphs lacking the required structure", () => {
    const directedChain = new GraphModel(2, [{ source: 0, target: 1 }], {
      directed: true,
      weighted: false,
      capacitated: false,
    });
    expect(() => solve("bipartite", directedChain)).to.throw(SolverInfeasible, "bipartite expects an undirected graph");
    expect(() => solve("shortest-path", roads, { source: 0 })).to.throw(
      SolverInfeasible,
      "Query requires two designated vertices",
    );
    expect(() => solve("tree-diameter", roads)).to.throw(SolverInfeasible, "not a tree");

    const split = new GraphModel(
      4,
      [
        { source: 0, target: 1, weight: 1 },
        { source: 2, target: 3, weight: 1 },
      ],
      { directed: false, weighted: true, capacitated: false },
    );
    expect(() => solve("shortest-path", split, { source: 0, target: 3 })).to.throw(
      SolverInfeasible,
      "Vertex 3 is unreachable from 0",
    );
  });

  it("keeps solver-raised errors and wraps algorithm failures with their cause", () => {
    const cyclic = new GraphModel(
      2,
      [
        { source: 0, target: 1, weight: 1 },
        { source: 1, target: 0, weight: 1 },
      ],
      { directed: true, weighted: true, capacitated: false },
    );
    expect(() => solve("longest-path-dag", cyclic)).to.throw(
      SolverInfeasible,
      "Longest path is only defined here on acyclic graphs",
    );

    const long = new GraphModel(
      21,
      Array.from({ length: 20 }, (_, index) => ({ source: index, target: index + 1 })),
      { directed: false, weighted: false, capacitated: false },
    );
    try {
      solve("hamiltonian-path", long);
      expect.fail("expected SolverInfeasible");
    } catch (error) {
      expect(error).to.be.instanceOf(SolverInfeasible);
      if (!(error instanceof SolverInfeasible)) {
        return;
      }
      expect(error.message).to.equal("hamiltonian-path solver failed: Hamiltonian search supports at most 20 vertices");
      expect(error.cause).to.be.instanceOf(Error);
    }
  });
});

describe("solver answers are independently verifiable", () => {
  const seeds = fc.nat();

  it("shortest paths recompute to their stated cost", () => {
    fc.assert(
      fc.property(seeds, (seed) => {
        const { graph, params } = generateGraph("shortest-path", { vertices: 10, density: "sparse" }, seed);
        const answer = solve("shortest-path", graph, params);
        if (answer.kind !== "path") {
          throw new Error(`unexpected answer kind ${answer.kind}`);
        }
        expect(answer.vertices[0]).to.equal(params.source);
        expect(answer.vertices.at(-1)).to.equal(params.target);
        expect(pathCost(graph, answer.vertices)).to.equal(answer.cost);
      }),
      { numRuns: 100 },
    );
  });

  it("longest DAG paths recompute to their stated cost", () => {
    fc.assert(
      fc.property(seeds, (seed) => {
        const { graph } = generateGraph("longest-path-dag", { vertices: 9, density: "dense" }, seed);
        const answer = solve("longest-path-dag", graph);
        if (answer.kind !== "path") {
          throw new Error(`unexpected answer kind ${answer.kind}`);
        }
        expect(pathCost(graph, answer.vertices)).to.equal(answer.cost);
      }),
      { numRuns: 100 },
    );
  });

  it("colourings are proper and use the chromatic number of colours", () => {
    fc.assert(
      fc.property(seeds, (seed) => {
        const { graph } = generateGraph("graph-coloring", { vertices: 8, density: "dense" }, seed);
        const coloring = solve("graph-coloring", graph);
        const chromatic = solve("chromatic-number", graph);
        if (coloring.kind !== "coloring" || chromatic.kind !== "scalar") {
          throw new Error("unexpected answer kinds");
        }
        expect(isProperColoring(graph, coloring.colors)).to.equal(true);
        expect(new Set(coloring.colors).size).to.equal(chromatic.value);
      }),
      { numRuns: 60 },
    );
  });

  it("topological orders respect every edge", () => {
    fc.assert(
      fc.property(seeds, (seed) => {
        const { graph } = generateGraph("topological-sort", { vertices: 10, density: "sparse" }, seed);
        const answer = solve("topological-sort", graph);
        if (answer.kind !== "sequence") {
          throw new Error(`unexpected answer kind ${answer.kind}`);
        }
        expect(isTopologicalOrder(graph, answer.vertices)).to.equal(true);
      }),
      { numRuns: 100 },
    );
  });

  it("minimum cut capacity equals maximum flow", () => {
    fc.assert(
      fc.property(seeds, (seed) => {
        const { graph, params } = generateGraph("minimum-cut", { vertices: 9, density: "sparse" }, seed);
        expect(solve("minimum-cut", graph, params)).to.deep.equal(solve("maximum-flow", graph, params));
      }),
      { numRuns: 100 },
    );
  });
});

describe("instance building", () => {
  it("builds every family with an answer of its declared shape", () => {
    for (const family of FAMILY_IDS) {
      const { defaults, answer } = FAMILY_TABLE[family];
      const instance = buildInstance(
        family,
        { vertices: Math.min(defaults.vertices, 8), density: defaults.densities[0] },
        1234,
      );
      expect(instance.groundTruth.kind, family).to.equal(answer);
      expect(instance.family).to.equal(family);
    }
  });

  it("is deterministic and reproducible from the accepted seed", () => {
    const size = { vertices: 10, density: "sparse" } as const;
    const first = buildInstance("shortest-path", size, 77, { index: 3 });
    const second = buildInstance("shortest-path", size, 77, { index: 3 });
    expect(second.graph.listEdges()).to.deep.equal(first.graph.listEdges());
    expect(second.groundTruth).to.deep.equal(first.groundTruth);
    expect(first.id).to.equal("shortest-path/sparse/3");
    expect(first.index).to.equal(3);
    expect(generateGraph("shortest-path", size, first.seed).graph.listEdges()).to.deep.equal(first.graph.listEdges());
  });

  it("screens out degenerate draws", () => {
    for (let seed = 0; seed < 30; seed += 1) {
      const instance = buildInstance("shortest-path", { vertices: 8, density: "dense" }, seed);
      if (instance.groundTruth.kind !== "path") {
        throw new Error("shortest-path must answer with a path");
      }
      expect(instance.groundTruth.vertices.length).to.be.at.least(3);
      const direct = instance.graph.getEdge(instance.params.source ?? -1, instance.params.target ?? -1);
      if (direct) {
        expect(instance.graph.weightOf(direct)).to.be.greaterThan(instance.groundTruth.cost ?? 0);
      }

      const flow = buildInstance("maximum-flow", { vertices: 8, density: "sparse" }, seed);
      const { source = -1, target = -1 } = flow.params;
      expect(flow.graph.hasEdge(source, target)).to.equal(false);
      expect(flow.groundTruth).to.not.deep.equal({ kind: "scalar", value: 0 });
    }
  });

  it("rejects a direct edge that ties a longer shortest path", () => {
    const triangle = new GraphModel(
      3,
      [
        { source: 0, target: 1, weight: 1 },
        { source: 1, target: 2, weight: 1 },
        { source: 0, target: 2, weight: 2 },
      ],
      { directed: false, weighted: true, capacitated: false },
    );
    const params = { source: 0, target: 2 };
    const truth = solve("shortest-path", triangle, params);
    expect(truth).to.deep.equal({ kind: "path", vertices: [0, 1, 2], cost: 2 });

    const { degenerate } = FAMILY_TABLE["shortest-path"];
    expect(degenerate?.(triangle, params, truth)).to.equal("edge 0 -> 2 ties the shortest distance 2");
    expect(FAMILY_TABLE["shortest-path-length"].degenerate?.(triangle, params, truth)).to.equal(
      "edge 0 -> 2 ties the shortest distance 2",
    );
  });

  it("freezes the instance", () => {
    const instance = buildInstance("bipartite", { vertices: 6, density: "sparse" }, 11, { id: "custom" });
    expect(instance.id).to.equal("custom");
    expect(Object.isFrozen(instance)).to.equal(true);
    expect(Object.isFrozen(instance.params)).to.equal(true);
    expect(Object.isFrozen(instance.groundTruth)).to.equal(true);
  });

  it("fails with details once the attempt budget is spent", () => {
    // Every pair on a two-vertex tree is an ancestor pair.
    try {
      buildInstance("tree-lca", { vertices: 2, density: "tree" }, 5, { maxAttempts: 3 });
      expect.fail("expected a GenerationFailure");
    } catch (error) {
      expect(error).to.be.instanceOf(GenerationFailure);
      if (!(error instanceof GenerationFailure)) {
        return;
      }
      expect(error.message).to.equal("Could not build a tree-lca instance within 3 attempts");
      expect(error.code).to.equal("E-GEN-FAILED");
      expect(error.details).to.include({ family: "tree-lca", seed: 5, rejected: 3 });
    }
  });
});
