import { describe, it } from "mocha";
import { expect } from "chai";

import { GraphModel, GraphModelError } from "../graph-kit/src/index.js";
import { formatDataset, parseDataset, toInstanceRecord } from "../src/generator/dataset.js";
import { buildInstance } from "../src/generator/instance.js";
import { fromPersisted, toPersisted } from "../src/graph/persisted.js";

describe("persisted graphs", () => {
  it("writes flags, dense vertex ids and declared attributes only", () => {
    const network = new GraphModel(
      3,
      [
        { source: 0, target: 1, capacity: 4 },
        { source: 2, target: 1, capacity: 2 },
      ],
      { directed: true, weighted: false, capacitated: true },
    );
    expect(toPersisted(network)).to.deep.equal({
      directed: true,
      weighted: false,
      capacitated: true,
      vertices: [0, 1, 2],
      edges: [
        { source: 0, target: 1, capacity: 4 },
        { source: 2, target: 1, capacity: 2 },
      ],
    });
  });

  it("rebuilds the model and defaults the capacity flag", () => {
    const graph = fromPersisted({
      directed: false,
      weighted: true,
      vertices: [0, 1, 2],
      edges: [{ source: 1, target: 2, weight: 6 }],
    });
    expect(graph.capacitated).to.equal(false);
    expect(graph.vertexCount).to.equal(3);
    expect(graph.getEdge(2, 1)).to.deep.equal({ source: 1, target: 2, weight: 6 });
  });

  it("rejects sparse ids and model violations as GraphModelError", () => {
    expect(() =>
      fromPersisted({ directed: false, weighted: false, vertices: [0, 2], edges: [] }, "graph.json"),
    ).to.throw(
      GraphModelError,
      "Invalid persisted graph in graph.json: vertices.1: vertex ids must be the dense range 0..n-1 in order; found 2 at position 1",
    );
    expect(() =>
      fromPersisted({ directed: false, weighted: false, vertices: [0, 1], edges: [{ source: 0, target: 0 }] }),
    ).to.throw(GraphModelError);
  });
});

describe("dataset files", () => {
  it("reads back exactly what it wrote", () => {
    const instances = [
      buildInstance("shortest-path", { vertices: 8, density: "sparse" }, 3, { index: 0 }),
      buildInstance("graph-coloring", { vertices: 7, density: "dense" }, 4, { index: 1 }),
      buildInstance("tree-lca", { vertices: 9, density: "tree" }, 5, { index: 2 }),
    ];
    const text = formatDataset(instances);
    expect(text.split("\n")).to.have.length(4);

    const restored = parseDataset(text, "dataset.jsonl");
    expect(restored.map(toInstanceRecord)).to.deep.equal(instances.map(toInstanceRecord));
    expect(restored[0].graph.listEdges()).to.deep.equal(instances[0].graph.listEdges());
  });

  it("names the offending line", () => {
    expect(() => parseDataset("\nnot json\n", "dataset.jsonl")).to.throw(
      GraphModelError,
      /^Line 2 of dataset\.jsonl is not valid JSON: /,
    );
    expect(() => parseDataset("{}", "dataset.jsonl")).to.throw(
      GraphModelError,
      /^Invalid instance record in dataset\.jsonl:1: /,
    );
  });
});
