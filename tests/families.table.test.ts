import { describe, it } from "mocha";
import { expect } from "chai";

import { FAMILY_IDS, FAMILY_TABLE, getFamily, isFamilyId } from "../src/families/table.js";

describe("family table", () => {
  it("covers every family under its own key", () => {
    expect(FAMILY_IDS).to.have.length(38);
    for (const id of FAMILY_IDS) {
      expect(FAMILY_TABLE[id].id).to.equal(id);
      expect(getFamily(id)).to.equal(FAMILY_TABLE[id]);
    }
  });

  it("recognises family tags", () => {
    expect(isFamilyId("bipartite")).to.equal(true);
    expect(isFamilyId("tree-lca")).to.equal(true);
    expect(isFamilyId("Bipartite")).to.equal(false);
    expect(isFamilyId("")).to.equal(false);
  });

  it("keeps tree families on the tree density and the rest off it", () => {
    for (const id of FAMILY_IDS) {
      const { shape, defaults } = FAMILY_TABLE[id];
      if (shape.structure === "tree") {
        expect(defaults.densities, id).to.deep.equal(["tree"]);
      } else {
        expect(defaults.densities, id).to.not.include("tree");
      }
    }
  });

  it("pairs answer shapes with compatible comparators", () => {
    for (const id of FAMILY_IDS) {
      const { answer, comparator } = FAMILY_TABLE[id];
      switch (comparator.kind) {
        case "path-cost":
          expect(answer, id).to.equal("path");
          break;
        case "topological-order":
          expect(answer, id).to.equal("sequence");
          break;
        case "proper-coloring":
          expect(answer, id).to.equal("coloring");
          break;
        case "unordered-set":
          expect(answer, id).to.equal("vertex-set");
          break;
        case "numeric-tolerance":
          expect(answer, id).to.equal("scalar");
          break;
        case "exact":
          expect(["boolean", "scalar"], id).to.include(answer);
          break;
      }
    }
  });

  it("writes query vertices through the label function", () => {
    const label = (vertex: number): string => `v${vertex}`;
    expect(FAMILY_TABLE["shortest-path"].question({ source: 0, target: 5 }, label)).to.equal(
      "Find a shortest path from vertex v0 to vertex v5. Give the path as a sequence of vertices joined by '->' and state its total weight.",
    );
    expect(FAMILY_TABLE["tree-lca"].question({ source: 3, target: 4 }, label)).to.equal(
      "Treat the tree as rooted at vertex v0. Find the lowest common ancestor of vertex v3 and vertex v4.",
    );
  });
});
