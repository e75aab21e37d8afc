import { isProperColoring, isTopologicalOrder, pathCost, type GraphModel } from "../../graph-kit/src/index.js";
import type { CanonicalAnswer, ComparatorSpec, QueryParams } from "../families/types.js";

export interface CompareContext {
  readonly graph: GraphModel;
  readonly params: QueryParams;
}

export type Comparator = (parsed: CanonicalAnswer, truth: CanonicalAnswer, context: CompareContext) => boolean;

function sameSequence(left: readonly number[], right: readonly number[]): boolean {
  return left.length === right.length && left.every((value, index) => value === right[index]);
}

function vertexList(answer: CanonicalAnswer): readonly number[] | null {
  switch (answer.kind) {
    case "sequence":
    case "path":
    case "vertex-set":
      return answer.vertices;
    default:
      return null;
  }
}

const exact: Comparator = (parsed, truth) => {
  switch (truth.kind) {
    case "boolean":
      return parsed.kind === "boolean" && parsed.value === truth.value;
    case "scalar":
      return parsed.kind === "scalar" && parsed.value === truth.value;
    case "sequence":
    case "vertex-set": {
      const vertices = vertexList(parsed);
      return vertices !== null && sameSequence(vertices, truth.vertices);
    }
    case "path":
      return parsed.kind === "path" && sameSequence(parsed.vertices, truth.vertices) && parsed.cost === truth.cost;
    case "coloring":
      return parsed.kind === "coloring" && sameSequence(parsed.colors, truth.colors);
  }
};

function numericTolerance(tolerance: number): Comparator {
  return (parsed, truth) =>
    parsed.kind === "scalar" && truth.kind === "scalar" && Math.abs(parsed.value - truth.value) <= tolerance;
}

const unorderedSet: Comparator = (parsed, truth) => {
  const expected = vertexList(truth);
  const actual = vertexList(parsed);
  if (expected === null || actual === null) {
    return false;
  }
  const left = new Set(expected);
  const right = new Set(actual);
  return left.size === right.size && [...left].every((vertex) => right.has(vertex));
};

/**
 * A path is accepted when it is a simple path of the graph whose recomputed
 * cost equals the optimum. A stated cost must match as well.
 */
function pathByCost(anchored: boolean): Comparator {
  return (parsed, truth, { graph, params }) => {
    if (parsed.kind !== "path" || truth.kind !== "path" || truth.cost === null) {
      return false;
    }
    const { vertices } = parsed;
    if (anchored && (vertices[0] !== params.source || vertices.at(-1) !== params.target)) {
      return false;
    }
    const cost = pathCost(graph, vertices);
    if (cost === null || cost !== truth.cost) {
      return false;
    }
    return parsed.cost === null || parsed.cost === truth.cost;
  };
}

const topologicalOrder: Comparator = (parsed, _truth, { graph }) => {
  const order = vertexList(parsed);
  return order !== null && isTopologicalOrder(graph, order);
};

function colourCount(colors: readonly number[]): number {
  return new Set(colors).size;
}

/** Proper colouring using exactly as many colours as the reference; labels are free. */
const properColoring: Comparator = (parsed, truth, { graph }) =>
  parsed.kind === "coloring" &&
  truth.kind === "coloring" &&
  isProperColoring(graph, parsed.colors) &&
  colourCount(parsed.colors) === colourCount(truth.colors);

export function comparatorFor(spec: ComparatorSpec): Comparator {
  switch (spec.kind) {
    case "exact":
      return exact;
    case "numeric-tolerance":
      return numericTolerance(spec.tolerance);
    case "unordered-set":
      return unorderedSet;
    case "path-cost":
      return pathByCost(spec.anchored);
    case "topological-order":
      return topologicalOrder;
    case "proper-coloring":
      return properColoring;
  }
}
