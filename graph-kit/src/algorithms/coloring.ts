import { GraphModel, VertexId } from "../model.js";

/**
 * Attempts to colour the graph with `k` colours by backtracking in vertex
 * order, always trying the smallest admissible colour first. Returns `null`
 * when no proper `k`-colouring exists.
 */
export function colorWith(graph: GraphModel, k: number): number[] | null {
  const colors = new Array<number>(graph.vertexCount).fill(-1);

  const assign = (vertex: VertexId, used: number): boolean => {
    if (vertex === graph.vertexCount) {
      return true;
    }
    const blocked = new Set(graph.neighbors(vertex).map((neighbor) => colors[neighbor]));
    // A fresh colour beyond `used` is interchangeable with any other unused one.
    const limit = Math.min(k, used + 1);
    for (let color = 0; color < limit; color += 1) {
      if (blocked.has(color)) {
        continue;
      }
      colors[vertex] = color;
      if (assign(vertex + 1, Math.max(used, color + 1))) {
        return true;
      }
    }
    colors[vertex] = -1;
    return false;
  };

  return assign(0, 0) ? colors : null;
}

export interface ColoringResult {
  readonly chromaticNumber: number;
  /** Colour per vertex; colours appear in first-use order starting at 0. */
  readonly colors: number[];
}

/** Smallest `k` admitting a proper colouring, with the first such colouring found. */
export function chromaticColoring(graph: GraphModel): ColoringResult {
  if (graph.directed) {
    throw new Error("Colouring is defined on undirected graphs");
  }
  if (graph.vertexCount === 0) {
    return { chromaticNumber: 0, colors: [] };
  }
  for (let k = 1; k <= graph.vertexCount; k += 1) {
    const colors = colorWith(graph, k);
    if (colors) {
      return { chromaticNumber: k, colors: normaliseColoring(colors) };
    }
  }
  throw new Error("Colouring search exhausted without a result");
}

/** Relabels colours so that they appear in first-use order starting at 0. */
export function normaliseColoring(colors: readonly number[]): number[] {
  const relabel = new Map<number, number>();
  return colors.map((color) => {
    const existing = relabel.get(color);
    if (existing !== undefined) {
      return existing;
    }
    const next = relabel.size;
    relabel.set(color, next);
    return next;
  });
}

/** True when `colors` assigns one colour per vertex and no edge joins equal colours. */
export function isProperColoring(graph: GraphModel, colors: readonly number[]): boolean {
  if (colors.length !== graph.vertexCount || colors.some((color) => !Number.isInteger(color) || color < 0)) {
    return false;
  }
  return graph.listEdges().every((edge) => colors[edge.source] !== colors[edge.target]);
}
