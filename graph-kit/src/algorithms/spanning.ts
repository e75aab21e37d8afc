import { GraphEdgeData, GraphModel, VertexId } from "../model.js";

/** Disjoint-set forest with path halving and union by size. */
export class UnionFind {
  private readonly parent: number[];
  private readonly size: number[];

  constructor(count: number) {
    this.parent = Array.from({ length: count }, (_, index) => index);
    this.size = new Array<number>(count).fill(1);
  }

  find(element: number): number {
    let current = element;
    while (this.parent[current] !== current) {
      this.parent[current] = this.parent[this.parent[current]];
      current = this.parent[current];
    }
    return current;
  }

  /** Returns `false` when both elements already share a set. */
  union(left: number, right: number): boolean {
    let a = this.find(left);
    let b = this.find(right);
    if (a === b) {
      return false;
    }
    if (this.size[a] < this.size[b]) {
      [a, b] = [b, a];
    }
    this.parent[b] = a;
    this.size[a] += this.size[b];
    return true;
  }
}

export interface SpanningTreeResult {
  readonly weight: number;
  readonly edges: GraphEdgeData[];
}

function byWeight(graph: GraphModel): GraphEdgeData[] {
  return graph
    .listEdges()
    .sort(
      (left, right) =>
        graph.weightOf(left) - graph.weightOf(right) ||
        Math.min(left.source, left.target) - Math.min(right.source, right.target) ||
        Math.max(left.source, left.target) - Math.max(right.source, right.target),
    );
}

/**
 * Kruskal's algorithm. Equal weights are broken by endpoint order so the tree
 * is deterministic. Throws when the graph is not connected.
 */
export function minimumSpanningTree(graph: GraphModel): SpanningTreeResult {
  if (graph.directed) {
    throw new Error("Spanning trees are defined on undirected graphs");
  }
  const sets = new UnionFind(graph.vertexCount);
  const edges: GraphEdgeData[] = [];
  let weight = 0;
  for (const edge of byWeight(graph)) {
    if (sets.union(edge.source, edge.target)) {
      edges.push(edge);
      weight += graph.weightOf(edge);
    }
  }
  if (graph.vertexCount > 0 && edges.length !== graph.vertexCount - 1) {
    throw new Error("Graph is disconnected; no spanning tree exists");
  }
  return { weight, edges };
}

/**
 * Weight of the cheapest spanning tree strictly heavier than the minimum one,
 * or `null` when every spanning tree has the minimum weight. Each non-tree
 * edge `(u, v, w)` replaces the heaviest tree edge on the `u`–`v` tree path
 * whose weight is strictly below `w`.
 */
export function secondMinimumSpanningTreeWeight(graph: GraphModel): number | null {
  const tree = minimumSpanningTree(graph);
  const treeAdjacency: { to: VertexId; weight: number }[][] = Array.from({ length: graph.vertexCount }, () => []);
  const inTree = new Set<GraphEdgeData>(tree.edges);
  for (const edge of tree.edges) {
    treeAdjacency[edge.source].push({ to: edge.target, weight: graph.weightOf(edge) });
    treeAdjacency[edge.target].push({ to: edge.source, weight: graph.weightOf(edge) });
  }

  const pathWeights = (from: VertexId, to: VertexId): number[] => {
    const previous = new Array<{ vertex: VertexId; weight: number } | null>(graph.vertexCount).fill(null);
    const seen = new Array<boolean>(graph.vertexCount).fill(false);
    seen[from] = true;
    const queue: VertexId[] = [from];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const step of treeAdjacency[current]) {
        if (!seen[step.to]) {
          seen[step.to] = true;
          previous[step.to] = { vertex: current, weight: step.weight };
          queue.push(step.to);
        }
      }
    }
    const weights: number[] = [];
    let cursor = previous[to];
    while (cursor) {
      weights.push(cursor.weight);
      cursor = previous[cursor.vertex];
    }
    return weights;
  };

  let best: number | null = null;
  for (const edge of graph.listEdges()) {
    if (inTree.has(edge)) {
      continue;
    }
    const added = graph.weightOf(edge);
    const replaceable = pathWeights(edge.source, edge.target).filter((weight) => weight < added);
    if (replaceable.length === 0) {
      continue;
    }
    const candidate = tree.weight - Math.max(...replaceable) + added;
    if (best === null || candidate < best) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Number of spanning trees by Kirchhoff's matrix-tree theorem: the determinant
 * of the Laplacian with its first row and column removed, computed exactly
 * with fraction-free Bareiss elimination.
 */
export function spanningTreeCount(graph: GraphModel): bigint {
  if (graph.directed) {
    throw new Error("Spanning tree counting expects an undirected graph");
  }
  const n = graph.vertexCount;
  if (n <= 1) {
    return 1n;
  }
  const size = n - 1;
  const matrix: bigint[][] = Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, column) => {
      const u = row + 1;
      const v = column + 1;
      if (u === v) {
        return BigInt(graph.degree(u));
      }
      return graph.hasEdge(u, v) ? -1n : 0n;
    }),
  );

  let sign = 1n;
  let previousPivot = 1n;
  for (let pivot = 0; pivot < size; pivot += 1) {
    if (matrix[pivot][pivot] === 0n) {
      const swap = matrix.findIndex((row, index) => index > pivot && row[pivot] !== 0n);
      if (swap === -1) {
        return 0n;
      }
      [matrix[pivot], matrix[swap]] = [matrix[swap], matrix[pivot]];
      sign = -sign;
    }
    for (let row = pivot + 1; row < size; row += 1) {
      for (let column = pivot + 1; column < size; column += 1) {
        matrix[row][column] =
          (matrix[row][column] * matrix[pivot][pivot] - matrix[row][pivot] * matrix[pivot][column]) / previousPivot;
      }
    }
    previousPivot = matrix[pivot][pivot];
  }
  return sign * matrix[size - 1][size - 1];
}
