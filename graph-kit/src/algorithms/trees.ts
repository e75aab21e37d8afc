import { GraphModel, VertexId } from "../model.js";
import { bfsDistances, isConnected } from "./traversal.js";

export function isTree(graph: GraphModel): boolean {
  return !graph.directed && graph.vertexCount > 0 && graph.edgeCount === graph.vertexCount - 1 && isConnected(graph);
}

function assertTree(graph: GraphModel): void {
  if (!isTree(graph)) {
    throw new Error("Expected an undirected tree");
  }
}

interface RootedTree {
  readonly parent: VertexId[];
  readonly depth: number[];
  /** Vertices in BFS order from the root. */
  readonly order: VertexId[];
}

function rootTree(graph: GraphModel, root: VertexId): RootedTree {
  const parent = new Array<VertexId>(graph.vertexCount).fill(-1);
  const depth = new Array<number>(graph.vertexCount).fill(-1);
  depth[root] = 0;
  const order: VertexId[] = [root];
  for (let head = 0; head < order.length; head += 1) {
    const current = order[head];
    for (const neighbor of graph.neighbors(current)) {
      if (depth[neighbor] === -1) {
        depth[neighbor] = depth[current] + 1;
        parent[neighbor] = current;
        order.push(neighbor);
      }
    }
  }
  return { parent, depth, order };
}

/** Number of edges on the longest path, by two breadth-first sweeps. */
export function treeDiameter(graph: GraphModel): number {
  assertTree(graph);
  const first = bfsDistances(graph, 0);
  const far = first.indexOf(Math.max(...first));
  return Math.max(...bfsDistances(graph, far));
}

/** Centroids of the tree, ascending: vertices minimising the largest remaining component. */
export function treeCentroids(graph: GraphModel): VertexId[] {
  assertTree(graph);
  const { parent, order } = rootTree(graph, 0);
  const size = new Array<number>(graph.vertexCount).fill(1);
  for (let index = order.length - 1; index > 0; index -= 1) {
    const vertex = order[index];
    size[parent[vertex]] += size[vertex];
  }
  const heaviest = graph.listVertices().map((vertex) => {
    let largest = graph.vertexCount - size[vertex];
    for (const neighbor of graph.neighbors(vertex)) {
      if (neighbor !== parent[vertex]) {
        largest = Math.max(largest, size[neighbor]);
      }
    }
    return largest;
  });
  const best = Math.min(...heaviest);
  return graph.listVertices().filter((vertex) => heaviest[vertex] === best);
}

/** Ancestors are reported relative to `root`, which defaults to vertex 0. */
export function isAncestor(graph: GraphModel, ancestor: VertexId, descendant: VertexId, root: VertexId = 0): boolean {
  const { parent } = rootTree(graph, root);
  let cursor = descendant;
  while (cursor !== -1) {
    if (cursor === ancestor) {
      return true;
    }
    cursor = parent[cursor];
  }
  return false;
}

/** Lowest common ancestor by climbing parent links from the deeper vertex. */
export function lowestCommonAncestor(graph: GraphModel, left: VertexId, right: VertexId, root: VertexId = 0): VertexId {
  assertTree(graph);
  if (!graph.hasVertex(left) || !graph.hasVertex(right) || !graph.hasVertex(root)) {
    throw new Error(`Unknown vertex in LCA query (${left}, ${right}) rooted at ${root}`);
  }
  const { parent, depth } = rootTree(graph, root);
  let a = left;
  let b = right;
  while (depth[a] > depth[b]) {
    a = parent[a];
  }
  while (depth[b] > depth[a]) {
    b = parent[b];
  }
  while (a !== b) {
    a = parent[a];
    b = parent[b];
  }
  return a;
}

/** Size of a maximum independent set of a tree by include/exclude DP. */
export function treeMaximumIndependentSet(graph: GraphModel): number {
  assertTree(graph);
  const { parent, order } = rootTree(graph, 0);
  const include = new Array<number>(graph.vertexCount).fill(1);
  const exclude = new Array<number>(graph.vertexCount).fill(0);
  for (let index = order.length - 1; index > 0; index -= 1) {
    const vertex = order[index];
    const up = parent[vertex];
    include[up] += exclude[vertex];
    exclude[up] += Math.max(include[vertex], exclude[vertex]);
  }
  return Math.max(include[0], exclude[0]);
}
