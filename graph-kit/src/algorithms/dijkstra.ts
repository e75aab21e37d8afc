import { GraphEdgeData, GraphModel, VertexId } from "../model.js";

export interface DijkstraResult {
  readonly distance: number;
  readonly path: VertexId[];
}

/**
 * Function applied on edges to compute their traversal cost. The function must
 * always return a non-negative finite number otherwise the search will abort.
 */
export type EdgeCostEvaluator = (edge: GraphEdgeData, graph: GraphModel) => number;

interface QueueEntry {
  node: VertexId;
  priority: number;
}

export class MinHeap {
  private readonly data: QueueEntry[] = [];

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    if (this.data.length === 0) {
      return undefined;
    }
    const min = this.data[0];
    const last = this.data.pop();
    if (last && this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private before(left: QueueEntry, right: QueueEntry): boolean {
    return left.priority < right.priority || (left.priority === right.priority && left.node < right.node);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.before(this.data[index], this.data[parent])) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.before(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && this.before(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

/**
 * Distances from `origin` to every vertex. With `reverse` the search follows
 * incoming arcs, yielding distances *to* `origin`.
 */
export function distancesFrom(
  graph: GraphModel,
  origin: VertexId,
  options: { reverse?: boolean; cost?: EdgeCostEvaluator } = {}
): number[] {
  assertVertex(graph, origin, "origin");
  const computeCost = guardCost(graph, options.cost ?? ((edge) => graph.weightOf(edge)));
  const distances = new Array<number>(graph.vertexCount).fill(Number.POSITIVE_INFINITY);
  const settled = new Array<boolean>(graph.vertexCount).fill(false);
  distances[origin] = 0;

  const queue = new MinHeap();
  queue.enqueue({ node: origin, priority: 0 });
  while (!queue.isEmpty()) {
    const current = queue.dequeue();
    if (!current || settled[current.node]) {
      continue;
    }
    settled[current.node] = true;
    const arcs = options.reverse ? graph.getIncoming(current.node) : graph.getOutgoing(current.node);
    for (const arc of arcs) {
      const tentative = distances[current.node] + computeCost(arc.edge, graph);
      if (tentative < distances[arc.to]) {
        distances[arc.to] = tentative;
        queue.enqueue({ node: arc.to, priority: tentative });
      }
    }
  }
  return distances;
}

/**
 * Minimum-cost path from `start` to `goal`. Among equal-cost paths the
 * lexicographically smallest vertex sequence is returned. An unreachable goal
 * yields an infinite distance and an empty path.
 */
export function shortestPath(
  graph: GraphModel,
  start: VertexId,
  goal: VertexId,
  options: { cost?: EdgeCostEvaluator } = {}
): DijkstraResult {
  assertVertex(graph, start, "start");
  assertVertex(graph, goal, "goal");
  const computeCost = guardCost(graph, options.cost ?? ((edge) => graph.weightOf(edge)));
  const toGoal = distancesFrom(graph, goal, { reverse: true, cost: computeCost });
  const distance = toGoal[start];
  if (!Number.isFinite(distance)) {
    return { distance: Number.POSITIVE_INFINITY, path: [] };
  }

  const path: VertexId[] = [start];
  let current = start;
  while (current !== goal) {
    // Arcs are sorted by neighbour id so the first tight arc keeps the path lexicographically minimal.
    const next = graph
      .getOutgoing(current)
      .find((arc) => !path.includes(arc.to) && computeCost(arc.edge, graph) + toGoal[arc.to] === toGoal[current]);
    if (!next) {
      throw new Error(`Shortest path reconstruction stalled at vertex ${current}`);
    }
    path.push(next.to);
    current = next.to;
  }
  return { distance, path };
}

/**
 * Total weight of `path` when every consecutive pair is joined by an edge,
 * `null` otherwise. Repeated vertices make the path invalid.
 */
export function pathCost(graph: GraphModel, path: readonly VertexId[]): number | null {
  if (path.length === 0 || path.some((vertex) => !graph.hasVertex(vertex))) {
    return null;
  }
  if (new Set(path).size !== path.length) {
    return null;
  }
  let total = 0;
  for (let index = 1; index < path.length; index += 1) {
    const edge = graph.getEdge(path[index - 1], path[index]);
    if (!edge) {
      return null;
    }
    total += graph.weightOf(edge);
  }
  return total;
}

function guardCost(graph: GraphModel, input: EdgeCostEvaluator): EdgeCostEvaluator {
  return (edge) => {
    const value = input(edge, graph);
    if (!Number.isFinite(value) || value < 0) {
      throw new Error("Cost function must return a non-negative finite number");
    }
    return value;
  };
}

function assertVertex(graph: GraphModel, vertex: VertexId, role: string): void {
  if (!graph.hasVertex(vertex)) {
    throw new Error(`Unknown ${role} vertex '${vertex}'`);
  }
}
