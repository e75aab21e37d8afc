import { GraphModel, VertexId } from "../model.js";

interface ResidualArc {
  readonly to: VertexId;
  capacity: number;
  readonly cost: number;
  /** Index of the paired reverse arc in `arcs[to]`. */
  readonly reverse: number;
}

/**
 * Residual network built from a capacitated graph. Every undirected edge adds
 * one arc per direction, each with the full edge capacity.
 */
class ResidualNetwork {
  readonly arcs: ResidualArc[][];

  constructor(graph: GraphModel) {
    this.arcs = Array.from({ length: graph.vertexCount }, () => []);
    for (const edge of graph.listEdges()) {
      const capacity = graph.capacityOf(edge);
      const cost = graph.weighted ? graph.weightOf(edge) : 0;
      this.add(edge.source, edge.target, capacity, cost);
      if (!graph.directed) {
        this.add(edge.target, edge.source, capacity, cost);
      }
    }
  }

  private add(from: VertexId, to: VertexId, capacity: number, cost: number): void {
    this.arcs[from].push({ to, capacity, cost, reverse: this.arcs[to].length });
    this.arcs[to].push({ to: from, capacity: 0, cost: -cost, reverse: this.arcs[from].length - 1 });
  }

  /** Pushes `amount` along the arcs recorded in `parent`, walking back from `sink`. */
  augment(parent: readonly ({ vertex: VertexId; arc: number } | null)[], source: VertexId, sink: VertexId, amount: number): void {
    let current = sink;
    while (current !== source) {
      const step = parent[current];
      if (!step) {
        throw new Error(`Augmenting path broken at vertex ${current}`);
      }
      const arc = this.arcs[step.vertex][step.arc];
      arc.capacity -= amount;
      this.arcs[arc.to][arc.reverse].capacity += amount;
      current = step.vertex;
    }
  }

  bottleneck(parent: readonly ({ vertex: VertexId; arc: number } | null)[], source: VertexId, sink: VertexId): number {
    let amount = Number.POSITIVE_INFINITY;
    let current = sink;
    while (current !== source) {
      const step = parent[current];
      if (!step) {
        throw new Error(`Augmenting path broken at vertex ${current}`);
      }
      amount = Math.min(amount, this.arcs[step.vertex][step.arc].capacity);
      current = step.vertex;
    }
    return amount;
  }

  /** Vertices reachable from `source` through arcs with spare capacity. */
  reachable(source: VertexId): boolean[] {
    const seen = new Array<boolean>(this.arcs.length).fill(false);
    seen[source] = true;
    const queue: VertexId[] = [source];
    for (let head = 0; head < queue.length; head += 1) {
      for (const arc of this.arcs[queue[head]]) {
        if (arc.capacity > 0 && !seen[arc.to]) {
          seen[arc.to] = true;
          queue.push(arc.to);
        }
      }
    }
    return seen;
  }
}

export interface MaxFlowResult {
  readonly value: number;
  /** Source side of a minimum cut, sorted. */
  readonly sourceSide: VertexId[];
}

function assertTerminals(graph: GraphModel, source: VertexId, sink: VertexId): void {
  if (!graph.hasVertex(source) || !graph.hasVertex(sink)) {
    throw new Error(`Unknown flow terminal in (${source}, ${sink})`);
  }
  if (source === sink) {
    throw new Error("Source and sink must differ");
  }
}

/** Edmonds–Karp: BFS augmenting paths on the residual network. */
export function maxFlow(graph: GraphModel, source: VertexId, sink: VertexId): MaxFlowResult {
  assertTerminals(graph, source, sink);
  const network = new ResidualNetwork(graph);
  let value = 0;

  while (true) {
    const parent = new Array<{ vertex: VertexId; arc: number } | null>(graph.vertexCount).fill(null);
    const seen = new Array<boolean>(graph.vertexCount).fill(false);
    seen[source] = true;
    const queue: VertexId[] = [source];
    for (let head = 0; head < queue.length && !seen[sink]; head += 1) {
      const current = queue[head];
      network.arcs[current].forEach((arc, index) => {
        if (arc.capacity > 0 && !seen[arc.to]) {
          seen[arc.to] = true;
          parent[arc.to] = { vertex: current, arc: index };
          queue.push(arc.to);
        }
      });
    }
    if (!seen[sink]) {
      break;
    }
    const amount = network.bottleneck(parent, source, sink);
    network.augment(parent, source, sink, amount);
    value += amount;
  }

  const side = network.reachable(source);
  return { value, sourceSide: graph.listVertices().filter((vertex) => side[vertex]) };
}

export interface MinCostFlowResult {
  readonly flow: number;
  readonly cost: number;
}

/**
 * Successive shortest paths with Bellman–Ford (queue-based) on the residual
 * costs. Returns the maximum flow together with its minimum total cost, where
 * each edge's weight is its per-unit cost.
 */
export function minCostMaxFlow(graph: GraphModel, source: VertexId, sink: VertexId): MinCostFlowResult {
  assertTerminals(graph, source, sink);
  const network = new ResidualNetwork(graph);
  let flow = 0;
  let cost = 0;

  while (true) {
    const distance = new Array<number>(graph.vertexCount).fill(Number.POSITIVE_INFINITY);
    const parent = new Array<{ vertex: VertexId; arc: number } | null>(graph.vertexCount).fill(null);
    const queued = new Array<boolean>(graph.vertexCount).fill(false);
    distance[source] = 0;
    const queue: VertexId[] = [source];
    queued[source] = true;
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      queued[current] = false;
      network.arcs[current].forEach((arc, index) => {
        const tentative = distance[current] + arc.cost;
        if (arc.capacity > 0 && tentative < distance[arc.to]) {
          distance[arc.to] = tentative;
          parent[arc.to] = { vertex: current, arc: index };
          if (!queued[arc.to]) {
            queued[arc.to] = true;
            queue.push(arc.to);
          }
        }
      });
    }
    if (!Number.isFinite(distance[sink])) {
      break;
    }
    const amount = network.bottleneck(parent, source, sink);
    network.augment(parent, source, sink, amount);
    flow += amount;
    cost += amount * distance[sink];
  }

  return { flow, cost };
}
