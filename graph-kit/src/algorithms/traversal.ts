import { GraphModel, VertexId } from "../model.js";

/**
 * Breadth-first hop distances from `origin` following outgoing arcs; `-1`
 * marks unreachable vertices.
 */
export function bfsDistances(graph: GraphModel, origin: VertexId): number[] {
  const distance = new Array<number>(graph.vertexCount).fill(-1);
  if (!graph.hasVertex(origin)) {
    throw new Error(`Unknown origin vertex '${origin}'`);
  }
  distance[origin] = 0;
  const queue: VertexId[] = [origin];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    for (const neighbor of graph.neighbors(current)) {
      if (distance[neighbor] === -1) {
        distance[neighbor] = distance[current] + 1;
        queue.push(neighbor);
      }
    }
  }
  return distance;
}

export function isReachable(graph: GraphModel, from: VertexId, to: VertexId): boolean {
  return bfsDistances(graph, from)[to] >= 0;
}

/**
 * Connected components (weakly connected for directed graphs). Each component
 * is sorted and the list is ordered by smallest member.
 */
export function connectedComponents(graph: GraphModel): VertexId[][] {
  const seen = new Array<boolean>(graph.vertexCount).fill(false);
  const components: VertexId[][] = [];
  for (const root of graph.listVertices()) {
    if (seen[root]) {
      continue;
    }
    seen[root] = true;
    const members: VertexId[] = [root];
    for (let head = 0; head < members.length; head += 1) {
      const current = members[head];
      const arcs = graph.directed ? [...graph.getOutgoing(current), ...graph.getIncoming(current)] : graph.getOutgoing(current);
      for (const arc of arcs) {
        if (!seen[arc.to]) {
          seen[arc.to] = true;
          members.push(arc.to);
        }
      }
    }
    components.push(members.sort((left, right) => left - right));
  }
  return components;
}

export function isConnected(graph: GraphModel): boolean {
  return connectedComponents(graph).length <= 1;
}

/** Two-colours every component by BFS; fails on the first odd cycle. */
export function isBipartite(graph: GraphModel): boolean {
  const side = new Array<number>(graph.vertexCount).fill(-1);
  for (const root of graph.listVertices()) {
    if (side[root] !== -1) {
      continue;
    }
    side[root] = 0;
    const queue: VertexId[] = [root];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const neighbor of graph.neighbors(current)) {
        if (side[neighbor] === -1) {
          side[neighbor] = 1 - side[current];
          queue.push(neighbor);
        } else if (side[neighbor] === side[current]) {
          return false;
        }
      }
    }
  }
  return true;
}

/** Largest hop eccentricity of a connected graph. */
export function graphDiameter(graph: GraphModel): number {
  let diameter = 0;
  for (const vertex of graph.listVertices()) {
    const distances = bfsDistances(graph, vertex);
    if (distances.includes(-1)) {
      throw new Error("Diameter is undefined on a disconnected graph");
    }
    diameter = Math.max(diameter, ...distances);
  }
  return diameter;
}

export function commonNeighbors(graph: GraphModel, left: VertexId, right: VertexId): VertexId[] {
  const others = new Set(graph.neighbors(right));
  return graph.neighbors(left).filter((vertex) => others.has(vertex));
}
