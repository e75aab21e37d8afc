/** Identifier of a vertex. Vertices always form the dense range `0..n-1`. */
export type VertexId = number;

export interface GraphEdgeData {
  readonly source: VertexId;
  readonly target: VertexId;
  readonly weight?: number;
  readonly capacity?: number;
}

/** Structural flags carried by every graph. */
export interface GraphFlags {
  readonly directed: boolean;
  readonly weighted: boolean;
  readonly capacitated: boolean;
}

/** Half-edge stored in the adjacency index. */
export interface Arc {
  readonly to: VertexId;
  readonly edge: GraphEdgeData;
}

export class GraphModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphModelError";
  }
}

/**
 * Immutable simple graph over the vertex range `0..vertexCount-1`. Undirected
 * edges are indexed at both endpoints; directed edges only at their source.
 * Self-loops and parallel edges are rejected.
 */
export class GraphModel {
  readonly flags: GraphFlags;
  private readonly edgeList: readonly GraphEdgeData[];
  private readonly outgoing: Arc[][];
  private readonly incoming: Arc[][];
  private readonly keys: Set<string>;

  constructor(readonly vertexCount: number, edges: readonly GraphEdgeData[], flags: GraphFlags) {
    if (!Number.isInteger(vertexCount) || vertexCount < 0) {
      throw new GraphModelError(`Vertex count must be a non-negative integer but received '${vertexCount}'`);
    }
    this.flags = { ...flags };
    this.outgoing = Array.from({ length: vertexCount }, () => []);
    this.incoming = Array.from({ length: vertexCount }, () => []);
    this.keys = new Set();

    const stored: GraphEdgeData[] = [];
    for (const edge of edges) {
      this.checkEdge(edge);
      const key = this.edgeKey(edge.source, edge.target);
      if (this.keys.has(key)) {
        throw new GraphModelError(`Duplicate edge ${edge.source} -> ${edge.target}`);
      }
      this.keys.add(key);
      const frozen = Object.freeze(normaliseEdge(edge, flags));
      stored.push(frozen);
      this.outgoing[edge.source].push({ to: edge.target, edge: frozen });
      this.incoming[edge.target].push({ to: edge.source, edge: frozen });
      if (!flags.directed) {
        this.outgoing[edge.target].push({ to: edge.source, edge: frozen });
        this.incoming[edge.source].push({ to: edge.target, edge: frozen });
      }
    }
    for (const arcs of this.outgoing) {
      arcs.sort((left, right) => left.to - right.to);
    }
    for (const arcs of this.incoming) {
      arcs.sort((left, right) => left.to - right.to);
    }
    this.edgeList = Object.freeze(stored);
  }

  get directed(): boolean {
    return this.flags.directed;
  }

  get weighted(): boolean {
    return this.flags.weighted;
  }

  get capacitated(): boolean {
    return this.flags.capacitated;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  listVertices(): VertexId[] {
    return Array.from({ length: this.vertexCount }, (_, index) => index);
  }

  listEdges(): GraphEdgeData[] {
    return [...this.edgeList];
  }

  hasVertex(id: VertexId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.vertexCount;
  }

  /** Arcs leaving `id`, sorted by neighbour. Undirected graphs expose every incident edge. */
  getOutgoing(id: VertexId): readonly Arc[] {
    return this.outgoing[id] ?? [];
  }

  /** Arcs entering `id`, sorted by neighbour. */
  getIncoming(id: VertexId): readonly Arc[] {
    return this.incoming[id] ?? [];
  }

  neighbors(id: VertexId): VertexId[] {
    return this.getOutgoing(id).map((arc) => arc.to);
  }

  degree(id: VertexId): number {
    return this.getOutgoing(id).length;
  }

  hasEdge(source: VertexId, target: VertexId): boolean {
    return this.keys.has(this.edgeKey(source, target));
  }

  getEdge(source: VertexId, target: VertexId): GraphEdgeData | undefined {
    return this.getOutgoing(source).find((arc) => arc.to === target)?.edge;
  }

  /** Weight used by cost-based algorithms; unweighted edges cost 1. */
  weightOf(edge: GraphEdgeData): number {
    return edge.weight ?? 1;
  }

  /** Capacity used by flow algorithms; uncapacitated edges carry 1 unit. */
  capacityOf(edge: GraphEdgeData): number {
    return edge.capacity ?? 1;
  }

  private edgeKey(source: VertexId, target: VertexId): string {
    if (this.flags.directed) {
      return `${source}>${target}`;
    }
    return source < target ? `${source}-${target}` : `${target}-${source}`;
  }

  private checkEdge(edge: GraphEdgeData): void {
    if (!this.hasVertex(edge.source) || !this.hasVertex(edge.target)) {
      throw new GraphModelError(
        `Edge ${edge.source} -> ${edge.target} references a vertex outside 0..${this.vertexCount - 1}`,
      );
    }
    if (edge.source === edge.target) {
      throw new GraphModelError(`Self-loop on vertex ${edge.source} is not allowed`);
    }
    if (this.flags.weighted && !isFiniteNumber(edge.weight)) {
      throw new GraphModelError(`Edge ${edge.source} -> ${edge.target} requires a numeric weight`);
    }
    if (this.flags.capacitated && (!isFiniteNumber(edge.capacity) || edge.capacity < 0)) {
      throw new GraphModelError(`Edge ${edge.source} -> ${edge.target} requires a non-negative capacity`);
    }
  }
}

function isFiniteNumber(value: number | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Drops attributes the graph flags do not declare so equal graphs compare equal. */
function normaliseEdge(edge: GraphEdgeData, flags: GraphFlags): GraphEdgeData {
  const result: { source: VertexId; target: VertexId; weight?: number; capacity?: number } = {
    source: edge.source,
    target: edge.target,
  };
  if (flags.weighted) {
    result.weight = edge.weight;
  }
  if (flags.capacitated) {
    result.capacity = edge.capacity;
  }
  return result;
}
