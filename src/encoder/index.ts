import { printGraph, type GraphEdgeData, type GraphModel, type VertexId } from "../../graph-kit/src/index.js";
import { EncodingError } from "../errors.js";

export const NOTATIONS = ["natural", "adjacency-list", "adjacency-matrix", "edge-list", "dsl"] as const;
export type Notation = (typeof NOTATIONS)[number];

export const DEFAULT_MAX_NATURAL_EDGES = 400;

export interface EncodeOptions {
  /** Graph name used by the DSL notation. */
  readonly graphName?: string;
  /** Prefix of every vertex label, empty by default so vertex 3 reads `3`. */
  readonly vertexPrefix?: string;
  /** Largest edge count the natural-language notation will spell out. */
  readonly maxNaturalEdges?: number;
}

export interface Representation {
  readonly notation: Notation;
  readonly text: string;
}

const PREFIX_PATTERN = /^[A-Za-z_]*$/;

export function isNotation(value: string): value is Notation {
  return NOTATIONS.some((notation) => notation === value);
}

/** Label of `vertex` shared by every notation. */
export function vertexLabel(vertex: VertexId, prefix = ""): string {
  return `${prefix}${vertex}`;
}

function describeFlags(graph: GraphModel): string {
  return `${graph.directed ? "directed" : "undirected"}`;
}

function article(word: string): string {
  return /^[aeiou]/i.test(word) ? "an" : "a";
}

/** Attribute fields carried per edge, in output order. */
export function edgeFields(graph: GraphModel): Array<"weight" | "capacity"> {
  const fields: Array<"weight" | "capacity"> = [];
  if (graph.weighted) {
    fields.push("weight");
  }
  if (graph.capacitated) {
    fields.push("capacity");
  }
  return fields;
}

function attribute(edge: GraphEdgeData, field: "weight" | "capacity"): number {
  const value = field === "weight" ? edge.weight : edge.capacity;
  if (value === undefined) {
    throw new EncodingError(`Edge ${edge.source}-${edge.target} is missing its ${field}`);
  }
  return value;
}

function encodeNatural(graph: GraphModel, label: (vertex: VertexId) => string, maxEdges: number): string {
  if (graph.edgeCount > maxEdges) {
    throw new EncodingError(
      `Natural-language notation is limited to ${maxEdges} edges; graph has ${graph.edgeCount}`,
      { details: { notation: "natural", edges: graph.edgeCount, limit: maxEdges } },
    );
  }
  const kind = describeFlags(graph);
  const lines: string[] = [
    `This is ${article(kind)} ${kind} graph with ${graph.vertexCount} vertices (${graph.listVertices().map(label).join(", ")}) and ${graph.edgeCount} edges.`,
    graph.weighted ? "Edges are weighted." : "Edges are unweighted.",
  ];
  if (graph.capacitated) {
    lines.push("Every edge has a capacity.");
  }
  for (const edge of graph.listEdges()) {
    const details = edgeFields(graph).map((field) => `${field} ${attribute(edge, field)}`);
    const suffix = details.length > 0 ? ` with ${details.join(" and ")}` : "";
    lines.push(
      graph.directed
        ? `There is a directed edge from vertex ${label(edge.source)} to vertex ${label(edge.target)}${suffix}.`
        : `Vertex ${label(edge.source)} and vertex ${label(edge.target)} are connected by an edge${suffix}.`,
    );
  }
  for (const vertex of graph.listVertices()) {
    if (graph.getOutgoing(vertex).length === 0 && graph.getIncoming(vertex).length === 0) {
      lines.push(`Vertex ${label(vertex)} is isolated.`);
    }
  }
  return `${lines.join("\n")}\n`;
}

function encodeAdjacencyList(graph: GraphModel, label: (vertex: VertexId) => string): string {
  const fields = edgeFields(graph);
  const entry = fields.length === 0 ? "neighbor" : `(neighbor,${fields.join(",")})`;
  const lines = [
    `Adjacency list of ${article(describeFlags(graph))} ${describeFlags(graph)} graph with ${graph.vertexCount} vertices; entries are vertex: [${entry}, ...].`,
  ];
  for (const vertex of graph.listVertices()) {
    const items = graph.getOutgoing(vertex).map((arc) => {
      if (fields.length === 0) {
        return label(arc.to);
      }
      return `(${[label(arc.to), ...fields.map((field) => String(attribute(arc.edge, field)))].join(",")})`;
    });
    lines.push(`${label(vertex)}: [${items.join(", ")}]`);
  }
  return `${lines.join("\n")}\n`;
}

function matrixRows(graph: GraphModel, cell: (edge: GraphEdgeData | undefined) => number): string[] {
  return graph.listVertices().map((row) =>
    graph
      .listVertices()
      .map((column) => String(cell(row === column ? undefined : graph.getEdge(row, column))))
      .join(" "),
  );
}

function encodeAdjacencyMatrix(graph: GraphModel, label: (vertex: VertexId) => string): string {
  const order = graph.listVertices().map(label).join(", ");
  const kind = describeFlags(graph);
  const lines: string[] = [];
  if (graph.weighted) {
    for (const edge of graph.listEdges()) {
      if (attribute(edge, "weight") === 0) {
        throw new EncodingError(
          `Weight matrix cannot show the zero-weight edge ${edge.source}-${edge.target}`,
          { details: { notation: "adjacency-matrix" } },
        );
      }
    }
    lines.push(
      `Weight matrix of ${article(kind)} ${kind} graph with ${graph.vertexCount} vertices. Rows and columns follow the vertex order ${order}; entry (i, j) is the weight of the edge from row vertex i to column vertex j, or 0 when there is no edge.`,
    );
    lines.push(...matrixRows(graph, (edge) => (edge ? attribute(edge, "weight") : 0)));
  } else {
    lines.push(
      `Adjacency matrix of ${article(kind)} ${kind} graph with ${graph.vertexCount} vertices. Rows and columns follow the vertex order ${order}; entry (i, j) is 1 when an edge leads from row vertex i to column vertex j, 0 otherwise.`,
    );
    lines.push(...matrixRows(graph, (edge) => (edge ? 1 : 0)));
  }
  if (graph.capacitated) {
    lines.push("Capacity matrix in the same order; entry (i, j) is the capacity of that edge, 0 when there is none.");
    lines.push(...matrixRows(graph, (edge) => (edge ? attribute(edge, "capacity") : 0)));
  }
  return `${lines.join("\n")}\n`;
}

function encodeEdgeList(graph: GraphModel, label: (vertex: VertexId) => string): string {
  const kind = describeFlags(graph);
  const ends = graph.directed ? ["source", "target"] : ["u", "v"];
  const lines = [
    `${kind[0].toUpperCase()}${kind.slice(1)} graph with ${graph.vertexCount} vertices: ${graph.listVertices().map(label).join(" ")}`,
    `Edges (format: ${[...ends, ...edgeFields(graph)].join(" ")}):`,
  ];
  for (const edge of graph.listEdges()) {
    lines.push(
      [label(edge.source), label(edge.target), ...edgeFields(graph).map((field) => String(attribute(edge, field)))].join(" "),
    );
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Renders `graph` in `notation`. Output depends only on the arguments, so the
 * same call always yields byte-identical text.
 */
export function encode(graph: GraphModel, notation: Notation, options: EncodeOptions = {}): string {
  const prefix = options.vertexPrefix ?? "";
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new EncodingError(`Vertex prefix '${prefix}' must contain letters or underscores only`);
  }
  const label = (vertex: VertexId): string => vertexLabel(vertex, prefix);
  switch (notation) {
    case "natural":
      return encodeNatural(graph, label, options.maxNaturalEdges ?? DEFAULT_MAX_NATURAL_EDGES);
    case "adjacency-list":
      return encodeAdjacencyList(graph, label);
    case "adjacency-matrix":
      return encodeAdjacencyMatrix(graph, label);
    case "edge-list":
      return encodeEdgeList(graph, label);
    case "dsl":
      if (prefix.length > 0) {
        throw new EncodingError("The DSL notation names vertices by bare integers and cannot carry a vertex prefix", {
          details: { notation, prefix },
        });
      }
      try {
        return printGraph(graph, { name: options.graphName ?? "G" });
      } catch (error) {
        throw new EncodingError(error instanceof Error ? error.message : String(error), { cause: error });
      }
    default:
      throw new EncodingError(`Unknown notation '${String(notation)}'`);
  }
}

/** Renders every requested notation; notations that fail are reported separately. */
export function encodeAll(
  graph: GraphModel,
  notations: readonly Notation[],
  options: EncodeOptions = {},
): { representations: Representation[]; failures: Array<{ notation: Notation; error: EncodingError }> } {
  const representations: Representation[] = [];
  const failures: Array<{ notation: Notation; error: EncodingError }> = [];
  for (const notation of notations) {
    try {
      representations.push({ notation, text: encode(graph, notation, options) });
    } catch (error) {
      if (!(error instanceof EncodingError)) {
        throw error;
      }
      failures.push({ notation, error });
    }
  }
  return { representations, failures };
}
