import { compileSource, GraphModel, type GraphFlags } from "../../graph-kit/src/index.js";
import { EncodingError } from "../errors.js";
import type { Notation } from "./index.js";

export interface DecodeOptions {
  readonly vertexPrefix?: string;
}

interface MutableEdge {
  source: number;
  target: number;
  weight?: number;
  capacity?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

class LabelReader {
  private readonly pattern: RegExp;

  constructor(private readonly prefix: string) {
    this.pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)$`);
  }

  /** Regex fragment capturing the numeric part of a label. */
  get capture(): string {
    return `${escapeRegExp(this.prefix)}(\\d+)`;
  }

  read(token: string): number {
    const match = this.pattern.exec(token.trim());
    if (!match) {
      throw new EncodingError(`Unrecognised vertex label '${token}'`);
    }
    return Number(match[1]);
  }
}

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function readNumber(token: string, what: string): number {
  const value = Number(token);
  if (token.trim().length === 0 || !Number.isFinite(value)) {
    throw new EncodingError(`Expected a number for ${what} but found '${token}'`);
  }
  return value;
}

function build(vertexCount: number, edges: MutableEdge[], flags: GraphFlags): GraphModel {
  const normalised = edges
    .map((edge) =>
      flags.directed || edge.source <= edge.target ? edge : { ...edge, source: edge.target, target: edge.source },
    )
    .sort((left, right) => left.source - right.source || left.target - right.target);
  return new GraphModel(vertexCount, normalised, flags);
}

function headerFlags(header: string): { directed: boolean } {
  if (/\bundirected\b/i.test(header)) {
    return { directed: false };
  }
  if (/\bdirected\b/i.test(header)) {
    return { directed: true };
  }
  throw new EncodingError(`Header does not state whether the graph is directed: '${header}'`);
}

function decodeNatural(text: string, labels: LabelReader): GraphModel {
  const lines = nonEmptyLines(text);
  const header = lines[0] ?? "";
  const count = /with (\d+) vertices/.exec(header);
  if (!count) {
    throw new EncodingError("Natural-language text does not state its vertex count");
  }
  const { directed } = headerFlags(header);
  const weighted = lines.includes("Edges are weighted.");
  const capacitated = lines.includes("Every edge has a capacity.");
  const vertex = labels.capture;
  const undirectedEdge = new RegExp(`^Vertex ${vertex} and vertex ${vertex} are connected by an edge(.*)\\.$`);
  const directedEdge = new RegExp(`^There is a directed edge from vertex ${vertex} to vertex ${vertex}(.*)\\.$`);
  const edges: MutableEdge[] = [];
  for (const line of lines.slice(1)) {
    const match = (directed ? directedEdge : undirectedEdge).exec(line);
    if (!match) {
      continue;
    }
    const edge: MutableEdge = { source: Number(match[1]), target: Number(match[2]) };
    const weight = /weight (-?\d+(?:\.\d+)?)/.exec(match[3]);
    const capacity = /capacity (-?\d+(?:\.\d+)?)/.exec(match[3]);
    if (weighted) {
      edge.weight = readNumber(weight?.[1] ?? "", "edge weight");
    }
    if (capacitated) {
      edge.capacity = readNumber(capacity?.[1] ?? "", "edge capacity");
    }
    edges.push(edge);
  }
  return build(Number(count[1]), edges, { directed, weighted, capacitated });
}

function decodeAdjacencyList(text: string, labels: LabelReader): GraphModel {
  const [header = "", ...rows] = nonEmptyLines(text);
  const { directed } = headerFlags(header);
  const weighted = header.includes(",weight");
  const capacitated = header.includes(",capacity");
  const edges: MutableEdge[] = [];
  const seen = new Set<string>();
  rows.forEach((row, position) => {
    const match = /^([^:]+):\s*\[(.*)\]$/.exec(row);
    if (!match) {
      throw new EncodingError(`Malformed adjacency row '${row}'`);
    }
    const from = labels.read(match[1]);
    if (from !== position) {
      throw new EncodingError(`Adjacency rows must follow vertex order; row ${position} is labelled ${from}`);
    }
    const body = match[2].trim();
    if (body.length === 0) {
      return;
    }
    const entries = weighted || capacitated ? [...body.matchAll(/\(([^)]*)\)/g)].map((item) => item[1]) : body.split(",");
    for (const entry of entries) {
      const parts = entry.split(",").map((part) => part.trim());
      const to = labels.read(parts[0] ?? "");
      const key = directed ? `${from}>${to}` : `${Math.min(from, to)}-${Math.max(from, to)}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      const edge: MutableEdge = { source: from, target: to };
      let next = 1;
      if (weighted) {
        edge.weight = readNumber(parts[next] ?? "", "edge weight");
        next += 1;
      }
      if (capacitated) {
        edge.capacity = readNumber(parts[next] ?? "", "edge capacity");
      }
      edges.push(edge);
    }
  });
  return build(rows.length, edges, { directed, weighted, capacitated });
}

function readMatrix(lines: readonly string[], start: number, size: number): number[][] {
  const rows = lines.slice(start, start + size).map((line) => line.split(/\s+/).map((cell) => readNumber(cell, "matrix cell")));
  if (rows.length !== size || rows.some((row) => row.length !== size)) {
    throw new EncodingError(`Expected a ${size}x${size} matrix`);
  }
  return rows;
}

function decodeAdjacencyMatrix(text: string): GraphModel {
  const lines = nonEmptyLines(text);
  const header = lines[0] ?? "";
  const count = /with (\d+) vertices/.exec(header);
  if (!count) {
    throw new EncodingError("Matrix header does not state its vertex count");
  }
  const size = Number(count[1]);
  const { directed } = headerFlags(header);
  const weighted = header.startsWith("Weight matrix");
  const presence = readMatrix(lines, 1, size);
  const capacityHeader = lines.findIndex((line) => line.startsWith("Capacity matrix"));
  const capacitated = capacityHeader >= 0;
  const capacities = capacitated ? readMatrix(lines, capacityHeader + 1, size) : null;
  const edges: MutableEdge[] = [];
  for (let row = 0; row < size; row += 1) {
    for (let column = directed ? 0 : row + 1; column < size; column += 1) {
      const cell = presence[row][column];
      if (cell === 0 || row === column) {
        continue;
      }
      const edge: MutableEdge = { source: row, target: column };
      if (weighted) {
        edge.weight = cell;
      }
      if (capacities) {
        edge.capacity = capacities[row][column];
      }
      edges.push(edge);
    }
  }
  return build(size, edges, { directed, weighted, capacitated });
}

function decodeEdgeList(text: string, labels: LabelReader): GraphModel {
  const [header = "", format = "", ...rows] = nonEmptyLines(text);
  const count = /with (\d+) vertices/.exec(header);
  if (!count) {
    throw new EncodingError("Edge-list header does not state its vertex count");
  }
  const { directed } = headerFlags(header);
  const fields = /format: ([^)]*)\)/.exec(format)?.[1].split(/\s+/).slice(2) ?? [];
  const weighted = fields.includes("weight");
  const capacitated = fields.includes("capacity");
  const edges = rows.map((row) => {
    const [source = "", target = "", ...rest] = row.split(/\s+/);
    const edge: MutableEdge = { source: labels.read(source), target: labels.read(target) };
    fields.forEach((field, offset) => {
      const value = readNumber(rest[offset] ?? "", `edge ${field}`);
      if (field === "weight") {
        edge.weight = value;
      } else if (field === "capacity") {
        edge.capacity = value;
      }
    });
    return edge;
  });
  return build(Number(count[1]), edges, { directed, weighted, capacitated });
}

/** Reads a representation produced by `encode` back into a graph. */
export function decode(text: string, notation: Notation, options: DecodeOptions = {}): GraphModel {
  const labels = new LabelReader(options.vertexPrefix ?? "");
  switch (notation) {
    case "natural":
      return decodeNatural(text, labels);
    case "adjacency-list":
      return decodeAdjacencyList(text, labels);
    case "adjacency-matrix":
      return decodeAdjacencyMatrix(text);
    case "edge-list":
      return decodeEdgeList(text, labels);
    case "dsl":
      return compileSource(text).graph;
    default:
      throw new EncodingError(`Unknown notation '${String(notation)}'`);
  }
}
