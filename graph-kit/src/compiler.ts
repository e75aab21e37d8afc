import {
  AttributeNode,
  DirectiveNode,
  EdgeDeclNode,
  GraphFileNode,
  GraphNode,
  NodeDeclNode,
  ValueNode,
  parse
} from "./parser.js";
import { GraphEdgeData, GraphFlags, GraphModel, GraphModelError } from "./model.js";

export interface CompileOptions {
  readonly entryGraph?: string;
}

export interface CompiledGraph {
  readonly name: string;
  readonly graph: GraphModel;
}

export class CompileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompileError";
  }
}

type DirectiveValue = string | number | boolean;

const FLAG_DIRECTIVES = new Set(["directed", "weighted", "capacitated"]);
const EDGE_ATTRIBUTES = new Set(["weight", "capacity"]);

export function compileSource(source: string, options: CompileOptions = {}): CompiledGraph {
  const ast = parse(source);
  return compileAst(ast, options);
}

export function compileAst(ast: GraphFileNode, options: CompileOptions = {}): CompiledGraph {
  if (ast.graphs.length === 0) {
    throw new CompileError("No graphs declared in source");
  }
  const target = options.entryGraph
    ? ast.graphs.find((graph) => graph.name === options.entryGraph)
    : ast.graphs[0];
  if (!target) {
    throw new CompileError(`Graph '${options.entryGraph}' not found`);
  }
  return compileGraphNode(target);
}

export function compileGraphNode(graph: GraphNode): CompiledGraph {
  const vertexCount = checkNodeRange(graph.nodes);
  const directives = buildDirectiveMap(graph.directives);
  const flags = resolveFlags(graph, directives);
  const edges = graph.edges.map((edge) => toEdgeData(edge, vertexCount, flags));
  try {
    return { name: graph.name, graph: new GraphModel(vertexCount, edges, flags) };
  } catch (error) {
    if (error instanceof GraphModelError) {
      throw new CompileError(`Graph '${graph.name}' is invalid: ${error.message}`);
    }
    throw error;
  }
}

/** Node declarations must enumerate `0..n-1` without gaps or repeats. */
function checkNodeRange(nodes: NodeDeclNode[]): number {
  const seen = new Map<number, NodeDeclNode>();
  for (const node of nodes) {
    const prev = seen.get(node.id);
    if (prev) {
      throw new CompileError(
        `Duplicate node '${node.id}' (line ${node.idToken.line}, column ${node.idToken.column}); previously defined at line ${prev.idToken.line}`
      );
    }
    seen.set(node.id, node);
  }
  for (let id = 0; id < nodes.length; id += 1) {
    if (!seen.has(id)) {
      throw new CompileError(`Node ids must form the range 0..${nodes.length - 1}; '${id}' is missing`);
    }
  }
  return nodes.length;
}

function buildDirectiveMap(directives: DirectiveNode[]): Map<string, DirectiveValue> {
  const map = new Map<string, DirectiveValue>();
  for (const directive of directives) {
    if (map.has(directive.name)) {
      throw new CompileError(
        `Duplicate directive '${directive.name}' (line ${directive.nameToken.line}, column ${directive.nameToken.column})`
      );
    }
    if (FLAG_DIRECTIVES.has(directive.name) && directive.value.kind !== "boolean") {
      throw new CompileError(`Directive '${directive.name}' expects true or false (line ${directive.nameToken.line})`);
    }
    map.set(directive.name, toPrimitive(directive.value));
  }
  return map;
}

/**
 * Explicit directives win; otherwise directedness follows the edge connectors
 * and the attribute flags follow the attributes present on the edges.
 */
function resolveFlags(graph: GraphNode, directives: Map<string, DirectiveValue>): GraphFlags {
  const connectors = new Set(graph.edges.map((edge) => edge.connector));
  if (connectors.size > 1) {
    throw new CompileError(`Graph '${graph.name}' mixes '->' and '--' edges`);
  }
  const declaredDirected = directives.get("directed");
  const directed = typeof declaredDirected === "boolean" ? declaredDirected : connectors.has("directed");
  const expected = directed ? "directed" : "undirected";
  for (const edge of graph.edges) {
    if (edge.connector !== expected) {
      throw new CompileError(
        `Edge ${edge.from} ${edge.connector === "directed" ? "->" : "--"} ${edge.to} contradicts 'directed ${directed}' (line ${edge.fromToken.line})`
      );
    }
  }
  const hasAttribute = (key: string) => graph.edges.some((edge) => edge.attributes.some((attr) => attr.key === key));
  const declaredWeighted = directives.get("weighted");
  const declaredCapacitated = directives.get("capacitated");
  return {
    directed,
    weighted: typeof declaredWeighted === "boolean" ? declaredWeighted : hasAttribute("weight"),
    capacitated: typeof declaredCapacitated === "boolean" ? declaredCapacitated : hasAttribute("capacity")
  };
}

function toEdgeData(edge: EdgeDeclNode, vertexCount: number, flags: GraphFlags): GraphEdgeData {
  if (edge.from >= vertexCount) {
    throw new CompileError(
      `Edge references unknown source node '${edge.from}' (line ${edge.fromToken.line}, column ${edge.fromToken.column})`
    );
  }
  if (edge.to >= vertexCount) {
    throw new CompileError(
      `Edge references unknown destination node '${edge.to}' (line ${edge.toToken.line}, column ${edge.toToken.column})`
    );
  }
  const attributes = foldAttributes(edge.attributes);
  const data: { source: number; target: number; weight?: number; capacity?: number } = {
    source: edge.from,
    target: edge.to
  };
  if (flags.weighted) {
    data.weight = requireAttribute(edge, attributes, "weight");
  }
  if (flags.capacitated) {
    data.capacity = requireAttribute(edge, attributes, "capacity");
  }
  return data;
}

function requireAttribute(edge: EdgeDeclNode, attributes: Map<string, number>, key: string): number {
  const value = attributes.get(key);
  if (value === undefined) {
    throw new CompileError(`Edge ${edge.from} -> ${edge.to} is missing '${key}' (line ${edge.fromToken.line})`);
  }
  return value;
}

function foldAttributes(attributes: AttributeNode[]): Map<string, number> {
  const result = new Map<string, number>();
  for (const attribute of attributes) {
    if (!EDGE_ATTRIBUTES.has(attribute.key)) {
      throw new CompileError(
        `Unknown edge attribute '${attribute.key}' (line ${attribute.keyToken.line}, column ${attribute.keyToken.column})`
      );
    }
    if (result.has(attribute.key)) {
      throw new CompileError(
        `Duplicate attribute '${attribute.key}' (line ${attribute.keyToken.line}, column ${attribute.keyToken.column})`
      );
    }
    if (attribute.value.kind !== "number") {
      throw new CompileError(`Attribute '${attribute.key}' must be numeric (line ${attribute.keyToken.line})`);
    }
    result.set(attribute.key, attribute.value.value);
  }
  return result;
}

function toPrimitive(node: ValueNode): DirectiveValue {
  switch (node.kind) {
    case "number":
      return node.value;
    case "boolean":
      return node.value;
    case "identifier":
      return node.value;
    default: {
      const exhaustive: never = node;
      return exhaustive;
    }
  }
}
