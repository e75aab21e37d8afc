import { GraphEdgeData, GraphModel } from "./model.js";

export interface PrintOptions {
  /** Graph name emitted after the `graph` keyword; must be a DSL identifier. */
  readonly name?: string;
  /** Indentation unit, two spaces by default. */
  readonly indent?: string;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Renders a graph as DSL source that {@link compileSource} turns back into an
 * identical model. Every flag is written as a directive so isolated vertices
 * and attribute-free graphs keep their shape.
 */
export function printGraph(graph: GraphModel, options: PrintOptions = {}): string {
  const name = options.name ?? "G";
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Graph name '${name}' is not a valid identifier`);
  }
  const indent = options.indent ?? "  ";
  const lines: string[] = [`graph ${name} {`];
  lines.push(`${indent}directive directed ${graph.directed}`);
  lines.push(`${indent}directive weighted ${graph.weighted}`);
  lines.push(`${indent}directive capacitated ${graph.capacitated}`);
  for (const vertex of graph.listVertices()) {
    lines.push(`${indent}node ${vertex}`);
  }
  const connector = graph.directed ? "->" : "--";
  for (const edge of graph.listEdges()) {
    lines.push(`${indent}edge ${edge.source} ${connector} ${edge.target}${formatAttributes(edge)}`);
  }
  lines.push("}");
  return `${lines.join("\n")}\n`;
}

function formatAttributes(edge: GraphEdgeData): string {
  const parts: string[] = [];
  if (edge.weight !== undefined) {
    parts.push(`weight: ${edge.weight}`);
  }
  if (edge.capacity !== undefined) {
    parts.push(`capacity: ${edge.capacity}`);
  }
  return parts.length === 0 ? "" : ` { ${parts.join(", ")} }`;
}
