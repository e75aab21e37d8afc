import type { GraphModel, VertexId } from "../../graph-kit/src/index.js";
import { SolverInfeasible } from "../errors.js";
import type { AnswerOf, CanonicalAnswer, QueryParams } from "../families/types.js";

export type Solver = (graph: GraphModel, params: QueryParams) => CanonicalAnswer;

export function booleanAnswer(value: boolean): AnswerOf<"boolean"> {
  return { kind: "boolean", value };
}

export function scalarAnswer(value: number): AnswerOf<"scalar"> {
  return { kind: "scalar", value };
}

export function sequenceAnswer(vertices: readonly VertexId[]): AnswerOf<"sequence"> {
  return { kind: "sequence", vertices: [...vertices] };
}

export function pathAnswer(vertices: readonly VertexId[], cost: number): AnswerOf<"path"> {
  return { kind: "path", vertices: [...vertices], cost };
}

export function vertexSetAnswer(vertices: Iterable<VertexId>): AnswerOf<"vertex-set"> {
  return { kind: "vertex-set", vertices: [...new Set(vertices)].sort((left, right) => left - right) };
}

export function coloringAnswer(colors: readonly number[]): AnswerOf<"coloring"> {
  return { kind: "coloring", colors: [...colors] };
}

/** Returns both query vertices or reports the instance as malformed. */
export function requirePair(graph: GraphModel, params: QueryParams): { source: VertexId; target: VertexId } {
  const { source, target } = params;
  if (source === undefined || target === undefined) {
    throw new SolverInfeasible("Query requires two designated vertices");
  }
  if (!graph.hasVertex(source) || !graph.hasVertex(target)) {
    throw new SolverInfeasible(`Query vertices (${source}, ${target}) are outside the graph`);
  }
  if (source === target) {
    throw new SolverInfeasible(`Query vertices must differ but both are ${source}`);
  }
  return { source, target };
}

/** Converts an exact count to a number, refusing values past 2^53. */
export function safeCount(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new SolverInfeasible(`Count ${value} exceeds the exactly representable range`);
  }
  return Number(value);
}
