import { GraphModel, type GraphEdgeData, type VertexId } from "../../graph-kit/src/index.js";
import { GenerationFailure } from "../errors.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { Density, FamilyId, FamilyShape, QueryParams, SizeParams } from "../families/types.js";
import { SeededRandom } from "./random.js";

export const WEIGHT_RANGE = { min: 1, max: 20 } as const;
export const CAPACITY_RANGE = { min: 1, max: 10 } as const;

export interface GeneratedGraph {
  readonly graph: GraphModel;
  readonly params: QueryParams;
  /** Size parameters with the edge count actually drawn. */
  readonly size: Required<SizeParams>;
}

export function maxSimpleEdges(vertices: number): number {
  return (vertices * (vertices - 1)) / 2;
}

/**
 * Inclusive edge-count range for a density: sparse graphs draw from
 * `[max(n-1, ⌊n/2⌋), 2n]`, dense graphs from `[max(n-1, ⌊n(n-5)/2⌋), n(n-1)/2]`
 * and trees use exactly `n-1`. Both bounds are clamped to the simple-graph
 * maximum.
 */
export function edgeRange(vertices: number, density: Density): { min: number; max: number } {
  const ceiling = maxSimpleEdges(vertices);
  const treeEdges = Math.max(0, vertices - 1);
  switch (density) {
    case "tree":
      return { min: treeEdges, max: treeEdges };
    case "sparse":
      return {
        min: Math.min(ceiling, Math.max(treeEdges, Math.floor(vertices / 2))),
        max: Math.min(ceiling, 2 * vertices),
      };
    case "dense":
      return {
        min: Math.min(ceiling, Math.max(treeEdges, Math.floor((vertices * (vertices - 5)) / 2))),
        max: ceiling,
      };
  }
}

type Pair = readonly [VertexId, VertexId];

class EdgeBuilder {
  private readonly keys = new Set<string>();
  readonly pairs: Pair[] = [];

  constructor(private readonly directed: boolean) {}

  private key(source: VertexId, target: VertexId): string {
    if (this.directed) {
      return `${source}>${target}`;
    }
    return source < target ? `${source}-${target}` : `${target}-${source}`;
  }

  has(source: VertexId, target: VertexId): boolean {
    return this.keys.has(this.key(source, target));
  }

  add(source: VertexId, target: VertexId): void {
    this.keys.add(this.key(source, target));
    this.pairs.push([source, target]);
  }
}

/** Attaches every vertex but 0, in random order, to a random already attached one. */
function spanningTree(builder: EdgeBuilder, vertices: number, rng: SeededRandom): void {
  const attached: VertexId[] = [0];
  const rest = rng.shuffle(Array.from({ length: Math.max(0, vertices - 1) }, (_, index) => index + 1));
  for (const vertex of rest) {
    builder.add(rng.pick(attached), vertex);
    attached.push(vertex);
  }
}

/** Adds random absent edges until `count` edges exist. Orientation is random for directed graphs. */
function fillRandom(builder: EdgeBuilder, vertices: number, count: number, directed: boolean, rng: SeededRandom): void {
  const candidates: Pair[] = [];
  for (let left = 0; left < vertices; left += 1) {
    for (let right = left + 1; right < vertices; right += 1) {
      if (!builder.has(left, right) && !builder.has(right, left)) {
        candidates.push([left, right]);
      }
    }
  }
  for (const [left, right] of rng.shuffle(candidates)) {
    if (builder.pairs.length >= count) {
      break;
    }
    if (directed && rng.next() < 0.5) {
      builder.add(right, left);
    } else {
      builder.add(left, right);
    }
  }
}

/** Edges point from earlier to later positions of a random vertex permutation. */
function fillAcyclic(builder: EdgeBuilder, vertices: number, count: number, rng: SeededRandom): void {
  const order = rng.shuffle(Array.from({ length: vertices }, (_, index) => index));
  const candidates: Pair[] = [];
  for (let early = 0; early < vertices; early += 1) {
    for (let late = early + 1; late < vertices; late += 1) {
      candidates.push([order[early], order[late]]);
    }
  }
  for (const [source, target] of rng.shuffle(candidates).slice(0, count)) {
    builder.add(source, target);
  }
}

function materialise(pairs: readonly Pair[], vertices: number, shape: FamilyShape, rng: SeededRandom): GraphModel {
  const edges: GraphEdgeData[] = pairs
    .map(([source, target]) =>
      shape.directed || source < target ? { source, target } : { source: target, target: source },
    )
    .sort((left, right) => left.source - right.source || left.target - right.target)
    .map((edge) => ({
      ...edge,
      ...(shape.weighted ? { weight: rng.int(WEIGHT_RANGE.min, WEIGHT_RANGE.max) } : {}),
      ...(shape.capacitated ? { capacity: rng.int(CAPACITY_RANGE.min, CAPACITY_RANGE.max) } : {}),
    }));
  return new GraphModel(vertices, edges, {
    directed: shape.directed,
    weighted: shape.weighted,
    capacitated: shape.capacitated,
  });
}

/**
 * Builds a graph for `family` from `seed`. Identical inputs always produce the
 * same graph and query vertices.
 */
export function generateGraph(family: FamilyId, size: SizeParams, seed: number): GeneratedGraph {
  const definition = FAMILY_TABLE[family];
  const { shape } = definition;
  const vertices = size.vertices;
  if (!Number.isInteger(vertices) || vertices < 1) {
    throw new GenerationFailure(`Vertex count must be a positive integer but received ${vertices}`);
  }
  if (definition.endpoints !== "none" && vertices < 2) {
    throw new GenerationFailure(`${family} needs at least two vertices to place its query`);
  }

  const rng = new SeededRandom(seed);
  const structure = shape.structure;
  const density: Density = structure === "tree" ? "tree" : size.density === "tree" ? "sparse" : size.density;
  const range = edgeRange(vertices, density);
  let edgeCount = size.edges ?? rng.int(range.min, range.max);
  if (structure === "tree") {
    edgeCount = vertices - 1;
  }
  if (edgeCount < 0 || edgeCount > maxSimpleEdges(vertices)) {
    throw new GenerationFailure(`Cannot place ${edgeCount} edges on ${vertices} vertices`);
  }
  if ((structure === "connected" || structure === "tree") && edgeCount < vertices - 1) {
    throw new GenerationFailure(`A connected graph on ${vertices} vertices needs at least ${vertices - 1} edges`);
  }

  const builder = new EdgeBuilder(shape.directed);
  switch (structure) {
    case "tree":
      spanningTree(builder, vertices, rng);
      break;
    case "connected":
      spanningTree(builder, vertices, rng);
      fillRandom(builder, vertices, edgeCount, shape.directed, rng);
      break;
    case "any":
      fillRandom(builder, vertices, edgeCount, shape.directed, rng);
      break;
    case "dag":
      fillAcyclic(builder, vertices, edgeCount, rng);
      break;
  }

  const graph = materialise(builder.pairs, vertices, shape, rng);
  let params: QueryParams = {};
  if (definition.endpoints !== "none") {
    const source = rng.int(0, vertices - 1);
    let target = rng.int(0, vertices - 2);
    if (target >= source) {
      target += 1;
    }
    params = { source, target };
  }

  return { graph, params, size: { vertices, density, edges: graph.edgeCount } };
}
