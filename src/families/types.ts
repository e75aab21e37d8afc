import type { GraphModel, VertexId } from "../../graph-kit/src/index.js";

export const FAMILY_IDS = [
  "connectivity",
  "bipartite",
  "minimum-cycle",
  "maximum-clique",
  "maximum-independent-set",
  "minimum-vertex-cover",
  "eulerian-path",
  "eulerian-circuit",
  "hamiltonian-path",
  "hamiltonian-circuit",
  "biconnected-components",
  "bridge-count",
  "articulation-points",
  "triangle-count",
  "cycle-count",
  "spanning-tree-count",
  "connected-components",
  "graph-diameter",
  "common-neighbors",
  "degeneracy",
  "maximum-matching",
  "chromatic-number",
  "graph-coloring",
  "shortest-path",
  "shortest-path-length",
  "minimum-spanning-tree",
  "second-mst",
  "tree-diameter",
  "tree-centroid",
  "tree-lca",
  "tree-max-independent-set",
  "maximum-flow",
  "minimum-cut",
  "min-cost-max-flow",
  "cycle-detection",
  "strongly-connected-components",
  "topological-sort",
  "longest-path-dag",
] as const;

export type FamilyId = (typeof FAMILY_IDS)[number];

export const DENSITIES = ["sparse", "dense", "tree"] as const;
export type Density = (typeof DENSITIES)[number];

export type Structure = "any" | "connected" | "tree" | "dag";

export interface FamilyShape {
  readonly directed: boolean;
  readonly weighted: boolean;
  readonly capacitated: boolean;
  readonly structure: Structure;
}

/** `pair` families query two vertices, `source-sink` families a flow source and sink. */
export type EndpointRequirement = "none" | "pair" | "source-sink";

export interface SizeParams {
  readonly vertices: number;
  readonly density: Density;
  /** Explicit edge count; drawn from the density range when omitted. */
  readonly edges?: number;
}

/** Query parameters attached to a generated graph. */
export interface QueryParams {
  readonly source?: VertexId;
  readonly target?: VertexId;
}

export type CanonicalAnswer =
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "scalar"; readonly value: number }
  | { readonly kind: "sequence"; readonly vertices: readonly VertexId[] }
  /** `cost` is `null` only on parsed answers that state no cost. */
  | { readonly kind: "path"; readonly vertices: readonly VertexId[]; readonly cost: number | null }
  | { readonly kind: "vertex-set"; readonly vertices: readonly VertexId[] }
  | { readonly kind: "coloring"; readonly colors: readonly number[] };

export type AnswerKind = CanonicalAnswer["kind"];

export type AnswerOf<K extends AnswerKind> = Extract<CanonicalAnswer, { kind: K }>;

export type ComparatorSpec =
  | { readonly kind: "exact" }
  | { readonly kind: "numeric-tolerance"; readonly tolerance: number }
  | { readonly kind: "unordered-set" }
  /** `anchored` paths must start at `source` and end at `target`. */
  | { readonly kind: "path-cost"; readonly anchored: boolean }
  | { readonly kind: "topological-order" }
  | { readonly kind: "proper-coloring" };

export interface FamilyDefaults {
  readonly vertices: number;
  readonly densities: readonly Density[];
}

/**
 * One row of the family table: how instances are shaped, asked, solved and
 * compared.
 */
export interface FamilyDefinition {
  readonly id: FamilyId;
  readonly title: string;
  readonly shape: FamilyShape;
  readonly defaults: FamilyDefaults;
  readonly endpoints: EndpointRequirement;
  readonly answer: AnswerKind;
  readonly comparator: ComparatorSpec;
  /** Question text; refers to vertices through `label`. */
  question(params: QueryParams, label: (vertex: VertexId) => string): string;
  solve(graph: GraphModel, params: QueryParams): CanonicalAnswer;
  /** Returns a reason when the instance is too trivial to keep. */
  degenerate?(graph: GraphModel, params: QueryParams, answer: CanonicalAnswer): string | null;
}

export type FamilyTable = { readonly [K in FamilyId]: FamilyDefinition & { readonly id: K } };
