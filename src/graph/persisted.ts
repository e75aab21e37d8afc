import { z } from "zod";

import { GraphModel, GraphModelError, type GraphEdgeData } from "../../graph-kit/src/index.js";

const persistedEdgeSchema = z
  .object({
    source: z.number().int().nonnegative(),
    target: z.number().int().nonnegative(),
    weight: z.number().finite().optional(),
    capacity: z.number().finite().nonnegative().optional(),
  })
  .strict();

/** On-disk graph shape shared by datasets and reports. */
export const persistedGraphSchema = z
  .object({
    directed: z.boolean(),
    weighted: z.boolean(),
    capacitated: z.boolean().default(false),
    vertices: z.array(z.number().int().nonnegative()),
    edges: z.array(persistedEdgeSchema),
  })
  .strict()
  .superRefine((value, ctx) => {
    value.vertices.forEach((vertex, index) => {
      if (vertex !== index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["vertices", index],
          message: `vertex ids must be the dense range 0..n-1 in order; found ${vertex} at position ${index}`,
        });
      }
    });
  });

export type PersistedGraph = z.output<typeof persistedGraphSchema>;

export function toPersisted(graph: GraphModel): PersistedGraph {
  return {
    directed: graph.directed,
    weighted: graph.weighted,
    capacitated: graph.capacitated,
    vertices: graph.listVertices(),
    edges: graph.listEdges().map((edge) => ({
      source: edge.source,
      target: edge.target,
      ...(edge.weight !== undefined ? { weight: edge.weight } : {}),
      ...(edge.capacity !== undefined ? { capacity: edge.capacity } : {}),
    })),
  };
}

/**
 * Validates raw JSON and rebuilds the model. Schema violations and model
 * invariant failures both surface as {@link GraphModelError}.
 */
export function fromPersisted(raw: unknown, source = "<inline>"): GraphModel {
  const parsed = persistedGraphSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new GraphModelError(`Invalid persisted graph in ${source}: ${message}`);
  }
  const { directed, weighted, capacitated, vertices, edges } = parsed.data;
  const modelEdges: GraphEdgeData[] = edges.map((edge) => ({ ...edge }));
  return new GraphModel(vertices.length, modelEdges, { directed, weighted, capacitated });
}
