import { z } from "zod";

import { GraphModelError } from "../../graph-kit/src/index.js";
import { DENSITIES, FAMILY_IDS, type CanonicalAnswer } from "../families/types.js";
import { fromPersisted, persistedGraphSchema, toPersisted } from "../graph/persisted.js";
import type { Instance } from "./instance.js";

const vertexList = z.array(z.number().int().nonnegative());

const canonicalAnswerSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("boolean"), value: z.boolean() }),
  z.object({ kind: z.literal("scalar"), value: z.number().finite() }),
  z.object({ kind: z.literal("sequence"), vertices: vertexList }),
  z.object({ kind: z.literal("path"), vertices: vertexList, cost: z.number().finite().nullable() }),
  z.object({ kind: z.literal("vertex-set"), vertices: vertexList }),
  z.object({ kind: z.literal("coloring"), colors: z.array(z.number().int()) }),
]);

/** One line of a dataset file: an instance with its graph and ground truth. */
export const instanceRecordSchema = z
  .object({
    id: z.string().min(1),
    index: z.number().int().nonnegative(),
    family: z.enum(FAMILY_IDS),
    density: z.enum(DENSITIES),
    size: z.object({
      vertices: z.number().int().min(1),
      density: z.enum(DENSITIES),
      edges: z.number().int().nonnegative(),
    }),
    seed: z.number().int().nonnegative(),
    params: z.object({
      source: z.number().int().nonnegative().optional(),
      target: z.number().int().nonnegative().optional(),
    }),
    groundTruth: canonicalAnswerSchema,
    graph: persistedGraphSchema,
  })
  .strict();

export type InstanceRecord = z.output<typeof instanceRecordSchema>;

export function toInstanceRecord(instance: Instance): InstanceRecord {
  return {
    id: instance.id,
    index: instance.index,
    family: instance.family,
    density: instance.density,
    size: { ...instance.size },
    seed: instance.seed,
    params: { ...instance.params },
    groundTruth: cloneAnswer(instance.groundTruth),
    graph: toPersisted(instance.graph),
  };
}

function cloneAnswer(answer: CanonicalAnswer): InstanceRecord["groundTruth"] {
  switch (answer.kind) {
    case "boolean":
    case "scalar":
      return { ...answer };
    case "sequence":
    case "vertex-set":
      return { kind: answer.kind, vertices: [...answer.vertices] };
    case "path":
      return { kind: "path", vertices: [...answer.vertices], cost: answer.cost };
    case "coloring":
      return { kind: "coloring", colors: [...answer.colors] };
  }
}

export function fromInstanceRecord(raw: unknown, source = "<inline>"): Instance {
  const parsed = instanceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new GraphModelError(`Invalid instance record in ${source}: ${message}`);
  }
  const { graph, ...rest } = parsed.data;
  return { ...rest, graph: fromPersisted(graph, source) };
}

/** Serialises instances as JSON lines, one instance per line. */
export function formatDataset(instances: readonly Instance[]): string {
  return instances.map((instance) => `${JSON.stringify(toInstanceRecord(instance))}\n`).join("");
}

export function parseDataset(contents: string, source = "<inline>"): Instance[] {
  return contents
    .split(/\r?\n/)
    .map((line, lineIndex) => ({ line: line.trim(), lineIndex }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineIndex }) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw new GraphModelError(`Line ${lineIndex + 1} of ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
      }
      return fromInstanceRecord(raw, `${source}:${lineIndex + 1}`);
    });
}
