import type { GraphModel } from "../../graph-kit/src/index.js";
import { GenerationFailure, SolverInfeasible } from "../errors.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { CanonicalAnswer, Density, FamilyId, QueryParams, SizeParams } from "../families/types.js";
import { solve } from "../solver/index.js";
import { generateGraph } from "./index.js";
import { SeededRandom } from "./random.js";

/** Draws allowed per instance before generation is declared failed. */
export const DEFAULT_GENERATION_ATTEMPTS = 25;

export interface Instance {
  readonly id: string;
  /** Position in the benchmark plan; output is ordered by it. */
  readonly index: number;
  readonly family: FamilyId;
  readonly density: Density;
  readonly size: Required<SizeParams>;
  readonly graph: GraphModel;
  readonly params: QueryParams;
  readonly groundTruth: CanonicalAnswer;
  /** Seed of the accepted draw; `generateGraph(family, size, seed)` reproduces the graph. */
  readonly seed: number;
}

export interface BuildInstanceOptions {
  readonly id?: string;
  readonly index?: number;
  readonly maxAttempts?: number;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

/**
 * Generates, solves and screens an instance. A draw is rejected when its
 * solver reports the graph infeasible or the family's degeneracy check fires;
 * the next draw takes a fresh seed from the instance's own stream.
 */
export function buildInstance(
  family: FamilyId,
  size: SizeParams,
  seed: number,
  options: BuildInstanceOptions = {},
): Instance {
  const definition = FAMILY_TABLE[family];
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_GENERATION_ATTEMPTS);
  const stream = new SeededRandom(seed);
  const rejections: string[] = [];

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const attemptSeed = attempt === 0 ? seed >>> 0 : stream.nextSeed();
    const generated = generateGraph(family, size, attemptSeed);
    let groundTruth: CanonicalAnswer;
    try {
      groundTruth = solve(family, generated.graph, generated.params);
    } catch (error) {
      if (error instanceof SolverInfeasible) {
        rejections.push(error.message);
        continue;
      }
      throw error;
    }
    const reason = definition.degenerate?.(generated.graph, generated.params, groundTruth) ?? null;
    if (reason !== null) {
      rejections.push(reason);
      continue;
    }

    const index = options.index ?? 0;
    return deepFreeze({
      id: options.id ?? `${family}/${generated.size.density}/${index}`,
      index,
      family,
      density: generated.size.density,
      size: { ...generated.size },
      graph: generated.graph,
      params: { ...generated.params },
      groundTruth,
      seed: attemptSeed,
    });
  }

  throw new GenerationFailure(`Could not build a ${family} instance within ${maxAttempts} attempts`, {
    details: { family, size, seed, lastRejection: rejections.at(-1) ?? null, rejected: rejections.length },
  });
}
