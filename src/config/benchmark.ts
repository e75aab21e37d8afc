import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import YAML from "yaml";
import { z } from "zod";

import { NOTATIONS } from "../encoder/index.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_GENERATION_ATTEMPTS } from "../generator/instance.js";
import { DENSITIES, FAMILY_IDS } from "../families/types.js";
import { readOptionalEnumList, readOptionalInt, readOptionalString } from "./env.js";

const sizeOverrideSchema = z
  .object({
    vertices: z.number().int().min(1).max(200).optional(),
    edges: z.number().int().min(0).optional(),
  })
  .strict();

/**
 * Benchmark run description. Every field has a default, so an empty document
 * describes the full grid: all families, each at its default densities, five
 * instances per cell, in every notation.
 */
export const benchmarkConfigSchema = z
  .object({
    families: z.array(z.enum(FAMILY_IDS)).min(1).default([...FAMILY_IDS]),
    /** Densities to sample; when omitted each family uses its own defaults. */
    densities: z.array(z.enum(DENSITIES)).min(1).optional(),
    instancesPerCombination: z.number().int().min(1).max(10_000).default(5),
    notations: z.array(z.enum(NOTATIONS)).min(1).default([...NOTATIONS]),
    baseSeed: z.number().int().nonnegative().max(0xffffffff).default(42),
    sizes: z.record(z.enum(FAMILY_IDS), sizeOverrideSchema).default({}),
    vertexPrefix: z
      .string()
      .regex(/^[A-Za-z_]*$/, "vertex prefix may only contain letters and underscores")
      .default(""),
    graphName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default("G"),
    maxNaturalEdges: z.number().int().min(1).default(400),
    generationAttempts: z.number().int().min(1).max(1_000).default(DEFAULT_GENERATION_ATTEMPTS),
    concurrency: z.number().int().min(1).max(256).default(4),
    maxRetries: z.number().int().min(0).max(20).default(3),
    timeoutMs: z.number().int().min(1).default(60_000),
    minIntervalMs: z.number().int().min(0).default(0),
    outputDir: z.string().min(1).default("runs"),
  })
  .strict();

export type BenchmarkConfig = z.output<typeof benchmarkConfigSchema>;
export type BenchmarkConfigInput = z.input<typeof benchmarkConfigSchema>;

export function parseBenchmarkConfig(data: unknown, source = "<inline>"): BenchmarkConfig {
  const parsed = benchmarkConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid benchmark configuration in ${source}: ${message}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Applies `GRAPHBENCH_*` environment overrides. Malformed values are ignored
 * and the configured value kept.
 */
export function applyEnvOverrides(config: BenchmarkConfig): BenchmarkConfig {
  return {
    ...config,
    families: readOptionalEnumList("GRAPHBENCH_FAMILIES", FAMILY_IDS) ?? config.families,
    notations: readOptionalEnumList("GRAPHBENCH_NOTATIONS", NOTATIONS) ?? config.notations,
    baseSeed: readOptionalInt("GRAPHBENCH_SEED", { min: 0, max: 0xffffffff }) ?? config.baseSeed,
    concurrency: readOptionalInt("GRAPHBENCH_CONCURRENCY", { min: 1, max: 256 }) ?? config.concurrency,
    maxRetries: readOptionalInt("GRAPHBENCH_MAX_RETRIES", { min: 0, max: 20 }) ?? config.maxRetries,
    timeoutMs: readOptionalInt("GRAPHBENCH_TIMEOUT_MS", { min: 1 }) ?? config.timeoutMs,
    minIntervalMs: readOptionalInt("GRAPHBENCH_MIN_INTERVAL_MS", { min: 0 }) ?? config.minIntervalMs,
    outputDir: readOptionalString("GRAPHBENCH_OUTPUT_DIR") ?? config.outputDir,
  };
}

/**
 * Reads a configuration file (JSON by extension, YAML otherwise) and layers
 * the environment on top. Without a path the defaults are used.
 */
export async function loadBenchmarkConfig(filePath?: string): Promise<BenchmarkConfig> {
  if (!filePath) {
    return applyEnvOverrides(parseBenchmarkConfig({}, "<defaults>"));
  }
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read benchmark configuration ${filePath}`, { cause: error });
  }
  let raw: unknown;
  try {
    raw = extname(filePath).toLowerCase() === ".json" ? JSON.parse(contents) : YAML.parse(contents);
  } catch (error) {
    throw new ConfigError(`Benchmark configuration ${filePath} is not valid ${extname(filePath) || "YAML"}`, { cause: error });
  }
  return applyEnvOverrides(parseBenchmarkConfig(raw, filePath));
}
