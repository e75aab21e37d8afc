#!/usr/bin/env node
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadBenchmarkConfig, type BenchmarkConfig } from "../src/config/benchmark.js";
import type { Notation } from "../src/encoder/index.js";
import { formatDataset } from "../src/generator/dataset.js";
import { StructuredLogger } from "../src/logger.js";
import { BenchmarkOrchestrator } from "../src/orchestrator/benchmark.js";
import { buildPrompt } from "../src/orchestrator/prompt.js";

export interface GenerateCliOptions {
  configPath?: string;
  outputDir?: string;
  helpRequested: boolean;
  errors: string[];
}

export interface GenerateSummary {
  readonly outputDir: string;
  readonly instances: number;
  readonly skipped: number;
  readonly prompts: number;
}

const USAGE = `Usage: generate [--config <file>] [--output <dir>]

Builds the benchmark dataset and writes
  <dir>/dataset.jsonl            instances with graph and ground truth
  <dir>/prompts/<notation>.jsonl one prompt per instance
  <dir>/skipped.json             cells that could not be generated
`;

export function parseGenerateArgs(argv: readonly string[]): GenerateCliOptions {
  const options: GenerateCliOptions = { helpRequested: false, errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const consumeValue = (): string | undefined => {
      index += 1;
      const value = argv[index];
      if (value === undefined) {
        options.errors.push(`Missing value for ${token}`);
      }
      return value;
    };
    switch (token) {
      case "--help":
      case "-h":
        options.helpRequested = true;
        break;
      case "--config": {
        const value = consumeValue();
        if (value) {
          options.configPath = resolve(value);
        }
        break;
      }
      case "--output": {
        const value = consumeValue();
        if (value) {
          options.outputDir = resolve(value);
        }
        break;
      }
      default:
        options.errors.push(`Unknown argument: ${token}`);
    }
  }
  return options;
}

export async function runGenerate(config: BenchmarkConfig, outputDir: string, logger: StructuredLogger): Promise<GenerateSummary> {
  const orchestrator = new BenchmarkOrchestrator(config, { logger });
  const dataset = orchestrator.buildDataset();

  await mkdir(join(outputDir, "prompts"), { recursive: true });
  await writeFile(join(outputDir, "dataset.jsonl"), formatDataset(dataset.instances), "utf8");
  await writeFile(join(outputDir, "skipped.json"), `${JSON.stringify(dataset.skipped, null, 2)}\n`, "utf8");

  const lines = new Map<Notation, string[]>(config.notations.map((notation): [Notation, string[]] => [notation, []]));
  let prompts = 0;
  for (const instance of dataset.instances) {
    for (const representation of orchestrator.representationsOf(instance)) {
      const prompt = buildPrompt(instance.family, instance.params, representation, config.vertexPrefix);
      lines.get(representation.notation)?.push(
        JSON.stringify({
          instanceId: instance.id,
          index: instance.index,
          family: instance.family,
          density: instance.density,
          notation: representation.notation,
          prompt,
        }),
      );
      prompts += 1;
    }
  }
  for (const [notation, entries] of lines) {
    await writeFile(join(outputDir, "prompts", `${notation}.jsonl`), entries.map((entry) => `${entry}\n`).join(""), "utf8");
  }

  logger.info("dataset_written", { output_dir: outputDir, instances: dataset.instances.length, prompts });
  return { outputDir, instances: dataset.instances.length, skipped: dataset.skipped.length, prompts };
}

async function main(): Promise<void> {
  const options = parseGenerateArgs(process.argv.slice(2));
  if (options.helpRequested) {
    process.stdout.write(USAGE);
    return;
  }
  if (options.errors.length > 0) {
    process.stderr.write(`${options.errors.join("\n")}\n\n${USAGE}`);
    process.exitCode = 64;
    return;
  }
  const config = await loadBenchmarkConfig(options.configPath);
  const outputDir = options.outputDir ?? resolve(config.outputDir);
  const logger = new StructuredLogger({ logFile: join(outputDir, "generate.log") });
  await runGenerate(config, outputDir, logger);
  await logger.flush();
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  main().catch((error) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
