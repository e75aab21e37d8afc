#!/usr/bin/env node
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadBenchmarkConfig, type BenchmarkConfig } from "../src/config/benchmark.js";
import { parseDataset } from "../src/generator/dataset.js";
import { StructuredLogger } from "../src/logger.js";
import { BenchmarkOrchestrator, type EvaluationResult } from "../src/orchestrator/benchmark.js";
import { parseRecordedAnswers, ReplayAnswerClient } from "../src/orchestrator/replay.js";
import { JsonlReportSink } from "../src/orchestrator/sink.js";

export interface EvaluateCliOptions {
  configPath?: string;
  datasetPath?: string;
  answersPath?: string;
  outputDir?: string;
  helpRequested: boolean;
  errors: string[];
}

const USAGE = `Usage: evaluate --dataset <dataset.jsonl> --answers <answers.jsonl> [--config <file>] [--output <dir>]

Scores recorded answers ({"instanceId", "notation", "response"} per line)
against the dataset and writes
  <dir>/attempts.jsonl  one scored attempt per line
  <dir>/metrics.json    accuracy by family, notation and density
`;

export function parseEvaluateArgs(argv: readonly string[]): EvaluateCliOptions {
  const options: EvaluateCliOptions = { helpRequested: false, errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const consumeValue = (): string | undefined => {
      index += 1;
      const value = argv[index];
      if (value === undefined) {
        options.errors.push(`Missing value for ${token}`);
        return undefined;
      }
      return resolve(value);
    };
    switch (token) {
      case "--help":
      case "-h":
        options.helpRequested = true;
        break;
      case "--config":
        options.configPath = consumeValue();
        break;
      case "--dataset":
        options.datasetPath = consumeValue();
        break;
      case "--answers":
        options.answersPath = consumeValue();
        break;
      case "--output":
        options.outputDir = consumeValue();
        break;
      default:
        options.errors.push(`Unknown argument: ${token}`);
    }
  }
  if (!options.helpRequested) {
    if (!options.datasetPath) {
      options.errors.push("--dataset is required");
    }
    if (!options.answersPath) {
      options.errors.push("--answers is required");
    }
  }
  return options;
}

export async function runEvaluate(
  config: BenchmarkConfig,
  paths: { datasetPath: string; answersPath: string; outputDir: string },
  logger: StructuredLogger,
): Promise<EvaluationResult> {
  const instances = parseDataset(await readFile(paths.datasetPath, "utf8"), paths.datasetPath);
  const answers = parseRecordedAnswers(await readFile(paths.answersPath, "utf8"), paths.answersPath);
  const orchestrator = new BenchmarkOrchestrator(config, { logger });

  const client = new ReplayAnswerClient(answers);

  await mkdir(paths.outputDir, { recursive: true });
  const attemptsPath = join(paths.outputDir, "attempts.jsonl");
  await rm(attemptsPath, { force: true });
  const result = await orchestrator.evaluate(client, instances, new JsonlReportSink(attemptsPath));
  await writeFile(join(paths.outputDir, "metrics.json"), `${JSON.stringify(result.metrics, null, 2)}\n`, "utf8");
  return result;
}

async function main(): Promise<void> {
  const options = parseEvaluateArgs(process.argv.slice(2));
  if (options.helpRequested) {
    process.stdout.write(USAGE);
    return;
  }
  const { datasetPath, answersPath } = options;
  if (options.errors.length > 0 || !datasetPath || !answersPath) {
    process.stderr.write(`${options.errors.join("\n")}\n\n${USAGE}`);
    process.exitCode = 64;
    return;
  }
  const config = await loadBenchmarkConfig(options.configPath);
  const outputDir = options.outputDir ?? resolve(config.outputDir);
  const logger = new StructuredLogger({ logFile: join(outputDir, "evaluate.log") });
  const result = await runEvaluate(config, { datasetPath, answersPath, outputDir }, logger);
  await logger.flush();
  process.stdout.write(`Overall accuracy: ${result.metrics.overall.accuracy.toFixed(4)} over ${result.metrics.overall.total} attempts\n`);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  main().catch((error) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
