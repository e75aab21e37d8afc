import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { parseEvaluateArgs, runEvaluate } from "../scripts/evaluate.js";
import { parseGenerateArgs, runGenerate } from "../scripts/generate.js";
import { parseBenchmarkConfig } from "../src/config/benchmark.js";
import { parseDataset } from "../src/generator/dataset.js";
import { StructuredLogger } from "../src/logger.js";

interface PromptLine {
  instanceId: string;
  notation: string;
  prompt: string;
}

function isPromptLine(value: unknown): value is PromptLine {
  return (
    typeof value === "object" &&
    value !== null &&
    "instanceId" in value &&
    typeof value.instanceId === "string" &&
    "notation" in value &&
    typeof value.notation === "string" &&
    "prompt" in value &&
    typeof value.prompt === "string"
  );
}

function readPromptLines(contents: string): PromptLine[] {
  return contents
    .trim()
    .split("\n")
    .map((line): unknown => JSON.parse(line))
    .map((value) => {
      if (!isPromptLine(value)) {
        throw new Error("malformed prompt line");
      }
      return value;
    });
}

describe("command line arguments", () => {
  it("parses generate flags and collects errors", () => {
    expect(parseGenerateArgs(["--config", "bench.yaml", "--output", "out"])).to.deep.equal({
      helpRequested: false,
      errors: [],
      configPath: path.resolve("bench.yaml"),
      outputDir: path.resolve("out"),
    });
    expect(parseGenerateArgs(["--output"]).errors).to.deep.equal(["Missing value for --output"]);
    expect(parseGenerateArgs(["--bogus", "-h"])).to.deep.equal({
      helpRequested: true,
      errors: ["Unknown argument: --bogus"],
    });
  });

  it("requires the dataset and answers for evaluation", () => {
    expect(parseEvaluateArgs([]).errors).to.deep.equal(["--dataset is required", "--answers is required"]);
    expect(parseEvaluateArgs(["--help"]).errors).to.deep.equal([]);
    expect(parseEvaluateArgs(["--dataset", "d.jsonl", "--answers", "a.jsonl"])).to.deep.equal({
      helpRequested: false,
      errors: [],
      datasetPath: path.resolve("d.jsonl"),
      answersPath: path.resolve("a.jsonl"),
    });
  });
});

describe("generate then evaluate", () => {
  it("writes a dataset with prompts and scores recorded answers against it", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "graphbench-cli-"));
    try {
      const config = parseBenchmarkConfig({
        families: ["bipartite"],
        instancesPerCombination: 1,
        notations: ["edge-list", "natural"],
        sizes: { bipartite: { vertices: 5 } },
      });
      const logger = new StructuredLogger({ silent: true });
      const outputDir = path.join(directory, "run");

      const summary = await runGenerate(config, outputDir, logger);
      expect(summary).to.deep.equal({ outputDir, instances: 2, skipped: 0, prompts: 4 });
      expect(await readFile(path.join(outputDir, "skipped.json"), "utf8")).to.equal("[]\n");

      const instances = parseDataset(await readFile(path.join(outputDir, "dataset.jsonl"), "utf8"));
      expect(instances.map((instance) => instance.id)).to.deep.equal(["bipartite/sparse/0", "bipartite/dense/1"]);

      const prompts = [
        ...readPromptLines(await readFile(path.join(outputDir, "prompts", "edge-list.jsonl"), "utf8")),
        ...readPromptLines(await readFile(path.join(outputDir, "prompts", "natural.jsonl"), "utf8")),
      ];
      expect(prompts.map((line) => `${line.instanceId}#${line.notation}`)).to.deep.equal([
        "bipartite/sparse/0#edge-list",
        "bipartite/dense/1#edge-list",
        "bipartite/sparse/0#natural",
        "bipartite/dense/1#natural",
      ]);

      const truth = new Map(
        instances.map((instance) => [instance.id, instance.groundTruth.kind === "boolean" && instance.groundTruth.value]),
      );
      const answers = prompts.map((line, position) => {
        const right = truth.get(line.instanceId) === true ? "yes" : "no";
        const wrong = right === "yes" ? "no" : "yes";
        return JSON.stringify({
          instanceId: line.instanceId,
          notation: line.notation,
          response: `Final answer: ${position === 3 ? wrong : right}`,
        });
      });
      const answersPath = path.join(directory, "answers.jsonl");
      await writeFile(answersPath, `${answers.join("\n")}\n`, "utf8");

      const result = await runEvaluate(
        config,
        { datasetPath: path.join(outputDir, "dataset.jsonl"), answersPath, outputDir },
        logger,
      );

      expect(result.attempts.map((attempt) => `${attempt.instanceId}#${attempt.notation}`)).to.deep.equal([
        "bipartite/sparse/0#natural",
        "bipartite/sparse/0#edge-list",
        "bipartite/dense/1#natural",
        "bipartite/dense/1#edge-list",
      ]);
      expect(result.attempts.map((attempt) => attempt.correct)).to.deep.equal([true, true, false, true]);
      expect(result.metrics.overall).to.deep.equal({ total: 4, correct: 3, accuracy: 0.75 });
      const metrics: unknown = JSON.parse(await readFile(path.join(outputDir, "metrics.json"), "utf8"));
      expect(metrics).to.have.nested.property("overall.accuracy", 0.75);
      const recorded = (await readFile(path.join(outputDir, "attempts.jsonl"), "utf8")).trim().split("\n");
      expect(recorded).to.have.length(4);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
