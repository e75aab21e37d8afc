import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { parseBenchmarkConfig, type BenchmarkConfigInput } from "../src/config/benchmark.js";
import type { CanonicalAnswer } from "../src/families/types.js";
import { deriveSeed } from "../src/generator/random.js";
import type { Instance } from "../src/generator/instance.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";
import { BenchmarkOrchestrator, planInstances } from "../src/orchestrator/benchmark.js";
import type { AnswerClient, CompletionOptions } from "../src/orchestrator/client.js";
import { buildPrompt, PROMPT_INSTRUCTION } from "../src/orchestrator/prompt.js";
import { answerKey, parseRecordedAnswers, ReplayAnswerClient } from "../src/orchestrator/replay.js";
import { MemoryReportSink } from "../src/orchestrator/sink.js";

function harness(overrides: BenchmarkConfigInput = {}) {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ silent: true, onEntry: (entry) => entries.push(entry) });
  const config = parseBenchmarkConfig({
    families: ["connectivity", "tree-diameter"],
    instancesPerCombination: 1,
    notations: ["edge-list", "natural"],
    sizes: { connectivity: { vertices: 6 }, "tree-diameter": { vertices: 6 } },
    concurrency: 8,
    ...overrides,
  });
  const orchestrator = new BenchmarkOrchestrator(config, {
    logger,
    sleep: async () => undefined,
    random: () => 0,
  });
  return { orchestrator, entries };
}

function rightAnswer(truth: CanonicalAnswer): string {
  switch (truth.kind) {
    case "boolean":
      return truth.value ? "Final answer: yes" : "Final answer: no";
    case "scalar":
      return `Final answer: ${truth.value}`;
    default:
      throw new Error(`no canned answer for ${truth.kind}`);
  }
}

/** Holds every request until released, so completions can be reordered. */
class DeferredClient implements AnswerClient {
  readonly pending: Array<() => void> = [];

  constructor(private readonly inner: AnswerClient) {}

  complete(prompt: string, options: CompletionOptions): Promise<string> {
    return new Promise((resolve, reject) => {
      this.pending.push(() => {
        this.inner.complete(prompt, options).then(resolve, reject);
      });
    });
  }
}

async function waitFor(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

describe("prompts", () => {
  it("joins the instruction, the question and the graph", () => {
    const prompt = buildPrompt("shortest-path", { source: 0, target: 5 }, { notation: "edge-list", text: "EDGES" }, "v");
    expect(prompt).to.equal(
      [
        PROMPT_INSTRUCTION,
        "Find a shortest path from vertex v0 to vertex v5. Give the path as a sequence of vertices joined by '->' and state its total weight.",
        "EDGES",
      ].join("\n\n"),
    );
  });
});

describe("benchmark planning", () => {
  it("expands families, densities and repetitions with per-cell seeds", () => {
    const config = parseBenchmarkConfig({
      families: ["connectivity", "tree-diameter"],
      instancesPerCombination: 2,
      sizes: { connectivity: { vertices: 8 } },
    });
    const plan = planInstances(config);

    expect(plan.map((cell) => `${cell.family}/${cell.density}`)).to.deep.equal([
      "connectivity/sparse",
      "connectivity/sparse",
      "connectivity/dense",
      "connectivity/dense",
      "tree-diameter/tree",
      "tree-diameter/tree",
    ]);
    expect(plan[0]).to.deep.equal({
      index: 0,
      family: "connectivity",
      density: "sparse",
      size: { vertices: 8, density: "sparse" },
      seed: deriveSeed(42, "connectivity", "sparse", 0),
    });
    expect(plan[5]).to.deep.equal({
      index: 5,
      family: "tree-diameter",
      density: "tree",
      size: { vertices: 30, density: "tree" },
      seed: deriveSeed(42, "tree-diameter", "tree", 1),
    });
  });

  it("keeps tree densities on tree families only", () => {
    const config = parseBenchmarkConfig({ families: ["connectivity", "tree-diameter"], densities: ["dense"] });
    expect(planInstances(config).map((cell) => `${cell.family}/${cell.density}`)).to.deep.equal([
      ...Array<string>(5).fill("connectivity/dense"),
      ...Array<string>(5).fill("tree-diameter/tree"),
    ]);
  });
});

describe("benchmark orchestration", () => {
  it("builds the dataset and logs its size", () => {
    const { orchestrator, entries } = harness();
    const dataset = orchestrator.buildDataset();

    expect(dataset.instances.map((instance) => instance.id)).to.deep.equal([
      "connectivity/sparse/0",
      "connectivity/dense/1",
      "tree-diameter/tree/2",
    ]);
    expect(dataset.skipped).to.deep.equal([]);
    expect(entries.map((entry) => [entry.message, entry.payload])).to.deep.equal([
      ["dataset_built", { instances: 3, skipped: 0 }],
    ]);
  });

  it("skips representations a notation cannot carry", () => {
    const { orchestrator, entries } = harness({ notations: ["edge-list", "dsl"], vertexPrefix: "v" });
    const [instance] = orchestrator.buildDataset().instances;

    expect(orchestrator.representationsOf(instance).map((representation) => representation.notation)).to.deep.equal([
      "edge-list",
    ]);
    const skipped = entries.find((entry) => entry.message === "representation_skipped");
    expect(skipped?.level).to.equal("warn");
    expect(skipped?.payload).to.include({ instance_id: "connectivity/sparse/0", notation: "dsl", code: "E-ENCODING" });
  });

  it("scores answers and records them in plan order whatever order they complete in", async () => {
    const { orchestrator, entries } = harness();
    const { instances } = orchestrator.buildDataset();

    const answers = new Map<string, string>();
    const replay = new ReplayAnswerClient(answers);
    for (const instance of instances) {
      for (const representation of orchestrator.representationsOf(instance)) {
        answers.set(answerKey(instance.id, representation.notation), rightAnswer(instance.groundTruth));
      }
    }
    answers.set(answerKey("tree-diameter/tree/2", "edge-list"), "I am not sure.");

    const client = new DeferredClient(replay);
    const sink = new MemoryReportSink();
    const running = orchestrator.evaluate(client, instances, sink);
    await waitFor(() => client.pending.length === 6);
    for (const release of [...client.pending].reverse()) {
      release();
    }
    const result = await running;

    expect(result.attempts.map((attempt) => `${attempt.instanceId}#${attempt.notation}`)).to.deep.equal([
      "connectivity/sparse/0#natural",
      "connectivity/sparse/0#edge-list",
      "connectivity/dense/1#natural",
      "connectivity/dense/1#edge-list",
      "tree-diameter/tree/2#natural",
      "tree-diameter/tree/2#edge-list",
    ]);
    expect(result.attempts.map((attempt) => attempt.correct)).to.deep.equal([true, true, true, true, true, false]);
    expect(result.attempts[5].verdict).to.deep.equal({
      status: "parse-failure",
      reason: "no number found",
      correct: false,
    });
    expect(sink.attempts).to.deep.equal(result.attempts);
    expect(result.metrics.overall).to.deep.equal({ total: 6, correct: 5, accuracy: 0.8333 });
    expect(result.metrics.parseFailureRate).to.equal(0.1667);

    const completed = entries.find((entry) => entry.message === "evaluation_completed");
    expect(completed?.payload).to.deep.equal({ attempts: 6, accuracy: 0.8333, parse_failure_rate: 0.1667 });
    expect(entries.filter((entry) => entry.message === "attempt_scored")).to.have.length(6);
  });

  it("records requests that exhaust their retries as failed attempts", async () => {
    const { orchestrator, entries } = harness({ maxRetries: 1, notations: ["edge-list"] });
    const [instance] = orchestrator.buildDataset().instances;
    const complete = sinon
      .stub<[string, CompletionOptions], Promise<string>>()
      .rejects(Object.assign(new Error("overloaded"), { status: 503 }));

    const { attempts } = await orchestrator.evaluate({ complete }, [instance]);

    expect(complete.callCount).to.equal(2);
    expect(complete.firstCall.args[1].answerKey).to.equal("connectivity/sparse/0#edge-list");
    expect(attempts).to.have.length(1);
    expect(attempts[0]).to.include({ response: null, correct: false, attempts: 2 });
    expect(attempts[0].failure).to.deep.equal({ reason: "unavailable", message: "overloaded" });
    expect(attempts[0].verdict).to.deep.equal({
      status: "parse-failure",
      reason: "request failed (unavailable): overloaded",
      correct: false,
    });
    const scored = entries.find((entry) => entry.message === "attempt_scored");
    expect(scored?.level).to.equal("warn");
  });

  it("scores answers obtained elsewhere", () => {
    const { orchestrator } = harness({ notations: ["natural"] });
    const instance: Instance | undefined = orchestrator.buildDataset().instances[2];
    if (!instance) {
      throw new Error("expected a tree-diameter instance");
    }
    const { groundTruth } = instance;
    if (groundTruth.kind !== "scalar") {
      throw new Error("tree-diameter must answer with a scalar");
    }
    const response = `\\boxed{${groundTruth.value}}`;
    const attempt = orchestrator.score(instance, "natural", "prompt", response);
    expect(attempt).to.include({ instanceId: "tree-diameter/tree/2", correct: true, attempts: 1, response });
  });
});

describe("recorded answers", () => {
  it("parses one answer per line keyed by instance and notation", () => {
    const answers = parseRecordedAnswers(
      [
        JSON.stringify({ instanceId: "bipartite/sparse/0", notation: "natural", response: "yes" }),
        "",
        JSON.stringify({ instanceId: "bipartite/sparse/0", notation: "dsl", response: "no" }),
      ].join("\n"),
    );
    expect([...answers.entries()]).to.deep.equal([
      ["bipartite/sparse/0#natural", "yes"],
      ["bipartite/sparse/0#dsl", "no"],
    ]);
  });

  it("rejects malformed lines with their position", () => {
    expect(() => parseRecordedAnswers("{", "answers.jsonl")).to.throw("Line 1 of answers.jsonl is not valid JSON");
    expect(() =>
      parseRecordedAnswers(`${JSON.stringify({ instanceId: "x", notation: "json", response: "" })}`, "answers.jsonl"),
    ).to.throw(/^Invalid answer on line 1 of answers\.jsonl: notation: /);
  });

  it("answers identical prompts from each request's own recording", async () => {
    const replay = new ReplayAnswerClient(
      new Map([
        [answerKey("a", "natural"), "yes"],
        [answerKey("b", "natural"), "no"],
      ]),
    );
    const signal = new AbortController().signal;

    expect(await replay.complete("same prompt", { signal, answerKey: answerKey("a", "natural") })).to.equal("yes");
    expect(await replay.complete("same prompt", { signal, answerKey: answerKey("b", "natural") })).to.equal("no");
  });

  it("refuses requests it has no answer for", async () => {
    const replay = new ReplayAnswerClient(new Map([["known#natural", "yes"]]));
    const signal = new AbortController().signal;

    expect(await replay.complete("known prompt", { signal, answerKey: "known#natural" })).to.equal("yes");
    const failures: unknown[] = [];
    for (const options of [{ signal, answerKey: "orphan#natural" }, { signal }]) {
      try {
        await replay.complete("prompt", options);
      } catch (error) {
        failures.push(error);
      }
    }
    expect(failures.map((failure) => (failure instanceof Error ? failure.message : String(failure)))).to.deep.equal([
      "no recorded answer for orphan#natural",
      "request carries no answer key",
    ]);
  });
});
