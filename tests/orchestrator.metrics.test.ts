import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { Notation } from "../src/encoder/index.js";
import type { Density, FamilyId } from "../src/families/types.js";
import { computeAccuracy } from "../src/orchestrator/metrics.js";
import { JsonlReportSink, type AnswerAttempt } from "../src/orchestrator/sink.js";

function attempt(family: FamilyId, notation: Notation, density: Density, outcome: "correct" | "wrong" | "unparsed"): AnswerAttempt {
  return {
    instanceId: `${family}/${density}/0`,
    index: 0,
    family,
    density,
    notation,
    prompt: "prompt",
    response: "response",
    groundTruth: { kind: "boolean", value: true },
    verdict:
      outcome === "unparsed"
        ? { status: "parse-failure", reason: "no yes/no answer found", correct: false }
        : { status: "parsed", parsed: { kind: "boolean", value: outcome === "correct" }, correct: outcome === "correct" },
    correct: outcome === "correct",
    attempts: 1,
  };
}

describe("accuracy metrics", () => {
  it("breaks accuracy down along every grid axis", () => {
    const report = computeAccuracy([
      attempt("bipartite", "natural", "sparse", "correct"),
      attempt("bipartite", "edge-list", "dense", "wrong"),
      attempt("connectivity", "natural", "sparse", "unparsed"),
    ]);

    expect(report.overall).to.deep.equal({ total: 3, correct: 1, accuracy: 0.3333 });
    expect(report.byFamily).to.deep.equal({
      bipartite: { total: 2, correct: 1, accuracy: 0.5 },
      connectivity: { total: 1, correct: 0, accuracy: 0 },
    });
    expect(report.byNotation).to.deep.equal({
      "edge-list": { total: 1, correct: 0, accuracy: 0 },
      natural: { total: 2, correct: 1, accuracy: 0.5 },
    });
    expect(report.byDensity).to.deep.equal({
      dense: { total: 1, correct: 0, accuracy: 0 },
      sparse: { total: 2, correct: 1, accuracy: 0.5 },
    });
    expect(Object.keys(report.byFamilyNotation)).to.deep.equal([
      "bipartite/edge-list",
      "bipartite/natural",
      "connectivity/natural",
    ]);
    expect(report.byFamilyNotation["bipartite/natural"]).to.deep.equal({ total: 1, correct: 1, accuracy: 1 });
    expect(report.parseFailures).to.equal(1);
    expect(report.parseFailureRate).to.equal(0.3333);
  });

  it("reports zeros for an empty run", () => {
    expect(computeAccuracy([])).to.deep.equal({
      overall: { total: 0, correct: 0, accuracy: 0 },
      byFamily: {},
      byNotation: {},
      byDensity: {},
      byFamilyNotation: {},
      parseFailures: 0,
      parseFailureRate: 0,
    });
  });
});

describe("JSONL report sink", () => {
  it("appends one line per attempt and creates the directory", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "graphbench-sink-"));
    try {
      const file = path.join(directory, "nested", "attempts.jsonl");
      const sink = new JsonlReportSink(file);
      const first = attempt("bipartite", "natural", "sparse", "correct");
      const second = attempt("bipartite", "dsl", "dense", "unparsed");
      await sink.record(first);
      await sink.record(second);

      const lines = (await readFile(file, "utf8")).trimEnd().split("\n");
      expect(lines.map((line) => JSON.parse(line))).to.deep.equal([first, second]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
