import pLimit from "p-limit";

import type { BenchmarkConfig } from "../config/benchmark.js";
import { encodeAll, NOTATIONS, type Notation, type Representation } from "../encoder/index.js";
import { GenerationFailure } from "../errors.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { Density, FamilyId, SizeParams } from "../families/types.js";
import { buildInstance, type Instance } from "../generator/instance.js";
import { deriveSeed } from "../generator/random.js";
import type { StructuredLogger } from "../logger.js";
import { verify, type Verdict } from "../verifier/index.js";
import { completeWithRetry, RequestPacer, type AnswerClient } from "./client.js";
import { computeAccuracy, type AccuracyReport } from "./metrics.js";
import { buildPrompt } from "./prompt.js";
import { answerKey } from "./replay.js";
import type { AnswerAttempt, ReportSink } from "./sink.js";

/** One cell of the benchmark grid, before generation. */
export interface PlannedInstance {
  readonly index: number;
  readonly family: FamilyId;
  readonly density: Density;
  readonly size: SizeParams;
  readonly seed: number;
}

export interface SkippedInstance {
  readonly family: FamilyId;
  readonly density: Density;
  readonly index: number;
  readonly reason: string;
}

export interface Dataset {
  readonly instances: readonly Instance[];
  readonly skipped: readonly SkippedInstance[];
}

export interface EvaluationResult {
  readonly attempts: readonly AnswerAttempt[];
  readonly metrics: AccuracyReport;
}

export interface OrchestratorDependencies {
  readonly logger: StructuredLogger;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly random?: () => number;
}

/** Tree families only take the `tree` density; every other family never does. */
function densitiesFor(family: FamilyId, requested: readonly Density[] | undefined): Density[] {
  const definition = FAMILY_TABLE[family];
  const isTree = definition.shape.structure === "tree";
  const allowed = (requested ?? definition.defaults.densities).filter((density) => (density === "tree") === isTree);
  return allowed.length > 0 ? [...new Set(allowed)] : [...definition.defaults.densities];
}

/**
 * Expands the configuration into the ordered list of instances to build.
 * Each cell receives its own seed derived from the base seed and its
 * coordinates, so adding families never shifts another family's graphs.
 */
export function planInstances(config: BenchmarkConfig): PlannedInstance[] {
  const plan: PlannedInstance[] = [];
  for (const family of config.families) {
    const definition = FAMILY_TABLE[family];
    const override = config.sizes[family];
    for (const density of densitiesFor(family, config.densities)) {
      for (let ordinal = 0; ordinal < config.instancesPerCombination; ordinal += 1) {
        plan.push({
          index: plan.length,
          family,
          density,
          size: {
            vertices: override?.vertices ?? definition.defaults.vertices,
            density,
            ...(override?.edges !== undefined ? { edges: override.edges } : {}),
          },
          seed: deriveSeed(config.baseSeed, family, density, ordinal),
        });
      }
    }
  }
  return plan;
}

function failureVerdict(reason: string): Verdict {
  return { status: "parse-failure", reason, correct: false };
}

export class BenchmarkOrchestrator {
  private readonly logger: StructuredLogger;
  private readonly notationOrder: Map<Notation, number>;

  constructor(
    private readonly config: BenchmarkConfig,
    private readonly deps: OrchestratorDependencies,
  ) {
    this.logger = deps.logger;
    this.notationOrder = new Map(NOTATIONS.map((notation, position) => [notation, position]));
  }

  /**
   * Generates and solves every planned instance. Cells that cannot produce an
   * acceptable graph are logged and skipped.
   */
  buildDataset(plan: readonly PlannedInstance[] = planInstances(this.config)): Dataset {
    const instances: Instance[] = [];
    const skipped: SkippedInstance[] = [];
    for (const cell of plan) {
      try {
        instances.push(
          buildInstance(cell.family, cell.size, cell.seed, {
            index: cell.index,
            maxAttempts: this.config.generationAttempts,
          }),
        );
      } catch (error) {
        if (!(error instanceof GenerationFailure)) {
          throw error;
        }
        skipped.push({ family: cell.family, density: cell.density, index: cell.index, reason: error.message });
        this.logger.warn("instance_skipped", {
          family: cell.family,
          density: cell.density,
          index: cell.index,
          vertices: cell.size.vertices,
          code: error.code,
          reason: error.message,
        });
      }
    }
    this.logger.info("dataset_built", { instances: instances.length, skipped: skipped.length });
    return { instances, skipped };
  }

  /** Renders every configured notation of an instance; failing notations are logged and left out. */
  representationsOf(instance: Instance): Representation[] {
    const { representations, failures } = encodeAll(instance.graph, this.config.notations, {
      graphName: this.config.graphName,
      vertexPrefix: this.config.vertexPrefix,
      maxNaturalEdges: this.config.maxNaturalEdges,
    });
    for (const failure of failures) {
      this.logger.warn("representation_skipped", {
        instance_id: instance.id,
        notation: failure.notation,
        code: failure.error.code,
        reason: failure.error.message,
      });
    }
    return representations;
  }

  /**
   * Asks `client` every (instance, notation) question under the configured
   * concurrency, pacing and retry limits, then records the attempts to `sink`
   * ordered by instance index and notation.
   */
  async evaluate(client: AnswerClient, instances: readonly Instance[], sink?: ReportSink): Promise<EvaluationResult> {
    const limit = pLimit(this.config.concurrency);
    const pacer = new RequestPacer(this.config.minIntervalMs, this.deps.now, this.deps.sleep);
    const jobs: Array<Promise<AnswerAttempt>> = [];

    for (const instance of instances) {
      for (const representation of this.representationsOf(instance)) {
        jobs.push(limit(() => this.ask(client, pacer, instance, representation)));
      }
    }

    const attempts = (await Promise.all(jobs)).sort(
      (left, right) =>
        left.index - right.index ||
        (this.notationOrder.get(left.notation) ?? 0) - (this.notationOrder.get(right.notation) ?? 0),
    );
    if (sink) {
      for (const attempt of attempts) {
        await sink.record(attempt);
      }
    }
    const metrics = computeAccuracy(attempts);
    this.logger.info("evaluation_completed", {
      attempts: attempts.length,
      accuracy: metrics.overall.accuracy,
      parse_failure_rate: metrics.parseFailureRate,
    });
    return { attempts, metrics };
  }

  /** Scores an answer that was obtained outside the orchestrator. */
  score(instance: Instance, notation: Notation, prompt: string, response: string, attempts = 1): AnswerAttempt {
    const verdict = verify(instance.family, response, instance.groundTruth, {
      graph: instance.graph,
      params: instance.params,
      vertexPrefix: this.config.vertexPrefix,
    });
    const attempt: AnswerAttempt = {
      instanceId: instance.id,
      index: instance.index,
      family: instance.family,
      density: instance.density,
      notation,
      prompt,
      response,
      groundTruth: instance.groundTruth,
      verdict,
      correct: verdict.correct,
      attempts,
    };
    this.logger.logAttempt({
      instanceId: instance.id,
      family: instance.family,
      notation,
      correct: verdict.correct,
      attempts,
      failure: verdict.status === "parse-failure" ? verdict.reason : null,
      rawText: response,
    });
    return attempt;
  }

  private async ask(
    client: AnswerClient,
    pacer: RequestPacer,
    instance: Instance,
    representation: Representation,
  ): Promise<AnswerAttempt> {
    const prompt = buildPrompt(instance.family, instance.params, representation, this.config.vertexPrefix);
    const outcome = await completeWithRetry(
      client,
      prompt,
      {
        maxRetries: this.config.maxRetries,
        timeoutMs: this.config.timeoutMs,
        pacer,
        sleep: this.deps.sleep,
        random: this.deps.random,
      },
      answerKey(instance.id, representation.notation),
    );
    if (outcome.status === "ok") {
      return this.score(instance, representation.notation, prompt, outcome.text, outcome.attempts);
    }

    const attempt: AnswerAttempt = {
      instanceId: instance.id,
      index: instance.index,
      family: instance.family,
      density: instance.density,
      notation: representation.notation,
      prompt,
      response: null,
      groundTruth: instance.groundTruth,
      verdict: failureVerdict(`request failed (${outcome.reason}): ${outcome.message}`),
      correct: false,
      attempts: outcome.attempts,
      failure: { reason: outcome.reason, message: outcome.message },
    };
    this.logger.logAttempt({
      instanceId: instance.id,
      family: instance.family,
      notation: representation.notation,
      correct: false,
      attempts: outcome.attempts,
      failure: outcome.reason,
    });
    return attempt;
  }
}
