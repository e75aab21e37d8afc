import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import type { Notation } from "../encoder/index.js";
import type { CanonicalAnswer, Density, FamilyId } from "../families/types.js";
import type { Verdict } from "../verifier/index.js";
import type { FailureReason } from "./client.js";

/** One scored answer to one representation of one instance. */
export interface AnswerAttempt {
  readonly instanceId: string;
  readonly index: number;
  readonly family: FamilyId;
  readonly density: Density;
  readonly notation: Notation;
  readonly prompt: string;
  /** `null` when the client never produced text. */
  readonly response: string | null;
  readonly groundTruth: CanonicalAnswer;
  readonly verdict: Verdict;
  readonly correct: boolean;
  /** Requests issued, retries included. */
  readonly attempts: number;
  readonly failure?: { readonly reason: FailureReason; readonly message: string };
}

export interface ReportSink {
  record(attempt: AnswerAttempt): void | Promise<void>;
}

/** Keeps attempts in memory, in recording order. */
export class MemoryReportSink implements ReportSink {
  readonly attempts: AnswerAttempt[] = [];

  record(attempt: AnswerAttempt): void {
    this.attempts.push(attempt);
  }
}

/** Appends each attempt as one JSON line. The parent directory is created on first write. */
export class JsonlReportSink implements ReportSink {
  private ready: Promise<unknown> | null = null;

  constructor(private readonly path: string) {}

  async record(attempt: AnswerAttempt): Promise<void> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true });
    await this.ready;
    await appendFile(this.path, `${JSON.stringify(attempt)}\n`, "utf8");
  }
}
