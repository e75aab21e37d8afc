import { setTimeout as delay } from "node:timers/promises";

import { TransientIOFailure } from "../errors.js";

export interface CompletionOptions {
  readonly signal: AbortSignal;
  /** Identifies the (instance, notation) pair the prompt was rendered for. */
  readonly answerKey?: string;
}

/** Source of free-text answers, typically a model endpoint adapter. */
export interface AnswerClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface RetryPolicy {
  /** Retries after the first attempt; `0` disables retrying. */
  readonly maxRetries: number;
  /** Per-request budget before the request is aborted. */
  readonly timeoutMs: number;
  /** First backoff step, doubled on every retry. */
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly random?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Spaces request starts, retries included. */
  readonly pacer?: RequestPacer;
}

export type FailureReason = "timeout" | "rate-limit" | "unavailable" | "error";

export type CompletionOutcome =
  | { readonly status: "ok"; readonly text: string; readonly attempts: number }
  | { readonly status: "failed"; readonly reason: FailureReason; readonly message: string; readonly attempts: number };

export const DEFAULT_BASE_DELAY_MS = 250;
export const DEFAULT_MAX_DELAY_MS = 8_000;

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Enforces a minimum interval between request starts across every caller
 * sharing the instance.
 */
export class RequestPacer {
  private nextStart = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = () => Date.now(),
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {}

  async acquire(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return;
    }
    const now = this.now();
    const start = Math.max(now, this.nextStart);
    this.nextStart = start + this.minIntervalMs;
    if (start > now) {
      await this.sleep(start - now);
    }
  }
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/** Maps adapter errors carrying an HTTP status onto the transient failure class. */
export function classifyFailure(error: unknown): TransientIOFailure | null {
  if (error instanceof TransientIOFailure) {
    return error;
  }
  const status = statusOf(error);
  if (status !== null && isRetriableStatus(status)) {
    const message = error instanceof Error ? error.message : `HTTP ${status}`;
    return new TransientIOFailure(message, { reason: status === 429 ? "rate-limit" : "unavailable", cause: error });
  }
  return null;
}

async function requestOnce(
  client: AnswerClient,
  prompt: string,
  timeoutMs: number,
  answerKey: string | undefined,
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientIOFailure(`Request timed out after ${timeoutMs} ms`, { reason: "timeout" }));
    }, timeoutMs);
  });
  try {
    return await Promise.race([client.complete(prompt, { signal: controller.signal, answerKey }), timedOut]);
  } catch (error) {
    if (isAbortError(error)) {
      throw new TransientIOFailure(`Request timed out after ${timeoutMs} ms`, { reason: "timeout", cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const base = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const ceiling = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const jitter = Math.floor((policy.random ?? Math.random)() * base);
  return Math.min(ceiling, base * 2 ** (attempt - 1)) + jitter;
}

/**
 * Requests an answer, retrying transient failures with exponential backoff
 * and jitter. Failures never escape: the outcome records why the request
 * gave up and after how many attempts.
 */
export async function completeWithRetry(
  client: AnswerClient,
  prompt: string,
  policy: RetryPolicy,
  answerKey?: string,
): Promise<CompletionOutcome> {
  const maxAttempts = Math.max(1, policy.maxRetries + 1);
  const sleep = policy.sleep ?? defaultSleep;
  let attempt = 0;

  while (attempt < maxAttempts) {
    attempt += 1;
    await policy.pacer?.acquire();
    try {
      const text = await requestOnce(client, prompt, policy.timeoutMs, answerKey);
      return { status: "ok", text, attempts: attempt };
    } catch (error) {
      const transient = classifyFailure(error);
      if (!transient) {
        return {
          status: "failed",
          reason: "error",
          message: error instanceof Error ? error.message : String(error),
          attempts: attempt,
        };
      }
      if (attempt >= maxAttempts) {
        return { status: "failed", reason: transient.reason, message: transient.message, attempts: attempt };
      }
      await sleep(backoffDelay(attempt, policy));
    }
  }

  return { status: "failed", reason: "error", message: "retry budget exhausted", attempts: attempt };
}
