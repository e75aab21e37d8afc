import type { AnswerAttempt } from "./sink.js";

export interface AccuracyBucket {
  readonly total: number;
  readonly correct: number;
  readonly accuracy: number;
}

/**
 * Accuracy over a set of attempts, overall and split along each axis of the
 * benchmark grid. Family × notation keys read `family/notation`.
 */
export interface AccuracyReport {
  readonly overall: AccuracyBucket;
  readonly byFamily: Readonly<Record<string, AccuracyBucket>>;
  readonly byNotation: Readonly<Record<string, AccuracyBucket>>;
  readonly byDensity: Readonly<Record<string, AccuracyBucket>>;
  readonly byFamilyNotation: Readonly<Record<string, AccuracyBucket>>;
  readonly parseFailures: number;
  readonly parseFailureRate: number;
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? round(part / whole) : 0;
}

class Tally {
  total = 0;
  correct = 0;

  add(correct: boolean): void {
    this.total += 1;
    if (correct) {
      this.correct += 1;
    }
  }

  toBucket(): AccuracyBucket {
    return { total: this.total, correct: this.correct, accuracy: ratio(this.correct, this.total) };
  }
}

function groupBy(attempts: readonly AnswerAttempt[], key: (attempt: AnswerAttempt) => string): Record<string, AccuracyBucket> {
  const tallies = new Map<string, Tally>();
  for (const attempt of attempts) {
    const name = key(attempt);
    const tally = tallies.get(name) ?? new Tally();
    tally.add(attempt.correct);
    tallies.set(name, tally);
  }
  return Object.fromEntries([...tallies.entries()].sort(([left], [right]) => left.localeCompare(right)).map(([name, tally]) => [name, tally.toBucket()]));
}

export function computeAccuracy(attempts: readonly AnswerAttempt[]): AccuracyReport {
  const overall = new Tally();
  let parseFailures = 0;
  for (const attempt of attempts) {
    overall.add(attempt.correct);
    if (attempt.verdict.status === "parse-failure") {
      parseFailures += 1;
    }
  }
  return {
    overall: overall.toBucket(),
    byFamily: groupBy(attempts, (attempt) => attempt.family),
    byNotation: groupBy(attempts, (attempt) => attempt.notation),
    byDensity: groupBy(attempts, (attempt) => attempt.density),
    byFamilyNotation: groupBy(attempts, (attempt) => `${attempt.family}/${attempt.notation}`),
    parseFailures,
    parseFailureRate: ratio(parseFailures, attempts.length),
  };
}
