import { z } from "zod";

import { NOTATIONS, type Notation } from "../encoder/index.js";
import { ConfigError } from "../errors.js";
import type { AnswerClient, CompletionOptions } from "./client.js";

/** One recorded answer, keyed by the instance and notation it answers. */
export const recordedAnswerSchema = z.object({
  instanceId: z.string().min(1),
  notation: z.enum(NOTATIONS),
  response: z.string(),
});

export type RecordedAnswer = z.output<typeof recordedAnswerSchema>;

export function answerKey(instanceId: string, notation: Notation): string {
  return `${instanceId}#${notation}`;
}

export function parseRecordedAnswers(contents: string, source = "<inline>"): Map<string, string> {
  const answers = new Map<string, string>();
  contents.split(/\r?\n/).forEach((line, lineIndex) => {
    if (line.trim().length === 0) {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new ConfigError(`Line ${lineIndex + 1} of ${source} is not valid JSON`, { cause: error });
    }
    const parsed = recordedAnswerSchema.safeParse(raw);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
      throw new ConfigError(`Invalid answer on line ${lineIndex + 1} of ${source}: ${message}`);
    }
    answers.set(answerKey(parsed.data.instanceId, parsed.data.notation), parsed.data.response);
  });
  return answers;
}

/**
 * Answers prompts from a recorded transcript. Answers are looked up by the
 * request's answer key, so identical prompts rendered for different instances
 * still get their own recordings.
 */
export class ReplayAnswerClient implements AnswerClient {
  constructor(private readonly answers: ReadonlyMap<string, string>) {}

  async complete(_prompt: string, options: CompletionOptions): Promise<string> {
    options.signal.throwIfAborted();
    const key = options.answerKey;
    if (key === undefined) {
      throw new Error("request carries no answer key");
    }
    const response = this.answers.get(key);
    if (response === undefined) {
      throw new Error(`no recorded answer for ${key}`);
    }
    return response;
  }
}
