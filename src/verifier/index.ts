import type { GraphModel } from "../../graph-kit/src/index.js";
import { ParseFailure } from "../errors.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { CanonicalAnswer, FamilyId, QueryParams } from "../families/types.js";
import { comparatorFor } from "./comparators.js";
import { extractAnswer } from "./extract.js";

export interface VerifyContext {
  readonly graph: GraphModel;
  readonly params: QueryParams;
  readonly vertexPrefix?: string;
}

export type Verdict =
  | { readonly status: "parsed"; readonly parsed: CanonicalAnswer; readonly correct: boolean }
  | { readonly status: "parse-failure"; readonly reason: string; readonly correct: false };

/**
 * Parses `rawText` into the family's answer shape and compares it with the
 * ground truth. Unparseable text yields a `parse-failure` verdict rather than
 * an exception.
 */
export function verify(family: FamilyId, rawText: string, groundTruth: CanonicalAnswer, context: VerifyContext): Verdict {
  const definition = FAMILY_TABLE[family];
  let parsed: CanonicalAnswer;
  try {
    parsed = extractAnswer(definition.answer, rawText, {
      vertexPrefix: context.vertexPrefix,
      vertexCount: context.graph.vertexCount,
    });
  } catch (error) {
    if (error instanceof ParseFailure) {
      return { status: "parse-failure", reason: error.message, correct: false };
    }
    throw error;
  }
  const correct = comparatorFor(definition.comparator)(parsed, groundTruth, context);
  return { status: "parsed", parsed, correct };
}

export { answerRegion, extractAnswer, stripVertexPrefix } from "./extract.js";
export { comparatorFor, type Comparator, type CompareContext } from "./comparators.js";
