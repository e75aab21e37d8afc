import { vertexLabel, type Representation } from "../encoder/index.js";
import { FAMILY_TABLE } from "../families/table.js";
import type { FamilyId, QueryParams } from "../families/types.js";

export const PROMPT_INSTRUCTION = "Please provide the reasoning process and the final answer directly to the question.";

/** Instruction, then the family question, then the graph. */
export function buildPrompt(
  family: FamilyId,
  params: QueryParams,
  representation: Representation,
  vertexPrefix = "",
): string {
  const question = FAMILY_TABLE[family].question(params, (vertex) => vertexLabel(vertex, vertexPrefix));
  return `${PROMPT_INSTRUCTION}\n\n${question}\n\n${representation.text}`;
}
